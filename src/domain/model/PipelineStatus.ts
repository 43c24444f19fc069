/**
 * Finite state machine for a pipeline run.
 *
 * Valid transitions:
 * - `PENDING` → `FETCHING` | `FAILED`
 * - `FETCHING` → `LOADING` | `FETCHING` (empty dataset skipped) | `DONE` | `FAILED`
 * - `LOADING` → `FETCHING` | `DONE` | `FAILED`
 * - `DONE`, `FAILED` → (terminal)
 */
export const PipelineStatus = {
  PENDING: 'PENDING',
  FETCHING: 'FETCHING',
  LOADING: 'LOADING',
  DONE: 'DONE',
  FAILED: 'FAILED',
} as const;

export type PipelineStatus = (typeof PipelineStatus)[keyof typeof PipelineStatus];

const VALID_TRANSITIONS: Record<PipelineStatus, readonly PipelineStatus[]> = {
  [PipelineStatus.PENDING]: [PipelineStatus.FETCHING, PipelineStatus.FAILED],
  [PipelineStatus.FETCHING]: [
    PipelineStatus.LOADING,
    PipelineStatus.FETCHING,
    PipelineStatus.DONE,
    PipelineStatus.FAILED,
  ],
  [PipelineStatus.LOADING]: [PipelineStatus.FETCHING, PipelineStatus.DONE, PipelineStatus.FAILED],
  [PipelineStatus.DONE]: [],
  [PipelineStatus.FAILED]: [],
};

/** Check whether a state transition is valid according to the pipeline FSM. */
export function canTransition(from: PipelineStatus, to: PipelineStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/** Whether no further transition is possible. */
export function isTerminal(status: PipelineStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}
