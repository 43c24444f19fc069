import type { FileFormat } from '../model/Dataset.js';
import type { DatasetResult, PipelineResult } from '../model/PipelineResult.js';
import type { RejectedRow } from '../model/TypedTable.js';
import type { IngestStage } from '../errors.js';

/** Emitted once the database is reachable and the first dataset is about to be fetched. */
export interface PipelineStartedEvent {
  readonly type: 'pipeline:started';
  readonly datasets: readonly string[];
  readonly timestamp: number;
}

/** Emitted when every dataset has been loaded (or skipped). */
export interface PipelineCompletedEvent {
  readonly type: 'pipeline:completed';
  readonly result: PipelineResult;
  readonly timestamp: number;
}

/** Emitted when the run stops on an error. Remaining datasets are not attempted. */
export interface PipelineFailedEvent {
  readonly type: 'pipeline:failed';
  /** `null` when the failure happened before any dataset started. */
  readonly dataset: string | null;
  readonly stage: IngestStage;
  readonly error: string;
  readonly timestamp: number;
}

export interface DatasetFetchingEvent {
  readonly type: 'dataset:fetching';
  readonly dataset: string;
  readonly url: string;
  readonly format: FileFormat;
  readonly timestamp: number;
}

export interface DatasetFetchedEvent {
  readonly type: 'dataset:fetched';
  readonly dataset: string;
  readonly byteLength: number;
  readonly rowCount: number;
  readonly columnCount: number;
  readonly timestamp: number;
}

/** Emitted when a source has no rows; its table is left untouched. */
export interface DatasetSkippedEvent {
  readonly type: 'dataset:skipped';
  readonly dataset: string;
  readonly reason: string;
  readonly timestamp: number;
}

export interface DatasetReconciledEvent {
  readonly type: 'dataset:reconciled';
  readonly dataset: string;
  readonly validRows: number;
  readonly rejectedRows: number;
  readonly droppedColumns: readonly string[];
  readonly missingColumns: readonly string[];
  readonly timestamp: number;
}

export interface DatasetLoadingEvent {
  readonly type: 'dataset:loading';
  readonly dataset: string;
  readonly tableName: string;
  readonly rowCount: number;
  readonly timestamp: number;
}

export interface DatasetLoadedEvent {
  readonly type: 'dataset:loaded';
  readonly dataset: string;
  readonly result: DatasetResult;
  readonly timestamp: number;
}

export interface DatasetFailedEvent {
  readonly type: 'dataset:failed';
  readonly dataset: string;
  readonly stage: IngestStage;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted after each INSERT batch. */
export interface BatchInsertedEvent {
  readonly type: 'batch:inserted';
  readonly tableName: string;
  readonly batchIndex: number;
  readonly rowCount: number;
  /** Rows inserted so far, this batch included. */
  readonly insertedRows: number;
  readonly totalRows: number;
  readonly timestamp: number;
}

/** Emitted for each row left out of the load because a value failed to cast. */
export interface RowRejectedEvent {
  readonly type: 'row:rejected';
  readonly dataset: string;
  readonly row: RejectedRow;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | PipelineStartedEvent
  | PipelineCompletedEvent
  | PipelineFailedEvent
  | DatasetFetchingEvent
  | DatasetFetchedEvent
  | DatasetSkippedEvent
  | DatasetReconciledEvent
  | DatasetLoadingEvent
  | DatasetLoadedEvent
  | DatasetFailedEvent
  | BatchInsertedEvent
  | RowRejectedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
