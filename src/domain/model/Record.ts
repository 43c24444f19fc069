/** A key-value row as decoded from the source file. */
export interface RawRecord {
  readonly [key: string]: unknown;
}

/** Whether a single value counts as absent: `undefined`, `null`, or a blank string. */
export function isEmptyValue(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

/** Check whether every value in a raw record is empty. */
export function isEmptyRow(record: RawRecord): boolean {
  return Object.values(record).every(isEmptyValue);
}
