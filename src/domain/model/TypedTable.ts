import type { ColumnSchema } from './ColumnSchema.js';
import type { CastError } from './CastResult.js';
import type { RawRecord } from './Record.js';

/**
 * A value after casting: `Date` for timestamps, `number` for integers,
 * fixed-point `string` for decimals, `string` for text.
 */
export type TypedValue = Date | number | string | null;

/** One reconciled row, keyed by destination column name. */
export type TypedRow = Readonly<Record<string, TypedValue>>;

/** A source row excluded from the load because at least one value failed to cast. */
export interface RejectedRow {
  /** Zero-based index of the row in the source dataset. */
  readonly index: number;
  readonly raw: RawRecord;
  readonly errors: readonly CastError[];
}

/** A dataset reconciled against a column schema, ready to be loaded. */
export interface TypedTable {
  readonly columns: ColumnSchema;
  readonly rows: readonly TypedRow[];
  readonly rejected: readonly RejectedRow[];
  readonly sourceRowCount: number;
  /** Source columns that matched no declared column. */
  readonly droppedColumns: readonly string[];
  /** Optional declared columns absent from the source, null-filled in every row. */
  readonly missingColumns: readonly string[];
}
