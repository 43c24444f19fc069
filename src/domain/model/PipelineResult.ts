import type { ColumnSchema } from './ColumnSchema.js';
import type { SourceColumn } from './Dataset.js';
import type { TypedRow } from './TypedTable.js';

/** Outcome of ingesting one dataset. */
export interface DatasetResult {
  readonly dataset: string;
  readonly tableName: string;
  /** `true` when the source had no rows and the table was left untouched. */
  readonly skipped: boolean;
  readonly sourceRows: number;
  readonly loadedRows: number;
  readonly rejectedRows: number;
  readonly droppedColumns: readonly string[];
  readonly missingColumns: readonly string[];
  readonly elapsedMs: number;
}

/** Final summary of a successful run. */
export interface PipelineResult {
  readonly status: 'DONE';
  readonly datasets: readonly DatasetResult[];
  readonly elapsedMs: number;
}

/** Result of fetching and reconciling a dataset without loading it. */
export interface PreviewResult {
  readonly dataset: string;
  readonly sourceColumns: readonly SourceColumn[];
  readonly sourceRows: number;
  readonly droppedColumns: readonly string[];
  readonly missingColumns: readonly string[];
  readonly rejectedRows: number;
  /** First typed rows, in source order. */
  readonly sample: readonly TypedRow[];
  /** Schema derived from the source's native column types. */
  readonly inferredColumns: ColumnSchema;
}
