import type { TypedTable } from '../model/TypedTable.js';

/** Outcome of loading one table. */
export interface LoadResult {
  readonly tableName: string;
  /** Rows present in the table after the load, verified with a count. */
  readonly rowCount: number;
  readonly batchCount: number;
  readonly elapsedMs: number;
}

/** Progress callback invoked after each inserted batch. */
export type BatchInsertedFn = (progress: {
  readonly tableName: string;
  readonly batchIndex: number;
  readonly rowCount: number;
  readonly insertedRows: number;
  readonly totalRows: number;
}) => void;

/**
 * Port for writing a typed table into the destination database.
 *
 * Implementations drop and recreate `tableName` with the table's declared column
 * types, then bulk-insert every row. Failures surface as `ConnectionError` or `LoadError`.
 */
export interface TableLoader {
  load(tableName: string, table: TypedTable, onBatch?: BatchInsertedFn): Promise<LoadResult>;
}

/** Port for checking the destination database is reachable before any work starts. */
export interface DatabaseReadiness {
  ensureReady(): Promise<void>;
}
