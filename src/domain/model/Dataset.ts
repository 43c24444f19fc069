import type { ColumnSchema } from './ColumnSchema.js';
import type { RawRecord } from './Record.js';

/** Physical layout of a source file. */
export type FileFormat = 'columnar' | 'delimited-text';

/** Immutable description of one ingest target. */
export interface DatasetDescriptor {
  /** Short identifier used in logs, errors and the CLI (e.g. `'taxi-zones'`). */
  readonly name: string;
  /** `http(s)://` URL or local file path of the source file. */
  readonly url: string;
  readonly format: FileFormat;
  /** Destination table, dropped and recreated on every load. */
  readonly tableName: string;
  readonly columns: ColumnSchema;
}

/** Type a column carries in the source file itself, before reconciliation. */
export type NativeType = 'timestamp' | 'integer' | 'float' | 'decimal' | 'boolean' | 'text' | 'binary' | 'unknown';

export interface SourceColumn {
  readonly name: string;
  readonly nativeType: NativeType;
}

/**
 * In-memory table produced by a parser. Lives for the duration of one dataset ingest.
 *
 * The ingest owns `rows` and empties the array once they are reconciled, so decoded
 * and typed copies of a large extract are not both held through the load.
 */
export interface TabularDataset {
  readonly format: FileFormat;
  readonly columns: readonly SourceColumn[];
  readonly rows: RawRecord[];
  /** Size of the payload the dataset was decoded from. */
  readonly byteLength: number;
}
