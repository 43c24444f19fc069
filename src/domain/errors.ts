import type { CastError } from './model/CastResult.js';

/** Machine-readable kind of an ingestion failure. */
export type IngestErrorCode =
  | 'FETCH_FAILED'
  | 'SCHEMA_MISMATCH'
  | 'TYPE_COERCION'
  | 'LOAD_FAILED'
  | 'CONNECTION_FAILED'
  | 'INVALID_CONFIG'
  | 'PIPELINE_FAILED';

/** Stage of a dataset ingest in which an error surfaced. */
export type IngestStage = 'connect' | 'fetch' | 'reconcile' | 'load';

/** Base class of every error the pipeline raises on purpose. */
export class IngestError extends Error {
  readonly code: IngestErrorCode;

  constructor(code: IngestErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Network failure, non-2xx response, unreadable file or unparseable payload. */
export class FetchError extends IngestError {
  readonly location: string;
  readonly status?: number;

  constructor(location: string, message: string, options?: { cause?: unknown; status?: number }) {
    super('FETCH_FAILED', message, options);
    this.location = location;
    this.status = options?.status;
  }
}

/** One or more required columns are absent from the source dataset. */
export class SchemaMismatchError extends IngestError {
  readonly missingColumns: readonly string[];

  constructor(missingColumns: readonly string[]) {
    super(
      'SCHEMA_MISMATCH',
      `Required column(s) missing from source: ${missingColumns.map((c) => `'${c}'`).join(', ')}`,
    );
    this.missingColumns = missingColumns;
  }
}

/** A row's value cannot be cast to its column's declared type (raised under the `abort` policy). */
export class TypeCoercionError extends IngestError {
  readonly rowIndex: number;
  readonly errors: readonly CastError[];

  constructor(rowIndex: number, errors: readonly CastError[]) {
    const first = errors[0];
    const detail = first ? `${first.message} (value: ${describeValue(first.value)})` : 'invalid row';
    super('TYPE_COERCION', `Row ${String(rowIndex)}: ${detail}`);
    this.rowIndex = rowIndex;
    this.errors = errors;
  }
}

/** Database-side failure while dropping, creating or filling a table. */
export class LoadError extends IngestError {
  readonly tableName: string;

  constructor(tableName: string, message: string, options?: { cause?: unknown }) {
    super('LOAD_FAILED', message, options);
    this.tableName = tableName;
  }
}

/** The database is unreachable or refused the connection. */
export class ConnectionError extends IngestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONNECTION_FAILED', message, options);
  }
}

/** The environment does not describe a usable configuration. */
export class ConfigError extends IngestError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super('INVALID_CONFIG', `Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.issues = issues;
  }
}

/**
 * Terminal pipeline failure, naming the dataset and stage that failed.
 * `dataset` is `null` when the run failed before any dataset started (stage `connect`).
 */
export class PipelineError extends IngestError {
  readonly dataset: string | null;
  readonly stage: IngestStage;

  constructor(dataset: string | null, stage: IngestStage, cause: unknown) {
    const subject = dataset === null ? 'Pipeline' : `Dataset '${dataset}'`;
    super('PIPELINE_FAILED', `${subject} failed during ${stage}: ${errorMessage(cause)}`, { cause });
    this.dataset = dataset;
    this.stage = stage;
  }
}

/** Extract a human-readable message from anything thrown. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') return `'${value}'`;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  if (typeof value === 'bigint') return `${value.toString()}n`;
  return String(value);
}
