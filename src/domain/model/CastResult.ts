/** Error codes produced when casting a source value to a semantic type. */
export type CastErrorCode = 'REQUIRED' | 'TYPE_MISMATCH' | 'OUT_OF_RANGE';

/** A single cast failure for a specific column. */
export interface CastError {
  /** Destination column name. */
  readonly field: string;
  readonly message: string;
  readonly code: CastErrorCode;
  /** The source value that failed. */
  readonly value?: unknown;
}

export type CastResult<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: CastError };

export function castOk<T>(value: T): CastResult<T> {
  return { ok: true, value };
}

export function castFailed<T>(field: string, code: CastErrorCode, message: string, value: unknown): CastResult<T> {
  return { ok: false, error: { field, code, message, value } };
}
