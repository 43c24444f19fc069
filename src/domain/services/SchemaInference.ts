import type { ColumnDefinition, ColumnSchema, SemanticType } from '../model/ColumnSchema.js';
import type { NativeType, SourceColumn } from '../model/Dataset.js';

const SEMANTIC_BY_NATIVE: Record<NativeType, SemanticType> = {
  timestamp: 'timestamp',
  integer: 'integer',
  float: 'decimal',
  decimal: 'decimal',
  boolean: 'text',
  text: 'text',
  binary: 'text',
  unknown: 'text',
};

/**
 * Suggest a column schema from a source's native column types.
 *
 * Floats land in the default `decimal(12,2)`; anything without a semantic
 * counterpart becomes text. Meant as a starting point for a declared schema,
 * never as a substitute for one.
 */
export function inferColumnSchema(sourceColumns: readonly SourceColumn[]): ColumnSchema {
  return sourceColumns.map(
    (column): ColumnDefinition => ({ name: column.name, type: SEMANTIC_BY_NATIVE[column.nativeType] }),
  );
}
