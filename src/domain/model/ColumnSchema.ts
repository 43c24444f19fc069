/** Semantic column types a destination table can declare. */
export const SemanticType = {
  TIMESTAMP: 'timestamp',
  INTEGER: 'integer',
  DECIMAL: 'decimal',
  TEXT: 'text',
} as const;

export type SemanticType = (typeof SemanticType)[keyof typeof SemanticType];

/** Default `NUMERIC(precision, scale)` for decimal columns. */
export const DEFAULT_DECIMAL_PRECISION = 12;
export const DEFAULT_DECIMAL_SCALE = 2;

const MAX_DECIMAL_PRECISION = 1000;

/** Declares a single destination column. */
export interface ColumnDefinition {
  /** Destination column name. Also matched (case-insensitively) against source column names. */
  readonly name: string;
  readonly type: SemanticType;
  /** When `true`, the column must exist in the source and be non-empty in every row. Default: `false`. */
  readonly required?: boolean;
  /** Alternative source column names mapped onto this column. Case-insensitive. */
  readonly aliases?: readonly string[];
  /** For `'decimal'`: total significant digits. Default: `12`. */
  readonly precision?: number;
  /** For `'decimal'`: digits after the decimal point. Default: `2`. */
  readonly scale?: number;
  /** For `'text'`: strip surrounding whitespace. Default: `false`. */
  readonly trim?: boolean;
}

/** Ordered column declarations of one destination table. */
export type ColumnSchema = readonly ColumnDefinition[];

/** Resolved precision and scale of a decimal column. */
export function decimalShape(column: ColumnDefinition): { precision: number; scale: number } {
  return {
    precision: column.precision ?? DEFAULT_DECIMAL_PRECISION,
    scale: column.scale ?? DEFAULT_DECIMAL_SCALE,
  };
}

/**
 * Check the invariants of a column schema: at least one column, unique names and
 * aliases (case-insensitive), known types, and a sane decimal shape.
 *
 * @throws Error describing the first violation.
 */
export function assertValidColumnSchema(columns: ColumnSchema): void {
  if (columns.length === 0) {
    throw new Error('Column schema must declare at least one column');
  }

  const owners = new Map<string, string>();
  const knownTypes: readonly string[] = Object.values(SemanticType);

  for (const column of columns) {
    if (column.name.trim() === '') {
      throw new Error('Column name must not be empty');
    }
    if (!knownTypes.includes(column.type)) {
      throw new Error(`Column '${column.name}' has unknown type '${String(column.type)}'`);
    }

    const keys = new Set([column.name, ...(column.aliases ?? [])].map((key) => key.toLowerCase()));
    for (const key of keys) {
      const owner = owners.get(key);
      if (owner !== undefined) {
        throw new Error(`Column name or alias '${key}' is declared by both '${owner}' and '${column.name}'`);
      }
      owners.set(key, column.name);
    }

    if (column.type === 'decimal') {
      const { precision, scale } = decimalShape(column);
      if (!Number.isInteger(precision) || precision < 1 || precision > MAX_DECIMAL_PRECISION) {
        throw new Error(`Column '${column.name}' has invalid precision ${String(precision)}`);
      }
      if (!Number.isInteger(scale) || scale < 0 || scale > precision) {
        throw new Error(`Column '${column.name}' has invalid scale ${String(scale)}`);
      }
    }
  }
}
