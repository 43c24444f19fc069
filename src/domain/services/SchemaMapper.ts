import type { ColumnDefinition, ColumnSchema } from '../model/ColumnSchema.js';
import { assertValidColumnSchema } from '../model/ColumnSchema.js';
import type { SourceColumn, TabularDataset } from '../model/Dataset.js';
import type { RawRecord } from '../model/Record.js';
import type { CastError } from '../model/CastResult.js';
import type { RejectedRow, TypedRow, TypedTable, TypedValue } from '../model/TypedTable.js';
import { SchemaMismatchError, TypeCoercionError } from '../errors.js';
import { castValue } from './ValueCaster.js';

/** What to do with a row whose values cannot all be cast: drop it and continue, or fail the dataset. */
export type InvalidRowPolicy = 'reject' | 'abort';

export interface SchemaMapperOptions {
  /** Default: `'reject'`. */
  readonly onInvalidRow?: InvalidRowPolicy;
}

/** How the source columns line up with the declared columns. */
export interface ColumnResolution {
  /** Declared column name → source column name. */
  readonly bindings: ReadonlyMap<string, string>;
  readonly droppedColumns: readonly string[];
  readonly missingColumns: readonly string[];
  readonly missingRequired: readonly string[];
}

type RowOutcome = { readonly row: TypedRow } | { readonly errors: readonly CastError[] };

/**
 * Domain service that reconciles a decoded dataset against a fixed column schema.
 *
 * The schema is checked and indexed once, at construction. Source columns are matched by
 * name or alias, case-insensitively; unmatched source columns are dropped, optional declared
 * columns absent from the source are null-filled, and absent required columns fail the dataset.
 */
export class SchemaMapper {
  private readonly lookup: ReadonlyMap<string, ColumnDefinition>;
  private readonly policy: InvalidRowPolicy;

  constructor(
    private readonly columns: ColumnSchema,
    options?: SchemaMapperOptions,
  ) {
    assertValidColumnSchema(columns);
    this.lookup = this.buildLookup();
    this.policy = options?.onInvalidRow ?? 'reject';
  }

  get invalidRowPolicy(): InvalidRowPolicy {
    return this.policy;
  }

  /** Match source columns to declared columns. First matching source column wins. */
  resolveColumns(sourceColumns: readonly SourceColumn[]): ColumnResolution {
    const bindings = new Map<string, string>();
    const droppedColumns: string[] = [];

    for (const source of sourceColumns) {
      const column = this.lookup.get(source.name.toLowerCase());
      if (column && !bindings.has(column.name)) {
        bindings.set(column.name, source.name);
      } else {
        droppedColumns.push(source.name);
      }
    }

    const absent = this.columns.filter((c) => !bindings.has(c.name));

    return {
      bindings,
      droppedColumns,
      missingColumns: absent.filter((c) => !c.required).map((c) => c.name),
      missingRequired: absent.filter((c) => c.required).map((c) => c.name),
    };
  }

  /**
   * Cast every row of the dataset to the declared types.
   *
   * @throws SchemaMismatchError when a required column is absent from the source.
   * @throws TypeCoercionError on the first invalid row under the `'abort'` policy.
   */
  reconcile(dataset: TabularDataset): TypedTable {
    const resolution = this.resolveColumns(dataset.columns);
    if (resolution.missingRequired.length > 0) {
      throw new SchemaMismatchError(resolution.missingRequired);
    }

    const rows: TypedRow[] = [];
    const rejected: RejectedRow[] = [];

    dataset.rows.forEach((raw, index) => {
      const outcome = this.castRow(raw, resolution.bindings);

      if ('row' in outcome) {
        rows.push(outcome.row);
      } else if (this.policy === 'abort') {
        throw new TypeCoercionError(index, outcome.errors);
      } else {
        rejected.push({ index, raw, errors: outcome.errors });
      }
    });

    return {
      columns: this.columns,
      rows,
      rejected,
      sourceRowCount: dataset.rows.length,
      droppedColumns: resolution.droppedColumns,
      missingColumns: resolution.missingColumns,
    };
  }

  private castRow(raw: RawRecord, bindings: ReadonlyMap<string, string>): RowOutcome {
    const row: Record<string, TypedValue> = {};
    const errors: CastError[] = [];

    for (const column of this.columns) {
      const sourceName = bindings.get(column.name);
      const result = castValue(column, sourceName === undefined ? null : raw[sourceName]);

      if (result.ok) {
        row[column.name] = result.value;
      } else {
        errors.push(result.error);
      }
    }

    return errors.length === 0 ? { row } : { errors };
  }

  private buildLookup(): Map<string, ColumnDefinition> {
    const map = new Map<string, ColumnDefinition>();

    for (const column of this.columns) {
      map.set(column.name.toLowerCase(), column);
      for (const alias of column.aliases ?? []) {
        map.set(alias.toLowerCase(), column);
      }
    }

    return map;
  }
}
