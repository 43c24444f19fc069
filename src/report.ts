import type { DatasetDescriptor } from './domain/model/Dataset.js';
import type { PreviewResult } from './domain/model/PipelineResult.js';
import type { TypedValue } from './domain/model/TypedTable.js';
import type { ColumnDefinition } from './domain/model/ColumnSchema.js';
import { decimalShape } from './domain/model/ColumnSchema.js';

function formatValue(value: TypedValue): string {
  if (value === null) return 'NULL';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

function formatType(column: ColumnDefinition): string {
  if (column.type !== 'decimal') return column.type;
  const { precision, scale } = decimalShape(column);
  return `decimal(${String(precision)},${String(scale)})`;
}

/** One line per dataset: name, format, destination table and source. */
export function formatDatasetList(datasets: readonly DatasetDescriptor[]): string {
  const width = Math.max(...datasets.map((d) => d.name.length));
  return datasets
    .map((d) => `${d.name.padEnd(width)}  ${d.format.padEnd(14)}  ${d.tableName.padEnd(20)}  ${d.url}`)
    .join('\n');
}

/** Plain-text preview report: source columns, reconciliation outcome and a sample of typed rows. */
export function formatPreview(preview: PreviewResult): string {
  const lines = [
    `Dataset: ${preview.dataset}`,
    `Source rows: ${String(preview.sourceRows)}`,
    `Rejected rows: ${String(preview.rejectedRows)}`,
    `Dropped columns: ${preview.droppedColumns.length > 0 ? preview.droppedColumns.join(', ') : '(none)'}`,
    `Missing columns: ${preview.missingColumns.length > 0 ? preview.missingColumns.join(', ') : '(none)'}`,
    '',
    'Source columns (native → inferred):',
  ];

  preview.sourceColumns.forEach((column, i) => {
    const inferred = preview.inferredColumns[i];
    lines.push(`  ${column.name}: ${column.nativeType} → ${inferred ? formatType(inferred) : '?'}`);
  });

  lines.push('', `Sample (${String(preview.sample.length)} rows):`);
  for (const row of preview.sample) {
    lines.push(
      '  ' +
        Object.entries(row)
          .map(([key, value]) => `${key}=${formatValue(value)}`)
          .join(', '),
    );
  }

  return lines.join('\n');
}
