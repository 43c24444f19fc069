import { parquetMetadata, parquetReadObjects } from 'hyparquet';
import type { SourceParser } from '../../domain/ports/SourceParser.js';
import type { NativeType, SourceColumn, TabularDataset } from '../../domain/model/Dataset.js';
import type { RawRecord } from '../../domain/model/Record.js';

type FileMetaData = ReturnType<typeof parquetMetadata>;
type SchemaElement = FileMetaData['schema'][number];

const TIMESTAMP_CONVERTED = new Set(['DATE', 'TIME_MILLIS', 'TIME_MICROS', 'TIMESTAMP_MILLIS', 'TIMESTAMP_MICROS']);
const INTEGER_CONVERTED = new Set(['INT_8', 'INT_16', 'INT_32', 'INT_64', 'UINT_8', 'UINT_16', 'UINT_32', 'UINT_64']);
const TEXT_CONVERTED = new Set(['UTF8', 'ENUM', 'JSON']);

/**
 * Decodes a parquet file held in memory. The column types come from the file's own schema
 * (logical type first, then converted type, then physical type).
 */
export class ParquetParser implements SourceParser {
  readonly format = 'columnar' as const;

  async parse(data: Buffer): Promise<TabularDataset> {
    // hyparquet reads from an ArrayBuffer; a Buffer may be a view into a larger pooled one.
    const file = new ArrayBuffer(data.length);
    new Uint8Array(file).set(data);

    const metadata = parquetMetadata(file);
    const columns = topLevelColumns(metadata);
    const rows: RawRecord[] = await parquetReadObjects({ file, metadata });

    return { format: this.format, columns, rows, byteLength: data.length };
  }
}

function topLevelColumns(metadata: FileMetaData): SourceColumn[] {
  const [root, ...elements] = metadata.schema;
  const columns: SourceColumn[] = [];
  let index = 0;

  for (let child = 0; child < (root?.num_children ?? 0); child++) {
    const element = elements[index];
    if (!element) break;
    columns.push({ name: element.name, nativeType: nativeTypeOf(element) });
    index += 1 + descendantCount(elements, index);
  }

  return columns;
}

function descendantCount(elements: readonly SchemaElement[], index: number): number {
  let count = 0;
  for (let child = 0; child < (elements[index]?.num_children ?? 0); child++) {
    const next = index + 1 + count;
    count += 1 + descendantCount(elements, next);
  }
  return count;
}

/** Map a schema element to the type the column carries before reconciliation. */
export function nativeTypeOf(element: SchemaElement): NativeType {
  if (element.num_children) return 'unknown';

  const logical: string | undefined = element.logical_type?.type;
  switch (logical) {
    case 'TIMESTAMP':
    case 'DATE':
    case 'TIME':
      return 'timestamp';
    case 'INTEGER':
      return 'integer';
    case 'DECIMAL':
      return 'decimal';
    case 'STRING':
    case 'ENUM':
    case 'JSON':
    case 'UUID':
      return 'text';
  }

  const converted: string | undefined = element.converted_type;
  if (converted !== undefined) {
    if (TIMESTAMP_CONVERTED.has(converted)) return 'timestamp';
    if (INTEGER_CONVERTED.has(converted)) return 'integer';
    if (converted === 'DECIMAL') return 'decimal';
    if (TEXT_CONVERTED.has(converted)) return 'text';
  }

  switch (element.type) {
    case 'BOOLEAN':
      return 'boolean';
    case 'INT32':
    case 'INT64':
      return 'integer';
    case 'INT96':
      return 'timestamp';
    case 'FLOAT':
    case 'DOUBLE':
      return 'float';
    case 'BYTE_ARRAY':
    case 'FIXED_LEN_BYTE_ARRAY':
      return 'binary';
    default:
      return 'unknown';
  }
}
