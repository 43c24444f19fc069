import Papa from 'papaparse';
import type { SourceParser } from '../../domain/ports/SourceParser.js';
import type { SourceColumn, TabularDataset } from '../../domain/model/Dataset.js';
import type { RawRecord } from '../../domain/model/Record.js';
import { isEmptyRow } from '../../domain/model/Record.js';

export interface CsvParserOptions {
  /** Field delimiter. Default: auto-detected by papaparse. */
  readonly delimiter?: string;
  /** Text encoding of the payload. Default: `'utf-8'`. */
  readonly encoding?: BufferEncoding;
}

/** Fields papaparse collects when a row has more values than the header. */
const EXTRA_FIELDS_KEY = '__parsed_extra';

/**
 * Decodes delimited text with a header row. Every value is kept as text; typing happens
 * during reconciliation.
 */
export class CsvParser implements SourceParser {
  readonly format = 'delimited-text' as const;
  private readonly delimiter: string | undefined;
  private readonly encoding: BufferEncoding;

  constructor(options?: CsvParserOptions) {
    this.delimiter = options?.delimiter;
    this.encoding = options?.encoding ?? 'utf-8';
  }

  parse(data: Buffer): Promise<TabularDataset> {
    const content = data.toString(this.encoding).replace(/^\uFEFF/, '');

    const result = Papa.parse<Record<string, unknown>>(content, {
      header: true,
      delimiter: this.delimiter ?? '',
      skipEmptyLines: true,
      dynamicTyping: false,
      transformHeader: (header) => header.trim(),
    });

    const quoteError = result.errors.find((e) => e.type === 'Quotes');
    if (quoteError) {
      const row = quoteError.row === undefined ? '' : ` at row ${String(quoteError.row + 1)}`;
      return Promise.reject(new Error(`Malformed delimited text${row}: ${quoteError.message}`));
    }

    const fields = (result.meta.fields ?? []).filter((f) => f !== EXTRA_FIELDS_KEY);
    if (fields.length === 0) {
      return Promise.reject(new Error('Delimited text has no header row'));
    }

    const columns: SourceColumn[] = fields.map((name): SourceColumn => ({ name, nativeType: 'text' }));
    const rows: RawRecord[] = [];

    for (const parsed of result.data) {
      const row: Record<string, unknown> = {};
      for (const field of fields) {
        row[field] = parsed[field];
      }
      if (isEmptyRow(row)) continue;
      rows.push(row);
    }

    return Promise.resolve({ format: this.format, columns, rows, byteLength: data.length });
  }
}
