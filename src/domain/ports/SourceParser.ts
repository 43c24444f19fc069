import type { FileFormat, TabularDataset } from '../model/Dataset.js';

/**
 * Port for decoding a complete payload into a tabular dataset.
 *
 * Implement this interface to support a new file format.
 */
export interface SourceParser {
  readonly format: FileFormat;
  parse(data: Buffer): Promise<TabularDataset>;
}
