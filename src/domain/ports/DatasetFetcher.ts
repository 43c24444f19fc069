import type { FileFormat, TabularDataset } from '../model/Dataset.js';

/** Port for retrieving and decoding a dataset. Failures surface as `FetchError`. */
export interface DatasetFetcher {
  fetch(location: string, format: FileFormat): Promise<TabularDataset>;
}
