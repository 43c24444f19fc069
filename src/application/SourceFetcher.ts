import type { FileFormat, TabularDataset } from '../domain/model/Dataset.js';
import type { DataSource } from '../domain/ports/DataSource.js';
import type { DatasetFetcher } from '../domain/ports/DatasetFetcher.js';
import type { SourceParser } from '../domain/ports/SourceParser.js';
import { FetchError, errorMessage } from '../domain/errors.js';

/** Builds the data source for a location (URL or local path). */
export type SourceFactory = (location: string) => DataSource;

/**
 * Reads a whole payload from a data source and decodes it with the parser
 * registered for the requested format.
 */
export class SourceFetcher implements DatasetFetcher {
  private readonly parsers: ReadonlyMap<FileFormat, SourceParser>;

  constructor(
    private readonly createSource: SourceFactory,
    parsers: readonly SourceParser[],
  ) {
    this.parsers = new Map(parsers.map((parser) => [parser.format, parser]));
  }

  async fetch(location: string, format: FileFormat): Promise<TabularDataset> {
    const parser = this.parsers.get(format);
    if (!parser) {
      throw new FetchError(location, `No parser registered for format '${format}'`);
    }

    const payload = await this.download(location);

    try {
      return await parser.parse(payload);
    } catch (error) {
      throw new FetchError(location, `Cannot decode ${format} payload from ${location}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async download(location: string): Promise<Buffer> {
    const chunks: Buffer[] = [];

    try {
      for await (const chunk of this.createSource(location).read()) {
        chunks.push(chunk);
      }
    } catch (error) {
      if (error instanceof FetchError) throw error;
      throw new FetchError(location, `Cannot read ${location}: ${errorMessage(error)}`, { cause: error });
    }

    return Buffer.concat(chunks);
  }
}
