import { describe, it, expect, vi } from 'vitest';
import { SourceFetcher } from '../../../src/application/SourceFetcher.js';
import { CsvParser } from '../../../src/infrastructure/parsers/CsvParser.js';
import type { DataSource } from '../../../src/domain/ports/DataSource.js';
import type { SourceParser } from '../../../src/domain/ports/SourceParser.js';
import type { TabularDataset } from '../../../src/domain/model/Dataset.js';
import { FetchError } from '../../../src/domain/errors.js';
import { payloadSource } from '../../helpers/sources.js';

function chunkedSource(chunks: string[], failure?: Error): DataSource {
  return {
    async *read() {
      for (const chunk of chunks) {
        yield await Promise.resolve(Buffer.from(chunk));
      }
      if (failure) throw failure;
    },
  };
}

function recordingParser(result: TabularDataset): SourceParser & { received: Buffer[] } {
  const received: Buffer[] = [];
  return {
    format: result.format,
    received,
    parse: (data: Buffer) => {
      received.push(data);
      return Promise.resolve(result);
    },
  };
}

const EMPTY_COLUMNAR: TabularDataset = { format: 'columnar', columns: [], rows: [], byteLength: 0 };

describe('SourceFetcher', () => {
  it('should decode the payload with the parser registered for the format', async () => {
    const createSource = vi.fn(() => payloadSource('LocationID,Zone\n1,Newark Airport\n'));
    const fetcher = new SourceFetcher(createSource, [new CsvParser()]);

    const dataset = await fetcher.fetch('/data/taxi_zone_lookup.csv', 'delimited-text');

    expect(createSource).toHaveBeenCalledWith('/data/taxi_zone_lookup.csv');
    expect(dataset.columns).toEqual([
      { name: 'LocationID', nativeType: 'text' },
      { name: 'Zone', nativeType: 'text' },
    ]);
    expect(dataset.rows).toEqual([{ LocationID: '1', Zone: 'Newark Airport' }]);
  });

  it('should hand the parser every chunk as one payload', async () => {
    const parser = recordingParser(EMPTY_COLUMNAR);
    const fetcher = new SourceFetcher(() => chunkedSource(['PAR1', '....', 'PAR1']), [parser]);

    await fetcher.fetch('https://example.test/trips.parquet', 'columnar');

    expect(parser.received).toHaveLength(1);
    expect(parser.received[0]!.toString()).toBe('PAR1....PAR1');
  });

  it('should fail when no parser handles the format', async () => {
    const createSource = vi.fn(() => payloadSource(''));
    const fetcher = new SourceFetcher(createSource, [new CsvParser()]);

    await expect(fetcher.fetch('https://example.test/trips.parquet', 'columnar')).rejects.toThrow(
      "No parser registered for format 'columnar'",
    );
    expect(createSource).not.toHaveBeenCalled();
  });

  it('should pass source FetchErrors through unchanged', async () => {
    const failure = new FetchError('https://example.test/trips.parquet', 'HTTP 403 Forbidden', { status: 403 });
    const fetcher = new SourceFetcher(() => chunkedSource([], failure), [recordingParser(EMPTY_COLUMNAR)]);

    const error: unknown = await fetcher.fetch('https://example.test/trips.parquet', 'columnar').catch((e: unknown) => e);

    expect(error).toBe(failure);
  });

  it('should wrap other read failures in FetchError', async () => {
    const fetcher = new SourceFetcher(
      () => chunkedSource(['partial'], new Error('EACCES: permission denied')),
      [recordingParser(EMPTY_COLUMNAR)],
    );

    const error: unknown = await fetcher.fetch('/data/trips.parquet', 'columnar').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect((error as FetchError).message).toBe('Cannot read /data/trips.parquet: EACCES: permission denied');
    expect((error as FetchError).location).toBe('/data/trips.parquet');
  });

  it('should wrap decoding failures in FetchError', async () => {
    const parser: SourceParser = {
      format: 'columnar',
      parse: () => Promise.reject(new Error('parquet file invalid magic number')),
    };
    const fetcher = new SourceFetcher(() => chunkedSource(['garbage']), [parser]);

    const failing = fetcher.fetch('/data/trips.parquet', 'columnar');

    await expect(failing).rejects.toThrow(FetchError);
    await expect(failing).rejects.toThrow(
      'Cannot decode columnar payload from /data/trips.parquet: parquet file invalid magic number',
    );
  });
});
