import { describe, it, expect, vi } from 'vitest';
import { PipelineRunner } from '../../src/PipelineRunner.js';
import type { DatasetDescriptor, TabularDataset } from '../../src/domain/model/Dataset.js';
import type { RawRecord } from '../../src/domain/model/Record.js';
import type { DatasetFetcher } from '../../src/domain/ports/DatasetFetcher.js';
import type { BatchInsertedFn, DatabaseReadiness, LoadResult, TableLoader } from '../../src/domain/ports/TableLoader.js';
import type { TypedTable } from '../../src/domain/model/TypedTable.js';
import type { EventType } from '../../src/domain/events/DomainEvents.js';
import { ConnectionError, FetchError, LoadError, PipelineError } from '../../src/domain/errors.js';

const ZONES: DatasetDescriptor = {
  name: 'taxi-zones',
  url: '/data/zones.csv',
  format: 'delimited-text',
  tableName: 'taxi_zones',
  columns: [
    { name: 'locationid', type: 'integer', required: true },
    { name: 'zone', type: 'text' },
  ],
};

const VENDORS: DatasetDescriptor = {
  name: 'vendors',
  url: '/data/vendors.csv',
  format: 'delimited-text',
  tableName: 'vendors',
  columns: [{ name: 'vendorid', type: 'integer', required: true }],
};

const RATES: DatasetDescriptor = {
  name: 'rates',
  url: '/data/rates.csv',
  format: 'delimited-text',
  tableName: 'rates',
  columns: [{ name: 'ratecodeid', type: 'integer' }],
};

function textDataset(rows: RawRecord[]): TabularDataset {
  const names = rows.length > 0 ? Object.keys(rows[0] ?? {}) : ['locationid'];
  return {
    format: 'delimited-text',
    columns: names.map((name) => ({ name, nativeType: 'text' as const })),
    rows,
    byteLength: 64,
  };
}

function fakeFetcher(byLocation: Record<string, TabularDataset | Error>): DatasetFetcher & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    fetch: (location) => {
      calls.push(location);
      const entry = byLocation[location];
      if (entry === undefined) return Promise.reject(new FetchError(location, `Nothing at ${location}`));
      return entry instanceof Error ? Promise.reject(entry) : Promise.resolve(entry);
    },
  };
}

class RecordingLoader implements TableLoader {
  readonly tables = new Map<string, TypedTable>();
  failOn?: { table: string; error: Error };

  load(tableName: string, table: TypedTable, onBatch?: BatchInsertedFn): Promise<LoadResult> {
    if (this.failOn?.table === tableName) return Promise.reject(this.failOn.error);

    this.tables.set(tableName, table);
    onBatch?.({ tableName, batchIndex: 0, rowCount: table.rows.length, insertedRows: table.rows.length, totalRows: table.rows.length });
    return Promise.resolve({ tableName, rowCount: table.rows.length, batchCount: 1, elapsedMs: 1 });
  }
}

const READY: DatabaseReadiness = { ensureReady: () => Promise.resolve() };

describe('PipelineRunner', () => {
  describe('construction', () => {
    const fetcher = fakeFetcher({});
    const loader = new RecordingLoader();

    it('should require at least one dataset', () => {
      expect(() => new PipelineRunner({ datasets: [], fetcher, loader, database: READY })).toThrow(
        'Pipeline requires at least one dataset',
      );
    });

    it('should refuse duplicate dataset names', () => {
      expect(() => new PipelineRunner({ datasets: [ZONES, ZONES], fetcher, loader, database: READY })).toThrow(
        "Dataset 'taxi-zones' is declared more than once",
      );
    });

    it('should check column schemas up front', () => {
      const broken: DatasetDescriptor = { ...ZONES, columns: [] };

      expect(() => new PipelineRunner({ datasets: [broken], fetcher, loader, database: READY })).toThrow(
        'Column schema must declare at least one column',
      );
    });

    it('should start pending', () => {
      expect(new PipelineRunner({ datasets: [ZONES], fetcher, loader, database: READY }).getStatus()).toBe('PENDING');
    });
  });

  describe('run', () => {
    it('should load every dataset in order and report each result', async () => {
      const fetcher = fakeFetcher({
        '/data/zones.csv': textDataset([
          { LocationID: '1', Zone: 'Newark Airport' },
          { LocationID: '2', Zone: 'Jamaica Bay' },
        ]),
        '/data/vendors.csv': textDataset([{ VendorID: '2' }]),
      });
      const loader = new RecordingLoader();
      const runner = new PipelineRunner({ datasets: [ZONES, VENDORS], fetcher, loader, database: READY });

      const result = await runner.run();

      expect(fetcher.calls).toEqual(['/data/zones.csv', '/data/vendors.csv']);
      expect(result.status).toBe('DONE');
      expect(runner.getStatus()).toBe('DONE');
      expect(result.datasets.map((d) => [d.dataset, d.tableName, d.sourceRows, d.loadedRows, d.skipped])).toEqual([
        ['taxi-zones', 'taxi_zones', 2, 2, false],
        ['vendors', 'vendors', 1, 1, false],
      ]);
      expect(loader.tables.get('taxi_zones')?.rows).toEqual([
        { locationid: 1, zone: 'Newark Airport' },
        { locationid: 2, zone: 'Jamaica Bay' },
      ]);
    });

    it('should emit lifecycle events in order', async () => {
      const fetcher = fakeFetcher({ '/data/zones.csv': textDataset([{ LocationID: '1', Zone: 'EWR' }]) });
      const runner = new PipelineRunner({ datasets: [ZONES], fetcher, loader: new RecordingLoader(), database: READY });
      const types: EventType[] = [];
      runner.onAny((e) => types.push(e.type));

      await runner.run();

      expect(types).toEqual([
        'pipeline:started',
        'dataset:fetching',
        'dataset:fetched',
        'dataset:reconciled',
        'dataset:loading',
        'batch:inserted',
        'dataset:loaded',
        'pipeline:completed',
      ]);
    });

    it('should reject unparseable rows and emit an event for each', async () => {
      const fetcher = fakeFetcher({
        '/data/zones.csv': textDataset([
          { LocationID: '1', Zone: 'EWR' },
          { LocationID: 'one', Zone: 'Queens' },
        ]),
      });
      const rejected = vi.fn();
      const runner = new PipelineRunner({ datasets: [ZONES], fetcher, loader: new RecordingLoader(), database: READY });
      runner.on('row:rejected', rejected);

      const result = await runner.run();

      expect(result.datasets[0]).toMatchObject({ sourceRows: 2, loadedRows: 1, rejectedRows: 1 });
      expect(rejected).toHaveBeenCalledTimes(1);
      expect(rejected.mock.calls[0]![0]).toMatchObject({ dataset: 'taxi-zones', row: { index: 1 } });
    });

    it('should fail the dataset on an invalid row under the abort policy', async () => {
      const fetcher = fakeFetcher({ '/data/zones.csv': textDataset([{ LocationID: 'one', Zone: 'Queens' }]) });
      const runner = new PipelineRunner({
        datasets: [ZONES],
        fetcher,
        loader: new RecordingLoader(),
        database: READY,
        onInvalidRow: 'abort',
      });

      await expect(runner.run()).rejects.toThrow(
        "Dataset 'taxi-zones' failed during reconcile: Row 0: Column 'locationid' must be an integer (value: 'one')",
      );
    });

    it('should skip an empty dataset and leave its table untouched', async () => {
      const fetcher = fakeFetcher({
        '/data/zones.csv': textDataset([]),
        '/data/vendors.csv': textDataset([{ VendorID: '2' }]),
      });
      const loader = new RecordingLoader();
      const skipped = vi.fn();
      const runner = new PipelineRunner({ datasets: [ZONES, VENDORS], fetcher, loader, database: READY });
      runner.on('dataset:skipped', skipped);

      const result = await runner.run();

      expect(result.datasets[0]).toMatchObject({ dataset: 'taxi-zones', skipped: true, loadedRows: 0 });
      expect(loader.tables.has('taxi_zones')).toBe(false);
      expect(loader.tables.has('vendors')).toBe(true);
      expect(skipped.mock.calls[0]![0]).toMatchObject({
        reason: "Source has no rows; table 'taxi_zones' left untouched",
      });
    });

    it('should stop at the first failing dataset', async () => {
      const fetcher = fakeFetcher({
        '/data/zones.csv': textDataset([{ LocationID: '1', Zone: 'EWR' }]),
        '/data/vendors.csv': new FetchError('/data/vendors.csv', 'Cannot read /data/vendors.csv: ENOENT'),
        '/data/rates.csv': textDataset([{ RatecodeID: '1' }]),
      });
      const loader = new RecordingLoader();
      const failed = vi.fn();
      const runner = new PipelineRunner({ datasets: [ZONES, VENDORS, RATES], fetcher, loader, database: READY });
      runner.on('pipeline:failed', failed);

      const error: unknown = await runner.run().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PipelineError);
      expect((error as PipelineError).dataset).toBe('vendors');
      expect((error as PipelineError).stage).toBe('fetch');
      expect((error as PipelineError).message).toBe(
        "Dataset 'vendors' failed during fetch: Cannot read /data/vendors.csv: ENOENT",
      );
      expect(fetcher.calls).toEqual(['/data/zones.csv', '/data/vendors.csv']);
      expect(loader.tables.has('rates')).toBe(false);
      expect(runner.getStatus()).toBe('FAILED');
      expect(failed).toHaveBeenCalledTimes(1);
    });

    it('should report a missing required column as a reconcile failure', async () => {
      const fetcher = fakeFetcher({ '/data/zones.csv': textDataset([{ Zone: 'EWR' }]) });
      const runner = new PipelineRunner({ datasets: [ZONES], fetcher, loader: new RecordingLoader(), database: READY });

      await expect(runner.run()).rejects.toThrow(
        "Dataset 'taxi-zones' failed during reconcile: Required column(s) missing from source: 'locationid'",
      );
    });

    it('should report loader failures in the load stage', async () => {
      const fetcher = fakeFetcher({ '/data/zones.csv': textDataset([{ LocationID: '1', Zone: 'EWR' }]) });
      const failure = new LoadError('taxi_zones', "Loading table 'taxi_zones' failed: disk full");
      const loader = new RecordingLoader();
      loader.failOn = { table: 'taxi_zones', error: failure };
      const runner = new PipelineRunner({ datasets: [ZONES], fetcher, loader, database: READY });

      const error: unknown = await runner.run().catch((e: unknown) => e);

      expect((error as PipelineError).stage).toBe('load');
      expect((error as PipelineError).cause).toBe(failure);
    });

    it('should not fetch anything when the database is unreachable', async () => {
      const fetcher = fakeFetcher({ '/data/zones.csv': textDataset([{ LocationID: '1', Zone: 'EWR' }]) });
      const database: DatabaseReadiness = {
        ensureReady: () => Promise.reject(new ConnectionError('Database is not reachable: connect ECONNREFUSED')),
      };
      const runner = new PipelineRunner({ datasets: [ZONES], fetcher, loader: new RecordingLoader(), database });

      await expect(runner.run()).rejects.toThrow(
        'Pipeline failed during connect: Database is not reachable: connect ECONNREFUSED',
      );
      expect(fetcher.calls).toEqual([]);
      expect(runner.getStatus()).toBe('FAILED');
    });

    it('should release the decoded rows before loading', async () => {
      const source = textDataset([
        { LocationID: '1', Zone: 'EWR' },
        { LocationID: '2', Zone: 'Jamaica Bay' },
      ]);
      const decodedAtLoad: number[] = [];
      const loader: TableLoader = {
        load: (tableName, table) => {
          decodedAtLoad.push(source.rows.length);
          return Promise.resolve({ tableName, rowCount: table.rows.length, batchCount: 1, elapsedMs: 1 });
        },
      };
      const runner = new PipelineRunner({
        datasets: [ZONES],
        fetcher: fakeFetcher({ '/data/zones.csv': source }),
        loader,
        database: READY,
      });

      const result = await runner.run();

      expect(decodedAtLoad).toEqual([0]);
      expect(result.datasets[0]).toMatchObject({ sourceRows: 2, loadedRows: 2 });
    });

    it('should run only once', async () => {
      const fetcher = fakeFetcher({ '/data/zones.csv': textDataset([{ LocationID: '1', Zone: 'EWR' }]) });
      const runner = new PipelineRunner({ datasets: [ZONES], fetcher, loader: new RecordingLoader(), database: READY });

      await runner.run();

      await expect(runner.run()).rejects.toThrow("Cannot run pipeline from status 'DONE'");
    });
  });

  describe('preview', () => {
    it('should reconcile without loading', async () => {
      const fetcher = fakeFetcher({
        '/data/zones.csv': textDataset([
          { LocationID: '1', Zone: 'EWR', Extra: 'x' },
          { LocationID: '2', Zone: 'Queens', Extra: 'y' },
          { LocationID: 'bad', Zone: 'Bronx', Extra: 'z' },
        ]),
      });
      const loader = new RecordingLoader();
      const runner = new PipelineRunner({ datasets: [ZONES], fetcher, loader, database: READY });

      const preview = await runner.preview('taxi-zones', 1);

      expect(preview).toEqual({
        dataset: 'taxi-zones',
        sourceColumns: [
          { name: 'LocationID', nativeType: 'text' },
          { name: 'Zone', nativeType: 'text' },
          { name: 'Extra', nativeType: 'text' },
        ],
        sourceRows: 3,
        droppedColumns: ['Extra'],
        missingColumns: [],
        rejectedRows: 1,
        sample: [{ locationid: 1, zone: 'EWR' }],
        inferredColumns: [
          { name: 'LocationID', type: 'text' },
          { name: 'Zone', type: 'text' },
          { name: 'Extra', type: 'text' },
        ],
      });
      expect(loader.tables.size).toBe(0);
      expect(runner.getStatus()).toBe('PENDING');
    });

    it('should refuse a dataset the runner does not know', async () => {
      const runner = new PipelineRunner({
        datasets: [ZONES],
        fetcher: fakeFetcher({}),
        loader: new RecordingLoader(),
        database: READY,
      });

      await expect(runner.preview('vendors')).rejects.toThrow("Unknown dataset 'vendors'");
    });
  });
});
