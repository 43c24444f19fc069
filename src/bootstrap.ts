import type { DatasetDescriptor } from './domain/model/Dataset.js';
import type { AppConfig } from './config.js';
import { EventBus } from './application/EventBus.js';
import { SourceFetcher } from './application/SourceFetcher.js';
import { PipelineRunner } from './PipelineRunner.js';
import { createSource } from './infrastructure/sources/createSource.js';
import { CsvParser } from './infrastructure/parsers/CsvParser.js';
import { ParquetParser } from './infrastructure/parsers/ParquetParser.js';
import { createSequelize } from './infrastructure/database/createSequelize.js';
import { SequelizeDatabase } from './infrastructure/database/SequelizeDatabase.js';
import { SequelizeTableLoader } from './infrastructure/loaders/SequelizeTableLoader.js';

export interface Runtime {
  readonly runner: PipelineRunner;
  /** Release the database pool. */
  close(): Promise<void>;
}

/** Fetcher reading URLs and local paths, decoding parquet and CSV. */
export function createFetcher(config: Pick<AppConfig, 'fetchTimeoutMs'>): SourceFetcher {
  return new SourceFetcher(
    (location) => createSource(location, { timeout: config.fetchTimeoutMs }),
    [new ParquetParser(), new CsvParser()],
  );
}

/** Wire the production pipeline: PostgreSQL through Sequelize, sources over HTTP or the file system. */
export function createRuntime(config: AppConfig, datasets: readonly DatasetDescriptor[], eventBus: EventBus): Runtime {
  const sequelize = createSequelize(config.database);
  const database = new SequelizeDatabase(sequelize);

  const runner = new PipelineRunner({
    datasets,
    fetcher: createFetcher(config),
    loader: new SequelizeTableLoader(sequelize, { batchSize: config.batchSize }),
    database,
    onInvalidRow: config.invalidRowPolicy,
    eventBus,
  });

  return { runner, close: () => database.close() };
}
