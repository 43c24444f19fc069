import type { DatasetDescriptor } from '../domain/model/Dataset.js';
import type { DatasetResult } from '../domain/model/PipelineResult.js';
import type { PipelineStatus } from '../domain/model/PipelineStatus.js';
import type { DatasetFetcher } from '../domain/ports/DatasetFetcher.js';
import type { DatabaseReadiness, TableLoader } from '../domain/ports/TableLoader.js';
import type { SchemaMapperOptions } from '../domain/services/SchemaMapper.js';
import { canTransition } from '../domain/model/PipelineStatus.js';
import { SchemaMapper } from '../domain/services/SchemaMapper.js';
import { EventBus } from './EventBus.js';

/**
 * Mutable state holder shared across the use cases of a single pipeline run.
 *
 * Internal: not exported from the public API. Use cases receive a reference to this
 * context and advance it as datasets are fetched and loaded.
 */
export class PipelineContext {
  readonly eventBus: EventBus;
  readonly datasets: readonly DatasetDescriptor[];
  readonly fetcher: DatasetFetcher;
  readonly loader: TableLoader;
  readonly database: DatabaseReadiness;
  /** One mapper per dataset name, built (and its schema checked) up front. */
  readonly mappers: ReadonlyMap<string, SchemaMapper>;

  status: PipelineStatus = 'PENDING';
  results: DatasetResult[] = [];
  startedAt?: number;

  constructor(
    datasets: readonly DatasetDescriptor[],
    fetcher: DatasetFetcher,
    loader: TableLoader,
    database: DatabaseReadiness,
    mapperOptions: SchemaMapperOptions,
    eventBus?: EventBus,
  ) {
    this.datasets = datasets;
    this.fetcher = fetcher;
    this.loader = loader;
    this.database = database;
    this.eventBus = eventBus ?? new EventBus();
    this.mappers = new Map(datasets.map((d) => [d.name, new SchemaMapper(d.columns, mapperOptions)]));
  }

  transitionTo(newStatus: PipelineStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new Error(`Invalid state transition: ${this.status} → ${newStatus}`);
    }
    this.status = newStatus;
  }

  mapperFor(descriptor: DatasetDescriptor): SchemaMapper {
    const mapper = this.mappers.get(descriptor.name);
    if (!mapper) {
      throw new Error(`Dataset '${descriptor.name}' is not part of this pipeline`);
    }
    return mapper;
  }

  elapsedMs(): number {
    return this.startedAt === undefined ? 0 : Date.now() - this.startedAt;
  }
}
