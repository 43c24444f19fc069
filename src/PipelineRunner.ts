import type { DatasetDescriptor } from './domain/model/Dataset.js';
import type { PipelineResult, PreviewResult } from './domain/model/PipelineResult.js';
import type { PipelineStatus } from './domain/model/PipelineStatus.js';
import type { DatasetFetcher } from './domain/ports/DatasetFetcher.js';
import type { DatabaseReadiness, TableLoader } from './domain/ports/TableLoader.js';
import type { InvalidRowPolicy } from './domain/services/SchemaMapper.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import { EventBus } from './application/EventBus.js';
import { PipelineContext } from './application/PipelineContext.js';
import { RunPipeline } from './application/usecases/RunPipeline.js';
import { PreviewDataset } from './application/usecases/PreviewDataset.js';

/** Configuration for a pipeline run. */
export interface PipelineRunnerConfig {
  /** Datasets to ingest, in the order they run. At least one. */
  readonly datasets: readonly DatasetDescriptor[];
  readonly fetcher: DatasetFetcher;
  readonly loader: TableLoader;
  /** Checked once before the first dataset is fetched. */
  readonly database: DatabaseReadiness;
  /** What to do with rows whose values cannot be cast. Default: `'reject'`. */
  readonly onInvalidRow?: InvalidRowPolicy;
  /** Bus to publish events on. Default: a private one; subscribe with `on()`. */
  readonly eventBus?: EventBus;
}

/**
 * Facade over a single sequential ingest run: connect → (fetch → reconcile → load) per dataset.
 *
 * Delegates each operation to a use case in `application/usecases/`. A runner runs once;
 * the first failure stops it and is thrown as a `PipelineError`.
 *
 * @example
 * ```typescript
 * const runner = new PipelineRunner({ datasets, fetcher, loader, database });
 * runner.on('dataset:loaded', (e) => console.log(e.result.loadedRows));
 * await runner.run();
 * ```
 */
export class PipelineRunner {
  private readonly ctx: PipelineContext;

  constructor(config: PipelineRunnerConfig) {
    if (config.datasets.length === 0) {
      throw new Error('Pipeline requires at least one dataset');
    }

    const names = new Set<string>();
    for (const dataset of config.datasets) {
      if (names.has(dataset.name)) {
        throw new Error(`Dataset '${dataset.name}' is declared more than once`);
      }
      names.add(dataset.name);
    }

    this.ctx = new PipelineContext(
      config.datasets,
      config.fetcher,
      config.loader,
      config.database,
      { onInvalidRow: config.onInvalidRow ?? 'reject' },
      config.eventBus,
    );
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to every event. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Run every dataset in order. Resolves only when all of them loaded or were skipped. */
  async run(): Promise<PipelineResult> {
    return new RunPipeline(this.ctx).execute();
  }

  /** Fetch and reconcile one of this runner's datasets without touching the database. */
  async preview(datasetName: string, sampleSize = 10): Promise<PreviewResult> {
    const descriptor = this.ctx.datasets.find((d) => d.name === datasetName);
    if (!descriptor) {
      throw new Error(`Unknown dataset '${datasetName}'`);
    }
    return new PreviewDataset(this.ctx.fetcher).execute(descriptor, this.ctx.mapperFor(descriptor), sampleSize);
  }

  getStatus(): PipelineStatus {
    return this.ctx.status;
  }
}
