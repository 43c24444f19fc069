import type { PipelineResult } from '../../domain/model/PipelineResult.js';
import { PipelineError } from '../../domain/errors.js';
import type { PipelineContext } from '../PipelineContext.js';
import { IngestDataset } from './IngestDataset.js';

/** Use case: check the database, then ingest every dataset in order, stopping at the first failure. */
export class RunPipeline {
  constructor(private readonly ctx: PipelineContext) {}

  async execute(): Promise<PipelineResult> {
    if (this.ctx.status !== 'PENDING') {
      throw new Error(`Cannot run pipeline from status '${this.ctx.status}'`);
    }

    this.ctx.startedAt = Date.now();

    try {
      await this.ctx.database.ensureReady();
    } catch (error) {
      throw this.fail(new PipelineError(null, 'connect', error));
    }

    this.ctx.eventBus.emit({
      type: 'pipeline:started',
      datasets: this.ctx.datasets.map((d) => d.name),
      timestamp: Date.now(),
    });

    const ingest = new IngestDataset(this.ctx);

    for (const descriptor of this.ctx.datasets) {
      try {
        this.ctx.results.push(await ingest.execute(descriptor));
      } catch (error) {
        if (error instanceof PipelineError) throw this.fail(error);
        throw error;
      }
    }

    this.ctx.transitionTo('DONE');

    const result: PipelineResult = {
      status: 'DONE',
      datasets: [...this.ctx.results],
      elapsedMs: this.ctx.elapsedMs(),
    };

    this.ctx.eventBus.emit({ type: 'pipeline:completed', result, timestamp: Date.now() });
    return result;
  }

  private fail(error: PipelineError): PipelineError {
    this.ctx.transitionTo('FAILED');
    this.ctx.eventBus.emit({
      type: 'pipeline:failed',
      dataset: error.dataset,
      stage: error.stage,
      error: error.message,
      timestamp: Date.now(),
    });
    return error;
  }
}
