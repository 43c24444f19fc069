import type { DatasetDescriptor } from '../../domain/model/Dataset.js';
import type { DatasetResult } from '../../domain/model/PipelineResult.js';
import type { IngestStage } from '../../domain/errors.js';
import { PipelineError, errorMessage } from '../../domain/errors.js';
import type { PipelineContext } from '../PipelineContext.js';

/** Use case: fetch, reconcile and load one dataset. Every failure surfaces as a `PipelineError`. */
export class IngestDataset {
  constructor(private readonly ctx: PipelineContext) {}

  async execute(descriptor: DatasetDescriptor): Promise<DatasetResult> {
    const startedAt = Date.now();
    let stage: IngestStage = 'fetch';

    try {
      this.ctx.transitionTo('FETCHING');
      this.ctx.eventBus.emit({
        type: 'dataset:fetching',
        dataset: descriptor.name,
        url: descriptor.url,
        format: descriptor.format,
        timestamp: Date.now(),
      });

      const dataset = await this.ctx.fetcher.fetch(descriptor.url, descriptor.format);

      this.ctx.eventBus.emit({
        type: 'dataset:fetched',
        dataset: descriptor.name,
        byteLength: dataset.byteLength,
        rowCount: dataset.rows.length,
        columnCount: dataset.columns.length,
        timestamp: Date.now(),
      });

      if (dataset.rows.length === 0) {
        this.ctx.eventBus.emit({
          type: 'dataset:skipped',
          dataset: descriptor.name,
          reason: `Source has no rows; table '${descriptor.tableName}' left untouched`,
          timestamp: Date.now(),
        });

        return {
          dataset: descriptor.name,
          tableName: descriptor.tableName,
          skipped: true,
          sourceRows: 0,
          loadedRows: 0,
          rejectedRows: 0,
          droppedColumns: [],
          missingColumns: [],
          elapsedMs: Date.now() - startedAt,
        };
      }

      stage = 'reconcile';
      const table = this.ctx.mapperFor(descriptor).reconcile(dataset);
      dataset.rows.length = 0;

      for (const row of table.rejected) {
        this.ctx.eventBus.emit({ type: 'row:rejected', dataset: descriptor.name, row, timestamp: Date.now() });
      }

      this.ctx.eventBus.emit({
        type: 'dataset:reconciled',
        dataset: descriptor.name,
        validRows: table.rows.length,
        rejectedRows: table.rejected.length,
        droppedColumns: table.droppedColumns,
        missingColumns: table.missingColumns,
        timestamp: Date.now(),
      });

      stage = 'load';
      this.ctx.transitionTo('LOADING');
      this.ctx.eventBus.emit({
        type: 'dataset:loading',
        dataset: descriptor.name,
        tableName: descriptor.tableName,
        rowCount: table.rows.length,
        timestamp: Date.now(),
      });

      const load = await this.ctx.loader.load(descriptor.tableName, table, (progress) => {
        this.ctx.eventBus.emit({ type: 'batch:inserted', ...progress, timestamp: Date.now() });
      });

      const result: DatasetResult = {
        dataset: descriptor.name,
        tableName: load.tableName,
        skipped: false,
        sourceRows: table.sourceRowCount,
        loadedRows: load.rowCount,
        rejectedRows: table.rejected.length,
        droppedColumns: table.droppedColumns,
        missingColumns: table.missingColumns,
        elapsedMs: Date.now() - startedAt,
      };

      this.ctx.eventBus.emit({ type: 'dataset:loaded', dataset: descriptor.name, result, timestamp: Date.now() });
      return result;
    } catch (error) {
      this.ctx.eventBus.emit({
        type: 'dataset:failed',
        dataset: descriptor.name,
        stage,
        error: errorMessage(error),
        timestamp: Date.now(),
      });
      throw new PipelineError(descriptor.name, stage, error);
    }
  }
}
