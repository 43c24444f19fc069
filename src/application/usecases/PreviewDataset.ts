import type { DatasetDescriptor } from '../../domain/model/Dataset.js';
import type { PreviewResult } from '../../domain/model/PipelineResult.js';
import type { DatasetFetcher } from '../../domain/ports/DatasetFetcher.js';
import type { IngestStage } from '../../domain/errors.js';
import { PipelineError } from '../../domain/errors.js';
import type { SchemaMapper } from '../../domain/services/SchemaMapper.js';
import { inferColumnSchema } from '../../domain/services/SchemaInference.js';

/** Use case: fetch and reconcile a dataset without touching the database. */
export class PreviewDataset {
  constructor(private readonly fetcher: DatasetFetcher) {}

  async execute(descriptor: DatasetDescriptor, mapper: SchemaMapper, sampleSize = 10): Promise<PreviewResult> {
    let stage: IngestStage = 'fetch';

    try {
      const dataset = await this.fetcher.fetch(descriptor.url, descriptor.format);

      stage = 'reconcile';
      const table = mapper.reconcile(dataset);

      return {
        dataset: descriptor.name,
        sourceColumns: dataset.columns,
        sourceRows: dataset.rows.length,
        droppedColumns: table.droppedColumns,
        missingColumns: table.missingColumns,
        rejectedRows: table.rejected.length,
        sample: table.rows.slice(0, Math.max(0, sampleSize)),
        inferredColumns: inferColumnSchema(dataset.columns),
      };
    } catch (error) {
      throw new PipelineError(descriptor.name, stage, error);
    }
  }
}
