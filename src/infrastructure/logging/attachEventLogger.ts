import type { EventBus } from '../../application/EventBus.js';
import type { Logger } from './logger.js';

/** Subscribe a logger to the pipeline's domain events. */
export function attachEventLogger(eventBus: EventBus, logger: Logger): void {
  eventBus.on('pipeline:started', (e) => {
    logger.info(`Pipeline started: ${e.datasets.join(', ')}`);
  });

  eventBus.on('dataset:fetching', (e) => {
    logger.info(`[${e.dataset}] Fetching ${e.url}`);
  });

  eventBus.on('dataset:fetched', (e) => {
    logger.info(`[${e.dataset}] Fetched ${String(e.rowCount)} rows, ${String(e.columnCount)} columns`, {
      bytes: e.byteLength,
    });
  });

  eventBus.on('dataset:skipped', (e) => {
    logger.warn(`[${e.dataset}] Skipped: ${e.reason}`);
  });

  eventBus.on('dataset:reconciled', (e) => {
    const data: Record<string, unknown> = {};
    if (e.droppedColumns.length > 0) data.droppedColumns = e.droppedColumns;
    if (e.missingColumns.length > 0) data.missingColumns = e.missingColumns;
    logger.info(
      `[${e.dataset}] Reconciled ${String(e.validRows)} rows (${String(e.rejectedRows)} rejected)`,
      data,
    );
  });

  eventBus.on('row:rejected', (e) => {
    logger.debug(`[${e.dataset}] Row ${String(e.row.index)} rejected`, {
      errors: e.row.errors.map((error) => error.message),
    });
  });

  eventBus.on('dataset:loading', (e) => {
    logger.info(`[${e.dataset}] Loading ${String(e.rowCount)} rows into ${e.tableName}`);
  });

  eventBus.on('batch:inserted', (e) => {
    logger.debug(`${e.tableName}: ${String(e.insertedRows)}/${String(e.totalRows)} rows inserted`);
  });

  eventBus.on('dataset:loaded', (e) => {
    logger.success(`[${e.dataset}] ${e.result.tableName}: ${String(e.result.loadedRows)} rows loaded`, {
      elapsedMs: e.result.elapsedMs,
    });
  });

  eventBus.on('dataset:failed', (e) => {
    logger.error(`[${e.dataset}] Failed during ${e.stage}: ${e.error}`);
  });

  eventBus.on('pipeline:completed', (e) => {
    logger.success(`Pipeline completed: ${String(e.result.datasets.length)} dataset(s)`, {
      elapsedMs: e.result.elapsedMs,
    });
  });

  eventBus.on('pipeline:failed', (e) => {
    logger.warn('Pipeline stopped; remaining datasets were not attempted', {
      dataset: e.dataset,
      stage: e.stage,
    });
  });
}
