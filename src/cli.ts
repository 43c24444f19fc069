#!/usr/bin/env node
import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { buildDatasets } from './datasets/registry.js';
import { EventBus } from './application/EventBus.js';
import { createRuntime } from './bootstrap.js';
import { formatDatasetList, formatPreview } from './report.js';
import { createLogger } from './infrastructure/logging/logger.js';
import type { Logger } from './infrastructure/logging/logger.js';
import { attachEventLogger } from './infrastructure/logging/attachEventLogger.js';
import { errorMessage } from './domain/errors.js';

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/** Run an action with a loaded config; any failure is logged and sets exit code 1. */
async function withConfig(action: (config: AppConfig, logger: Logger) => Promise<void> | void): Promise<void> {
  let logger = createLogger();
  try {
    const config = loadConfig();
    logger = createLogger({ level: config.logLevel });
    await action(config, logger);
  } catch (error) {
    logger.error(errorMessage(error));
    process.exitCode = 1;
  }
}

const program = new Command();

program.name('tripload').description('Load the taxi trip and zone datasets into PostgreSQL with explicit column types');

program
  .command('run')
  .description('Fetch, reconcile and load datasets in order, stopping at the first failure')
  .argument('[datasets...]', 'subset of datasets to run (default: all)')
  .action((names: string[]) =>
    withConfig(async (config, logger) => {
      const eventBus = new EventBus((error, event) => {
        logger.warn(`Event handler for '${event.type}' failed: ${errorMessage(error)}`);
      });
      attachEventLogger(eventBus, logger);

      const datasets = buildDatasets(config.datasets, names.length > 0 ? names : undefined);
      const runtime = createRuntime(config, datasets, eventBus);
      try {
        await runtime.runner.run();
      } finally {
        await runtime.close();
      }
    }),
  );

program
  .command('preview')
  .description('Fetch and reconcile one dataset without touching the database')
  .argument('<dataset>', 'dataset name')
  .option('-r, --rows <n>', 'number of sample rows', parsePositiveInt, 10)
  .action((name: string, options: { rows: number }) =>
    withConfig(async (config) => {
      const datasets = buildDatasets(config.datasets, [name]);
      const runtime = createRuntime(config, datasets, new EventBus());
      try {
        const preview = await runtime.runner.preview(name, options.rows);
        console.log(formatPreview(preview));
      } finally {
        await runtime.close();
      }
    }),
  );

program
  .command('datasets')
  .description('List the known datasets')
  .action(() =>
    withConfig((config) => {
      console.log(formatDatasetList(buildDatasets(config.datasets)));
    }),
  );

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});
