// Main entry point
export { PipelineRunner } from './PipelineRunner.js';
export type { PipelineRunnerConfig } from './PipelineRunner.js';

// Domain model
export { SemanticType, DEFAULT_DECIMAL_PRECISION, DEFAULT_DECIMAL_SCALE } from './domain/model/ColumnSchema.js';
export type { ColumnDefinition, ColumnSchema } from './domain/model/ColumnSchema.js';
export type {
  DatasetDescriptor,
  FileFormat,
  NativeType,
  SourceColumn,
  TabularDataset,
} from './domain/model/Dataset.js';
export type { RawRecord } from './domain/model/Record.js';
export type { TypedRow, TypedTable, TypedValue, RejectedRow } from './domain/model/TypedTable.js';
export type { CastError, CastErrorCode, CastResult } from './domain/model/CastResult.js';
export type { DatasetResult, PipelineResult, PreviewResult } from './domain/model/PipelineResult.js';
export { PipelineStatus } from './domain/model/PipelineStatus.js';

// Errors
export {
  IngestError,
  FetchError,
  SchemaMismatchError,
  TypeCoercionError,
  LoadError,
  ConnectionError,
  ConfigError,
  PipelineError,
} from './domain/errors.js';
export type { IngestErrorCode, IngestStage } from './domain/errors.js';

// Domain services
export { SchemaMapper } from './domain/services/SchemaMapper.js';
export type { InvalidRowPolicy, SchemaMapperOptions, ColumnResolution } from './domain/services/SchemaMapper.js';
export { castValue } from './domain/services/ValueCaster.js';
export { inferColumnSchema } from './domain/services/SchemaInference.js';
export { BatchSplitter } from './domain/services/BatchSplitter.js';

// Events
export type { DomainEvent, EventType, EventPayload } from './domain/events/DomainEvents.js';
export { EventBus } from './application/EventBus.js';
export type { HandlerErrorFn } from './application/EventBus.js';

// Ports (for custom implementations)
export type { DataSource } from './domain/ports/DataSource.js';
export type { SourceParser } from './domain/ports/SourceParser.js';
export type { DatasetFetcher } from './domain/ports/DatasetFetcher.js';
export type { TableLoader, LoadResult, BatchInsertedFn, DatabaseReadiness } from './domain/ports/TableLoader.js';

// Built-in adapters
export { SourceFetcher } from './application/SourceFetcher.js';
export { UrlSource } from './infrastructure/sources/UrlSource.js';
export type { UrlSourceOptions } from './infrastructure/sources/UrlSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export { createSource } from './infrastructure/sources/createSource.js';
export { CsvParser } from './infrastructure/parsers/CsvParser.js';
export type { CsvParserOptions } from './infrastructure/parsers/CsvParser.js';
export { ParquetParser } from './infrastructure/parsers/ParquetParser.js';
export { createSequelize } from './infrastructure/database/createSequelize.js';
export type { DatabaseConfig } from './infrastructure/database/createSequelize.js';
export { SequelizeDatabase } from './infrastructure/database/SequelizeDatabase.js';
export { SequelizeTableLoader } from './infrastructure/loaders/SequelizeTableLoader.js';
export type { SequelizeTableLoaderOptions } from './infrastructure/loaders/SequelizeTableLoader.js';
export { createLogger } from './infrastructure/logging/logger.js';
export type { Logger, LogLevel, LogThreshold } from './infrastructure/logging/logger.js';
export { attachEventLogger } from './infrastructure/logging/attachEventLogger.js';

// Datasets and configuration
export { DATASETS, DATASET_NAMES, buildDatasets, findDataset } from './datasets/registry.js';
export type { DatasetName, DatasetOverride, DatasetOverrides } from './datasets/registry.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export { createRuntime, createFetcher } from './bootstrap.js';
export type { Runtime } from './bootstrap.js';
