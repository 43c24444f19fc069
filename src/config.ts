import { z } from 'zod';
import type { InvalidRowPolicy } from './domain/services/SchemaMapper.js';
import type { DatabaseConfig } from './infrastructure/database/createSequelize.js';
import type { LogThreshold } from './infrastructure/logging/logger.js';
import type { DatasetOverrides } from './datasets/registry.js';
import { ConfigError } from './domain/errors.js';

const TABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

const tableName = z.string().regex(TABLE_NAME, 'must be a plain SQL identifier');
const location = z.string().trim().min(1);

const envSchema = z.object({
  DATABASE_URL: z.string().url().optional(),
  PG_HOST: z.string().default('pgdatabase'),
  PG_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  PG_USER: z.string().default('root'),
  PG_PASS: z.string().default('root'),
  PG_DB: z.string().default('ny_taxi'),
  LOAD_BATCH_SIZE: z.coerce.number().int().positive().default(5000),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  INVALID_ROW_POLICY: z.enum(['reject', 'abort']).default('reject'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  GREEN_TRIPS_URL: location.optional(),
  YELLOW_TRIPS_URL: location.optional(),
  ZONES_URL: location.optional(),
  GREEN_TRIPS_TABLE: tableName.optional(),
  YELLOW_TRIPS_TABLE: tableName.optional(),
  ZONES_TABLE: tableName.optional(),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  readonly database: DatabaseConfig;
  readonly batchSize: number;
  /** `undefined` leaves requests without a timeout. */
  readonly fetchTimeoutMs: number | undefined;
  readonly invalidRowPolicy: InvalidRowPolicy;
  readonly logLevel: LogThreshold;
  readonly datasets: DatasetOverrides;
}

/**
 * Read and validate the configuration from environment variables.
 * Empty variables count as unset.
 *
 * @throws ConfigError listing every invalid variable.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const env = parsed.data;

  return {
    database: {
      url: env.DATABASE_URL,
      host: env.PG_HOST,
      port: env.PG_PORT,
      user: env.PG_USER,
      password: env.PG_PASS,
      database: env.PG_DB,
    },
    batchSize: env.LOAD_BATCH_SIZE,
    fetchTimeoutMs: env.FETCH_TIMEOUT_MS,
    invalidRowPolicy: env.INVALID_ROW_POLICY,
    logLevel: env.LOG_LEVEL,
    datasets: {
      'green-trips': { url: env.GREEN_TRIPS_URL, tableName: env.GREEN_TRIPS_TABLE },
      'yellow-trips': { url: env.YELLOW_TRIPS_URL, tableName: env.YELLOW_TRIPS_TABLE },
      'taxi-zones': { url: env.ZONES_URL, tableName: env.ZONES_TABLE },
    },
  };
}
