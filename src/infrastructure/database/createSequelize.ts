import pg from 'pg';
import { Sequelize } from 'sequelize';
import type { Options } from 'sequelize';

/** Where the PostgreSQL database lives. `url` wins over the individual parameters. */
export interface DatabaseConfig {
  readonly url?: string;
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly password: string;
  readonly database: string;
  /** Receives every SQL statement Sequelize issues. Default: silent. */
  readonly logging?: (sql: string) => void;
}

/** Create a PostgreSQL-backed Sequelize instance driven by `pg`. Does not connect yet. */
export function createSequelize(config: DatabaseConfig): Sequelize {
  const options: Options = {
    dialect: 'postgres',
    dialectModule: pg,
    logging: config.logging ?? false,
    pool: { max: 4, min: 0, idle: 10_000 },
  };

  if (config.url !== undefined) {
    return new Sequelize(config.url, options);
  }

  return new Sequelize({
    ...options,
    host: config.host,
    port: config.port,
    username: config.user,
    password: config.password,
    database: config.database,
  });
}
