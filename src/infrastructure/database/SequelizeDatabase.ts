import type { Sequelize } from 'sequelize';
import type { DatabaseReadiness } from '../../domain/ports/TableLoader.js';
import { ConnectionError, errorMessage } from '../../domain/errors.js';

/** Readiness check and lifecycle of a Sequelize connection. */
export class SequelizeDatabase implements DatabaseReadiness {
  constructor(private readonly sequelize: Sequelize) {}

  async ensureReady(): Promise<void> {
    try {
      await this.sequelize.authenticate();
    } catch (error) {
      throw new ConnectionError(`Database is not reachable: ${errorMessage(error)}`, { cause: error });
    }
  }

  async close(): Promise<void> {
    await this.sequelize.close();
  }
}
