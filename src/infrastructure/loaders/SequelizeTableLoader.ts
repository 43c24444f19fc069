import { ConnectionError as SequelizeConnectionError, QueryTypes } from 'sequelize';
import type { Sequelize, Transaction } from 'sequelize';
import type { TypedTable } from '../../domain/model/TypedTable.js';
import type { BatchInsertedFn, LoadResult, TableLoader } from '../../domain/ports/TableLoader.js';
import { ConnectionError, LoadError, errorMessage } from '../../domain/errors.js';
import { BatchSplitter } from '../../domain/services/BatchSplitter.js';
import { tableAttributes } from './tableAttributes.js';

export interface SequelizeTableLoaderOptions {
  /** Rows per INSERT statement. Default: `5000`. */
  readonly batchSize?: number;
}

/**
 * Replaces a table's contents with a typed table through Sequelize's query interface.
 *
 * Drop, create, inserts and the final count run in one transaction, so a failed load
 * leaves the previous table in place on dialects with transactional DDL (PostgreSQL, SQLite).
 */
export class SequelizeTableLoader implements TableLoader {
  private readonly splitter: BatchSplitter;

  constructor(
    private readonly sequelize: Sequelize,
    options?: SequelizeTableLoaderOptions,
  ) {
    this.splitter = new BatchSplitter(options?.batchSize ?? 5000);
  }

  async load(tableName: string, table: TypedTable, onBatch?: BatchInsertedFn): Promise<LoadResult> {
    const startedAt = Date.now();
    const queryInterface = this.sequelize.getQueryInterface();
    const attributes = tableAttributes(table.columns);
    const totalRows = table.rows.length;

    try {
      return await this.sequelize.transaction(async (transaction) => {
        await queryInterface.dropTable(tableName, { transaction });
        await queryInterface.createTable(tableName, attributes, { transaction });

        let insertedRows = 0;
        let batchCount = 0;

        for (const { items, batchIndex } of this.splitter.split(table.rows)) {
          await queryInterface.bulkInsert(tableName, [...items], { transaction });
          insertedRows += items.length;
          batchCount++;
          onBatch?.({ tableName, batchIndex, rowCount: items.length, insertedRows, totalRows });
        }

        const rowCount = await this.countRows(tableName, transaction);
        if (rowCount !== insertedRows) {
          throw new LoadError(
            tableName,
            `Table '${tableName}' holds ${String(rowCount)} rows after load, expected ${String(insertedRows)}`,
          );
        }

        return { tableName, rowCount, batchCount, elapsedMs: Date.now() - startedAt };
      });
    } catch (error) {
      if (error instanceof LoadError) throw error;
      if (error instanceof SequelizeConnectionError) {
        throw new ConnectionError(`Lost connection while loading '${tableName}': ${errorMessage(error)}`, {
          cause: error,
        });
      }
      throw new LoadError(tableName, `Loading table '${tableName}' failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async countRows(tableName: string, transaction: Transaction): Promise<number> {
    const quoted = this.sequelize.getQueryInterface().quoteIdentifier(tableName);
    const row = await this.sequelize.query<{ count: number | string }>(`SELECT COUNT(*) AS count FROM ${quoted}`, {
      type: QueryTypes.SELECT,
      plain: true,
      transaction,
    });
    return Number(row?.count ?? 0);
  }
}
