/**
 * Table store over a Postgres database through Knex, for running against
 * the tables directly instead of through the REST gateway. It honours the
 * same narrow contract as the REST store.
 */

import { knex } from 'knex';
import type { Knex } from 'knex';
import type { Logger } from 'pino';
import { StoreError } from '../../types/errors.js';
import type { Row } from '../../types/utils.js';
import type { StoreQuery, TableStore } from './types.js';

export interface KnexStoreOptions {
  timeoutMs: number;
  logger: Logger;
}

export class KnexTableStore implements TableStore {
  constructor(
    private readonly db: Knex,
    private readonly options: KnexStoreOptions
  ) {}

  /**
   * Connect with node-postgres. The pool opens its first connection on
   * the first query.
   */
  static postgres(connectionString: string, options: KnexStoreOptions): KnexTableStore {
    const db = knex({
      client: 'pg',
      connection: connectionString,
      pool: { min: 0, max: 4 },
    });
    return new KnexTableStore(db, options);
  }

  /**
   * The statement `select` runs for a query.
   */
  build(table: string, query: StoreQuery): Knex.QueryBuilder {
    const builder = this.db(table).select('*');

    for (const filter of query.filters) {
      builder.where(filter.column, filter.value);
    }
    if (query.order) {
      builder.orderBy(query.order.column, query.order.direction);
    }
    if (query.limit !== undefined) {
      builder.limit(query.limit);
    }
    return builder;
  }

  async select(table: string, query: StoreQuery): Promise<Row[]> {
    try {
      const rows: Row[] = await this.build(table, query).timeout(this.options.timeoutMs);
      this.options.logger.debug({ table, filters: query.filters, rows: rows.length }, 'Knex select');
      return rows;
    } catch (error) {
      this.options.logger.warn({ table, err: error }, 'Knex select failed');
      throw new StoreError(table, error instanceof Error ? error.message : String(error), {
        cause: error,
      });
    }
  }

  async close(): Promise<void> {
    await this.db.destroy();
  }
}
