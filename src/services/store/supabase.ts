/**
 * Table store backed by Supabase's PostgREST API.
 */

import { createClient } from '@supabase/supabase-js';
import type { SupabaseClient } from '@supabase/supabase-js';
import type { Logger } from 'pino';
import { StoreError } from '../../types/errors.js';
import type { Row } from '../../types/utils.js';
import type { StoreQuery, TableStore } from './types.js';

export interface SupabaseStoreOptions {
  url: string;
  key: string;
  timeoutMs: number;
  logger: Logger;
}

export class SupabaseTableStore implements TableStore {
  private readonly client: SupabaseClient;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: SupabaseStoreOptions, client?: SupabaseClient) {
    this.client =
      client ??
      createClient(options.url, options.key, {
        auth: { persistSession: false, autoRefreshToken: false },
      });
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
  }

  async select(table: string, query: StoreQuery): Promise<Row[]> {
    let request = this.client.from(table).select('*');

    for (const filter of query.filters) {
      request = request.eq(filter.column, filter.value);
    }
    if (query.order) {
      request = request.order(query.order.column, {
        ascending: query.order.direction === 'asc',
        nullsFirst: false,
      });
    }
    if (query.limit !== undefined) {
      request = request.limit(query.limit);
    }

    const started = Date.now();
    const { data, error } = await request.abortSignal(AbortSignal.timeout(this.timeoutMs));

    if (error) {
      this.logger.warn({ table, code: error.code, err: error.message }, 'Supabase select failed');
      throw new StoreError(table, error.message, { cause: error });
    }

    const rows: Row[] = data ?? [];
    this.logger.debug(
      { table, filters: query.filters, rows: rows.length, ms: Date.now() - started },
      'Supabase select'
    );
    return rows;
  }

  async close(): Promise<void> {
    await this.client.removeAllChannels();
  }
}
