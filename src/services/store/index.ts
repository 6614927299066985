/**
 * Store selection from configuration.
 */

import type { Logger } from 'pino';
import type { StoreSettings } from '../../config.js';
import { KnexTableStore } from './knex.js';
import { SupabaseTableStore } from './supabase.js';
import type { TableStore } from './types.js';

export type { StoreQuery, TableStore } from './types.js';
export { KnexTableStore } from './knex.js';
export { SupabaseTableStore } from './supabase.js';

export function createStore(settings: StoreSettings, logger: Logger): TableStore {
  const storeLogger = logger.child({ module: 'store' });
  switch (settings.type) {
    case 'supabase':
      return new SupabaseTableStore({
        url: settings.url,
        key: settings.key,
        timeoutMs: settings.timeoutMs,
        logger: storeLogger,
      });
    case 'postgres':
      return KnexTableStore.postgres(settings.connectionString, {
        timeoutMs: settings.timeoutMs,
        logger: storeLogger,
      });
  }
}
