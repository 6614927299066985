/**
 * The table store surface the pipeline depends on: equality filters,
 * optional order and limit, nothing richer.
 */

import type { EqualityFilter } from '../../types/models.js';
import type { OrderSpec, Row } from '../../types/utils.js';

export interface StoreQuery {
  readonly filters: readonly EqualityFilter[];
  readonly order?: OrderSpec;
  readonly limit?: number;
}

export interface TableStore {
  /**
   * @throws StoreError when the request fails or times out
   */
  select(table: string, query: StoreQuery): Promise<Row[]>;

  close(): Promise<void>;
}
