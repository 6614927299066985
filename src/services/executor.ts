/**
 * Execution adapter: runs a CompiledPlan against the table store.
 *
 * Server locality hands order and limit to the store. Client locality
 * fetches the filtered candidate set, applies the post-filters, then
 * sorts and slices, so that business filters run before truncation.
 */

import type { Logger } from 'pino';
import type {
  CompiledPlan,
  ExecutionResult,
  PostFilter,
} from '../types/models.js';
import { toNumber } from '../types/utils.js';
import type { JsonPrimitive, OrderSpec, Row } from '../types/utils.js';
import { logger as rootLogger } from '../utils/logger.js';
import type { TableStore } from './store/types.js';

type QualifiedFilter = Extract<PostFilter, { kind: 'qualifiedBatter' }>;

function isMissing(value: JsonPrimitive | undefined): boolean {
  return value === null || value === undefined || value === '';
}

function rowKey(row: Row, keyColumns: readonly string[]): string {
  if (keyColumns.length > 0 && keyColumns.every((column) => column in row)) {
    return JSON.stringify(keyColumns.map((column) => row[column]));
  }
  return JSON.stringify(row);
}

/**
 * Plate appearances required for `games` team games.
 */
export function qualifiedThreshold(multiplier: number, games: number): number {
  // Round away float noise first: 3.1 * 130 is 403.00000000000006.
  return Math.ceil(Number((multiplier * games).toFixed(6)));
}

/**
 * Games played per team for the season, from the standings table, or,
 * when that is empty or unreachable, the most games any candidate row of
 * the team has played.
 */
async function teamGames(
  filter: QualifiedFilter,
  rows: readonly Row[],
  store: TableStore,
  log: Logger
): Promise<Map<string, number>> {
  const games = new Map<string, number>();
  const source = filter.gamesSource;

  try {
    const standings = await store.select(source.table, {
      filters: [{ column: source.seasonColumn, value: filter.season }],
    });
    for (const row of standings) {
      const team = row[source.teamColumn];
      const count = toNumber(row[source.gamesColumn]);
      if (typeof team === 'string' && count !== null && count > 0) {
        games.set(team, count);
      }
    }
  } catch (error) {
    log.warn({ err: error, table: source.table }, 'Team games unavailable, using player rows');
  }

  if (games.size > 0) {
    return games;
  }

  for (const row of rows) {
    const team = row[filter.teamColumn];
    const count = toNumber(row[filter.playerGamesColumn]);
    if (typeof team === 'string' && count !== null) {
      games.set(team, Math.max(games.get(team) ?? 0, count));
    }
  }
  return games;
}

function resolveThreshold(filter: QualifiedFilter, games: ReadonlyMap<string, number>): number {
  const teamGamesPlayed = filter.team !== undefined ? games.get(filter.team) : undefined;
  if (teamGamesPlayed !== undefined) {
    return qualifiedThreshold(filter.multiplier, teamGamesPlayed);
  }
  if (games.size === 0) {
    return 0;
  }
  const average = [...games.values()].reduce((sum, n) => sum + n, 0) / games.size;
  return qualifiedThreshold(filter.multiplier, average);
}

function matchesCompare(
  value: JsonPrimitive | undefined,
  op: Extract<PostFilter, { kind: 'compare' }>['op'],
  expected: JsonPrimitive
): boolean {
  const left = toNumber(value);
  const right = toNumber(expected);
  if (left !== null && right !== null) {
    switch (op) {
      case '>':
        return left > right;
      case '>=':
        return left >= right;
      case '<':
        return left < right;
      case '<=':
        return left <= right;
      case '!=':
        return left !== right;
    }
  }
  return op === '!=' && !isMissing(value) && String(value) !== String(expected);
}

type RowPredicate = (row: Row) => boolean;

async function buildPredicates(
  filters: readonly PostFilter[],
  rows: readonly Row[],
  store: TableStore,
  log: Logger
): Promise<RowPredicate[]> {
  const predicates: RowPredicate[] = [];

  for (const filter of filters) {
    switch (filter.kind) {
      case 'notNull':
        predicates.push((row) => !isMissing(row[filter.column]));
        break;
      case 'isNull':
        predicates.push((row) => isMissing(row[filter.column]));
        break;
      case 'compare':
        predicates.push((row) => matchesCompare(row[filter.column], filter.op, filter.value));
        break;
      case 'qualifiedBatter': {
        const threshold = resolveThreshold(filter, await teamGames(filter, rows, store, log));
        log.debug({ team: filter.team ?? 'league', threshold }, 'Qualified batter threshold');
        predicates.push((row) => (toNumber(row[filter.paColumn]) ?? 0) >= threshold);
        break;
      }
    }
  }

  return predicates;
}

function sortKey(value: JsonPrimitive | undefined): number | string {
  if (isMissing(value)) return 0;
  return toNumber(value) ?? String(value);
}

/**
 * Stable sort with null keys counted as zero. Numbers sort before text.
 */
export function sortRows(rows: readonly Row[], order: OrderSpec): Row[] {
  const sign = order.direction === 'desc' ? -1 : 1;
  return [...rows].sort((a, b) => {
    const left = sortKey(a[order.column]);
    const right = sortKey(b[order.column]);
    if (typeof left === 'number' && typeof right === 'number') {
      return sign * (left - right);
    }
    if (typeof left === 'string' && typeof right === 'string') {
      return sign * left.localeCompare(right);
    }
    return typeof left === 'number' ? -1 : 1;
  });
}

export interface ExecuteOptions {
  logger?: Logger;
}

/**
 * Run the plan. A transport failure yields the `unavailable` marker
 * instead of an exception; an empty row list means no matching rows.
 */
export async function execute(
  plan: CompiledPlan,
  store: TableStore,
  options: ExecuteOptions = {}
): Promise<ExecutionResult> {
  const log = (options.logger ?? rootLogger).child({ module: 'executor' });

  const merged = new Map<string, Row>();
  for (const call of plan.calls) {
    let rows: Row[];
    try {
      rows = await store.select(call.table, call);
    } catch (error) {
      log.warn({ err: error, table: call.table }, 'Store call failed');
      return {
        kind: 'unavailable',
        reason: error instanceof Error ? error.message : String(error),
      };
    }
    for (const row of rows) {
      const key = rowKey(row, plan.keyColumns);
      if (!merged.has(key)) merged.set(key, row);
    }
  }

  let rows = [...merged.values()];
  if (plan.locality === 'server') {
    log.debug({ table: plan.table, rows: rows.length }, 'Executed on server');
    return { kind: 'rows', rows };
  }

  const predicates = await buildPredicates(plan.postFilters, rows, store, log);
  const candidates = rows.length;
  rows = rows.filter((row) => predicates.every((predicate) => predicate(row)));
  if (plan.order) {
    rows = sortRows(rows, plan.order);
  }
  rows = rows.slice(0, plan.limit);

  log.debug(
    { table: plan.table, candidates, kept: rows.length, calls: plan.calls.length },
    'Executed on client'
  );
  return { kind: 'rows', rows };
}
