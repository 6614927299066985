/**
 * Query compiler: turns a ParsedQuery into the remote calls and
 * in-process filters that answer it against the REST-only store.
 */

import { CompileError, UnsupportedTableError } from '../types/errors.js';
import type {
  ColumnDescriptor,
  CompileResult,
  CompiledPlan,
  EqualityFilter,
  ParsedQuery,
  PostFilter,
  RemoteCall,
  Role,
  TableDescriptor,
} from '../types/models.js';
import type { Literal, OrderSpec } from '../types/utils.js';
import type { QueryContext } from './context.js';
import { parsePseudoSql } from './sql-parser.js';

interface Equality {
  column: string;
  values: Literal[];
}

/**
 * Maps the names a statement uses (real names, synonyms, any case) onto
 * the table's columns.
 */
class ColumnResolver {
  private readonly names = new Map<string, ColumnDescriptor>();

  constructor(private readonly table: TableDescriptor) {
    for (const column of table.columns) {
      this.names.set(column.name.toLowerCase(), column);
    }
    for (const column of table.columns) {
      for (const synonym of column.synonyms) {
        const key = synonym.toLowerCase();
        if (!this.names.has(key)) this.names.set(key, column);
      }
    }
  }

  resolve(name: string): ColumnDescriptor {
    const column = this.names.get(name.toLowerCase());
    if (!column) {
      throw new CompileError(`unknown column on ${this.table.name}`, name);
    }
    return column;
  }
}

function toNumeric(value: Literal): Literal {
  if (typeof value === 'string' && /^-?\d+(?:\.\d+)?$/.test(value.trim())) {
    return Number(value);
  }
  return value;
}

/**
 * Canonicalize the values of an equality on one column. Team columns get
 * canonical codes; player columns lose anything that names a team.
 */
function normalizeValues(
  column: ColumnDescriptor,
  values: readonly Literal[],
  context: QueryContext
): Literal[] {
  let normalized: Literal[];
  switch (column.type) {
    case 'team':
      normalized = values.map((value) =>
        typeof value === 'string' ? context.teams.resolve(value) ?? value : value
      );
      break;
    case 'player':
      normalized = values.filter(
        (value) => typeof value !== 'string' || !context.teams.isTeamReference(value)
      );
      break;
    case 'season':
    case 'integer':
    case 'rate':
      normalized = values.map(toNumeric);
      break;
    default:
      normalized = [...values];
  }
  return [...new Set(normalized)];
}

export interface RoleScores {
  readonly pitcher: number;
  readonly batter: number;
}

/**
 * Score pitcher against batter evidence. A sort key weighs most, then a
 * projected column, then a column filtered on or a role word in the
 * question. Equal scores mean both roles.
 */
export function scoreRoles(
  table: TableDescriptor,
  projected: readonly string[],
  order: OrderSpec | undefined,
  filtered: readonly string[],
  question: string,
  context: QueryContext
): RoleScores {
  if (!table.roles) {
    return { pitcher: 0, batter: 0 };
  }
  const { orderBy, select, mention } = context.settings.roleWeights;
  const pitcherColumns = new Set(table.roles.pitcher.columns);
  const batterColumns = new Set(table.roles.batter.columns);
  let pitcher = 0;
  let batter = 0;

  const add = (column: string, weight: number): void => {
    if (pitcherColumns.has(column)) pitcher += weight;
    else if (batterColumns.has(column)) batter += weight;
  };

  for (const column of projected) add(column, select);
  if (order) add(order.column, orderBy);
  for (const column of filtered) add(column, mention);

  pitcher += mention * context.keywords.pitcher.found(question).length;
  batter += mention * context.keywords.batter.found(question).length;

  return { pitcher, batter };
}

export function roleFromScores(scores: RoleScores): Role {
  if (scores.pitcher > scores.batter) return 'pitcher';
  if (scores.batter > scores.pitcher) return 'batter';
  return 'both';
}

function cartesian(equalities: readonly Equality[]): EqualityFilter[][] {
  let combos: EqualityFilter[][] = [[]];
  for (const { column, values } of equalities) {
    combos = combos.flatMap((combo) => values.map((value) => [...combo, { column, value }]));
  }
  return combos;
}

function pushUnique(filters: PostFilter[], filter: PostFilter): void {
  const key = JSON.stringify(filter);
  if (!filters.some((existing) => JSON.stringify(existing) === key)) {
    filters.push(filter);
  }
}

function buildPlan(query: ParsedQuery, question: string, context: QueryContext): CompiledPlan {
  const table = context.tables.get(query.table.toLowerCase());
  if (!table) {
    throw new UnsupportedTableError(query.table);
  }
  const { settings } = context;
  const columns = new ColumnResolver(table);

  const projected = query.columns.map((name) => columns.resolve(name));
  const order: OrderSpec | undefined = query.order
    ? { column: columns.resolve(query.order.column).name, direction: query.order.direction }
    : undefined;

  const equalities: Equality[] = [];
  const postFilters: PostFilter[] = [];
  const filtered: string[] = [];

  for (const predicate of query.predicates) {
    const column = columns.resolve(predicate.column);
    filtered.push(column.name);

    switch (predicate.kind) {
      case 'eq': {
        const values = normalizeValues(column, predicate.values, context);
        if (values.length === 0) break;
        const existing = equalities.find((e) => e.column === column.name);
        if (existing) {
          existing.values = existing.values.filter((value) => values.includes(value));
        } else {
          equalities.push({ column: column.name, values });
        }
        break;
      }
      case 'compare':
        postFilters.push({
          kind: 'compare',
          column: column.name,
          op: predicate.op,
          value: column.type === 'team' && typeof predicate.value === 'string'
            ? context.teams.resolve(predicate.value) ?? predicate.value
            : toNumeric(predicate.value),
        });
        break;
      case 'null':
        postFilters.push({ kind: predicate.negated ? 'notNull' : 'isNull', column: column.name });
        break;
    }
  }

  if (table.seasonColumn && !equalities.some((e) => e.column === table.seasonColumn)) {
    equalities.push({ column: table.seasonColumn, values: [settings.currentSeason] });
  }

  const role = roleFromScores(
    scoreRoles(table, projected.map((c) => c.name), order, filtered, question, context)
  );
  if (table.roles && role !== 'both') {
    pushUnique(postFilters, { kind: 'notNull', column: table.roles[role].requiredColumn });
  }

  const orderColumn = order ? columns.resolve(order.column) : undefined;
  const rateColumns = [...projected, ...(orderColumn ? [orderColumn] : [])].filter(
    (column) => column.qualifiedRate
  );
  for (const column of rateColumns) {
    pushUnique(postFilters, { kind: 'notNull', column: column.name });
  }

  const wantsQualified =
    orderColumn?.qualifiedRate === true ||
    (rateColumns.length > 0 && context.keywords.qualification.matches(question));
  if (table.qualification && wantsQualified && role !== 'pitcher') {
    const { paColumn, teamColumn, playerGamesColumn, gamesSource } = table.qualification;
    const teamValues = equalities.find((e) => e.column === teamColumn)?.values ?? [];
    const seasonValues = table.seasonColumn
      ? equalities.find((e) => e.column === table.seasonColumn)?.values ?? []
      : [];
    const season = seasonValues.length === 1 && typeof seasonValues[0] === 'number'
      ? seasonValues[0]
      : settings.currentSeason;

    pushUnique(postFilters, {
      kind: 'qualifiedBatter',
      paColumn,
      teamColumn,
      playerGamesColumn,
      gamesSource,
      team: teamValues.length === 1 && typeof teamValues[0] === 'string' ? teamValues[0] : undefined,
      season,
      multiplier: settings.qualifiedMultiplier,
    });
  }

  const fanOut = equalities.reduce((total, e) => total * e.values.length, 1);
  if (fanOut > settings.maxFanOut) {
    throw new CompileError(
      `IN lists expand to ${fanOut} store calls; at most ${settings.maxFanOut} are allowed`
    );
  }

  const limit = Math.min(query.limit ?? settings.defaultLimit, settings.maxLimit);
  const combos = fanOut === 0 ? [] : cartesian(equalities);
  const locality = postFilters.length > 0 || combos.length !== 1 ? 'client' : 'server';

  const calls: RemoteCall[] = combos.map((filters) =>
    locality === 'server'
      ? { table: table.name, filters, order, limit }
      : { table: table.name, filters }
  );

  return {
    table: table.name,
    columns: projected.map((c) => c.name),
    calls,
    postFilters,
    order,
    limit,
    locality,
    role,
    keyColumns: table.key,
  };
}

/**
 * Compile an already parsed statement.
 */
export function compileQuery(
  query: ParsedQuery,
  question: string,
  context: QueryContext
): CompileResult {
  try {
    return { ok: true, plan: buildPlan(query, question, context) };
  } catch (error) {
    if (error instanceof CompileError || error instanceof UnsupportedTableError) {
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * Parse and compile pseudo-SQL. Fails without touching the store when
 * the text is not a single supported SELECT or names an unknown table.
 */
export function compile(pseudoSql: string, question: string, context: QueryContext): CompileResult {
  const parsed = parsePseudoSql(pseudoSql);
  if (!parsed.ok) {
    return parsed;
  }
  return compileQuery(parsed.query, question, context);
}

function describeFilter(filter: PostFilter): string {
  switch (filter.kind) {
    case 'notNull':
      return `${filter.column} IS NOT NULL`;
    case 'isNull':
      return `${filter.column} IS NULL`;
    case 'compare':
      return `${filter.column} ${filter.op} ${JSON.stringify(filter.value)}`;
    case 'qualifiedBatter':
      return `${filter.paColumn} >= ceil(${filter.multiplier} x games of ${filter.team ?? 'league average'}, ${filter.season})`;
  }
}

/**
 * Human-readable summary of a plan for diagnostics.
 */
export function describePlan(plan: CompiledPlan): string[] {
  const lines = [`table: ${plan.table}`, `role: ${plan.role}`, `locality: ${plan.locality}`];
  plan.calls.forEach((call, i) => {
    const filters = call.filters.map((f) => `${f.column}=${JSON.stringify(f.value)}`).join(', ');
    const tail = call.order ? ` order ${call.order.column} ${call.order.direction} limit ${call.limit}` : '';
    lines.push(`call ${i + 1}: ${filters || '(no filters)'}${tail}`);
  });
  for (const filter of plan.postFilters) {
    lines.push(`post-filter: ${describeFilter(filter)}`);
  }
  if (plan.locality === 'client') {
    const sort = plan.order ? `${plan.order.column} ${plan.order.direction}, ` : '';
    lines.push(`client: ${sort}limit ${plan.limit}`);
  }
  return lines;
}
