/**
 * Main Dugout class - answers natural-language baseball questions.
 */

import type { Config } from './config.js';
import { createContext, withPlayers } from './services/context.js';
import type { QueryContext } from './services/context.js';
import type { Corpora } from './services/corpus.js';
import { classifyWithDetail } from './services/classifier.js';
import type { Classification } from './services/classifier.js';
import { compile, describePlan } from './services/compiler.js';
import { extractEntities } from './services/entities.js';
import { execute } from './services/executor.js';
import { HttpGameCenterClient } from './services/game-center.js';
import type { GameCenterClient } from './services/game-center.js';
import { HANDLERS } from './services/handlers/index.js';
import { buildSqlPrompt, extractSql, LLMService } from './services/llm.js';
import type { LanguageModelClient } from './services/llm.js';
import { MESSAGES } from './services/messages.js';
import { ScheduleRepository } from './services/schedule.js';
import { createStore } from './services/store/index.js';
import type { TableStore } from './services/store/index.js';
import { UnsupportedTableError } from './types/errors.js';
import type { Answer, AskOptions, CompiledPlan, ResolvedEntities } from './types/models.js';
import type { Row } from './types/utils.js';
import { localDate } from './utils/dates.js';
import { createLogger } from './utils/logger.js';
import type { Logger } from './utils/logger.js';

export interface DugoutOptions {
  context: QueryContext;
  store: TableStore;
  llm: LanguageModelClient;
  gameCenter: GameCenterClient;
  logger: Logger;
}

/**
 * Plain listing used when the model cannot phrase an answer.
 */
export function formatRows(rows: readonly Row[], columns?: readonly string[]): string {
  return rows
    .map((row, i) => {
      const keys = columns && columns.length > 0 ? columns : Object.keys(row);
      const cells = keys.map((key) => `${key}: ${row[key] ?? '-'}`);
      return `${i + 1}. ${cells.join(', ')}`;
    })
    .join('\n');
}

/**
 * dugout - questions in, answers out
 *
 * @example
 * ```typescript
 * const dugout = Dugout.fromConfig(loadConfig());
 * await dugout.init();
 *
 * const answer = await dugout.ask('Who leads Hanwha in batting average?');
 * if (answer.kind === 'rows') console.log(answer.rows);
 * ```
 *
 * Every call is independent; the instance holds no per-question state.
 */
export class Dugout {
  private context: QueryContext;
  private readonly store: TableStore;
  private readonly llm: LanguageModelClient;
  private readonly schedule: ScheduleRepository;
  private readonly gameCenter: GameCenterClient;
  private readonly logger: Logger;
  private readonly handlerLogger: Logger;
  private readonly compilerLogger: Logger;
  private readonly rootLogger: Logger;

  constructor(options: DugoutOptions) {
    this.context = options.context;
    this.store = options.store;
    this.llm = options.llm;
    this.gameCenter = options.gameCenter;
    this.logger = options.logger.child({ module: 'dugout' });
    this.handlerLogger = options.logger.child({ module: 'handlers' });
    this.compilerLogger = options.logger.child({ module: 'compiler' });
    this.rootLogger = options.logger;
    this.schedule = new ScheduleRepository(options.store, options.logger.child({ module: 'schedule' }));
  }

  /**
   * Wire the production collaborators from configuration.
   */
  static fromConfig(config: Config, options: { corpora?: Corpora; logger?: Logger } = {}): Dugout {
    const logger = options.logger ?? createLogger(config.logLevel);
    return new Dugout({
      context: createContext({ corpora: options.corpora, settings: config.pipeline }),
      store: createStore(config.store, logger),
      llm: new LLMService(config.llm, { logger }),
      gameCenter: new HttpGameCenterClient({ ...config.gameCenter, logger }),
      logger,
    });
  }

  get queryContext(): QueryContext {
    return this.context;
  }

  /**
   * Load known player names for the current season so that questions can
   * mention players by name. Without them, player names are left to the
   * model.
   */
  async init(): Promise<void> {
    const table = [...this.context.tables.values()].find((t) =>
      t.columns.some((column) => column.type === 'player')
    );
    const playerColumn = table?.columns.find((column) => column.type === 'player');
    if (!table || !playerColumn) return;

    const filters = table.seasonColumn
      ? [{ column: table.seasonColumn, value: this.context.settings.currentSeason }]
      : [];
    try {
      const rows = await this.store.select(table.name, { filters });
      const names = rows
        .map((row) => row[playerColumn.name])
        .filter((name): name is string => typeof name === 'string');
      this.context = withPlayers(this.context, names);
      this.logger.info({ players: this.context.players.names.length }, 'Player names loaded');
    } catch (error) {
      this.logger.warn({ err: error }, 'Could not load player names');
    }
  }

  /**
   * Answer a question. Never throws: every failure comes back as a
   * `failure` answer carrying a fixed user-facing text.
   */
  async ask(question: string, options: AskOptions = {}): Promise<Answer> {
    const now = options.now ?? new Date();
    const context = this.context;

    try {
      const entities = extractEntities(question, context, now);
      const today = localDate(now, context.settings.timeZone);
      const classification = classifyWithDetail(question, entities, context);
      const { category } = classification;

      this.logger.debug({ category, rule: classification.rule, entities }, 'Question classified');

      if (category !== 'GenericQuery') {
        const text = await HANDLERS[category](
          { question, entities, today },
          { context, schedule: this.schedule, gameCenter: this.gameCenter, logger: this.handlerLogger }
        );
        return { kind: 'text', category, text };
      }

      return await this.answerGeneric(question, entities, today, classification, context);
    } catch (error) {
      this.logger.error({ err: error, question }, 'Question failed');
      return {
        kind: 'failure',
        category: 'GenericQuery',
        reason: 'internal',
        text: MESSAGES.internalFailure,
      };
    }
  }

  /**
   * Answer as display text. Rows are phrased by the model, or listed
   * plainly when that fails.
   */
  async answer(question: string, options: AskOptions = {}): Promise<string> {
    const result = await this.ask(question, options);
    if (result.kind !== 'rows') {
      return result.text;
    }
    try {
      return await this.llm.renderAnswer(question, result.rows);
    } catch (error) {
      this.logger.warn({ err: error }, 'Answer rendering failed, listing rows');
      return formatRows(result.rows, result.plan.columns);
    }
  }

  async close(): Promise<void> {
    await this.store.close();
  }

  private async answerGeneric(
    question: string,
    entities: ResolvedEntities,
    today: string,
    classification: Classification,
    context: QueryContext
  ): Promise<Answer> {
    const prompt = buildSqlPrompt({ question, entities, today, tableHint: classification.tableHint }, context);

    let sql: string;
    try {
      sql = extractSql(await this.llm.generateSql(prompt));
    } catch (error) {
      this.logger.error({ err: error }, 'SQL generation failed');
      return { kind: 'failure', category: 'GenericQuery', reason: 'llm', text: MESSAGES.llmFailure };
    }
    this.logger.debug({ sql }, 'Generated SQL');

    const compiled = compile(sql, question, context);
    if (!compiled.ok) {
      const unsupported = compiled.error instanceof UnsupportedTableError;
      this.compilerLogger.warn({ err: compiled.error, sql }, 'SQL rejected');
      return {
        kind: 'failure',
        category: 'GenericQuery',
        reason: unsupported ? 'unsupportedTable' : 'compile',
        text: unsupported ? MESSAGES.unsupportedTable : MESSAGES.compileFailure,
      };
    }

    const { plan } = compiled;
    this.compilerLogger.debug({ plan: describePlan(plan) }, 'Compiled plan');
    const result = await execute(plan, this.store, { logger: this.rootLogger });
    if (result.kind === 'unavailable' || result.rows.length === 0) {
      const text =
        entities.players.length > 0 || this.filtersOnPlayer(plan, context)
          ? MESSAGES.noPlayerData
          : MESSAGES.noFilterData;
      return { kind: 'text', category: 'GenericQuery', text };
    }

    return { kind: 'rows', category: 'GenericQuery', rows: result.rows, sql, plan };
  }

  private filtersOnPlayer(plan: CompiledPlan, context: QueryContext): boolean {
    const table = context.tables.get(plan.table.toLowerCase());
    const playerColumns = new Set(
      (table?.columns ?? []).filter((column) => column.type === 'player').map((column) => column.name)
    );
    return plan.calls.some((call) => call.filters.some((filter) => playerColumns.has(filter.column)));
  }
}
