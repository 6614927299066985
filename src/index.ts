/**
 * dugout - natural-language questions about league baseball, answered
 * from a read-only table store.
 */

export { Dugout, formatRows } from './Dugout.js';
export type { DugoutOptions } from './Dugout.js';

export { loadConfig, loadPipelineSettings, defaultPipelineSettings } from './config.js';
export type { Config, LLMSettings, PipelineSettings, StoreSettings } from './config.js';

export { createContext, withPlayers } from './services/context.js';
export type { QueryContext, ContextOptions } from './services/context.js';
export { loadCorpora, DEFAULT_DATA_DIR } from './services/corpus.js';
export type { Corpora } from './services/corpus.js';
export { TeamDirectory } from './services/teams.js';
export { SchemaIndex } from './services/schema-index.js';

export { extractEntities, extractDate, extractPlayers } from './services/entities.js';
export { classify, classifyWithDetail, CLASSIFICATION_RULES } from './services/classifier.js';
export type { Classification, ClassificationRule, ClassifierSignals } from './services/classifier.js';
export { parsePseudoSql } from './services/sql-parser.js';
export { compile, compileQuery, describePlan } from './services/compiler.js';
export { execute, qualifiedThreshold, sortRows } from './services/executor.js';

export {
  HANDLERS,
  dailySchedule,
  dailyResults,
  gameAnalysis,
  futureGameDetail,
  gamePrediction,
  predictGame,
} from './services/handlers/index.js';
export type { Handler, HandlerDeps, HandlerRequest } from './services/handlers/index.js';
export { ScheduleRepository } from './services/schedule.js';
export { HttpGameCenterClient } from './services/game-center.js';
export type { GameCenterClient, GamePreview, GameRecord } from './services/game-center.js';
export { LLMService, extractSql, buildSqlPrompt } from './services/llm.js';
export type { LanguageModelClient } from './services/llm.js';
export { MESSAGES } from './services/messages.js';

export { createStore, KnexTableStore, SupabaseTableStore } from './services/store/index.js';
export type { StoreQuery, TableStore } from './services/store/index.js';

export * from './types/errors.js';
export { CATEGORIES } from './types/models.js';
export type * from './types/models.js';
export type { Row, Literal, OrderSpec, SortDirection } from './types/utils.js';
