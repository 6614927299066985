/**
 * The immutable context passed into every pipeline call.
 *
 * Built once per process (or per test) and never mutated afterwards, so a
 * single instance is safely shared by concurrent questions.
 */

import { defaultPipelineSettings } from '../config.js';
import type { PipelineSettings } from '../config.js';
import type { KeywordCorpus, TableDescriptor } from '../types/models.js';
import { keywordPattern, KeywordSet } from '../utils/text.js';
import { loadCorpora } from './corpus.js';
import type { Corpora } from './corpus.js';
import { SchemaIndex } from './schema-index.js';
import { TeamDirectory } from './teams.js';

export interface KeywordSets {
  readonly futureDetail: KeywordSet;
  readonly prediction: KeywordSet;
  readonly result: KeywordSet;
  readonly schedule: KeywordSet;
  readonly game: KeywordSet;
  readonly qualification: KeywordSet;
  readonly pitcher: KeywordSet;
  readonly batter: KeywordSet;
}

export interface PlayerIndex {
  /** Names longest first. */
  readonly names: readonly string[];
  readonly entries: ReadonlyArray<{ pattern: RegExp; value: string }>;
}

export interface QueryContext {
  readonly tables: ReadonlyMap<string, TableDescriptor>;
  readonly index: SchemaIndex;
  readonly teams: TeamDirectory;
  readonly keywords: KeywordSets;
  readonly players: PlayerIndex;
  readonly settings: Readonly<PipelineSettings>;
}

export interface ContextOptions {
  corpora?: Corpora;
  /** Known player names; team codes and aliases among them are discarded. */
  playerNames?: readonly string[];
  settings?: Partial<PipelineSettings>;
}

function compileKeywords(keywords: KeywordCorpus): KeywordSets {
  return {
    futureDetail: new KeywordSet(keywords.futureDetail),
    prediction: new KeywordSet(keywords.prediction),
    result: new KeywordSet(keywords.result),
    schedule: new KeywordSet(keywords.schedule),
    game: new KeywordSet(keywords.game),
    qualification: new KeywordSet(keywords.qualification),
    pitcher: new KeywordSet(keywords.roles.pitcher),
    batter: new KeywordSet(keywords.roles.batter),
  };
}

function buildPlayerIndex(names: readonly string[], teams: TeamDirectory): PlayerIndex {
  const unique = [...new Set(names.map((name) => name.trim()))]
    .filter((name) => name.length > 1 && !teams.isTeamReference(name))
    .sort((a, b) => b.length - a.length || a.localeCompare(b));

  return {
    names: unique,
    entries: unique.map((name) => ({ pattern: keywordPattern(name), value: name })),
  };
}

export function createContext(options: ContextOptions = {}): QueryContext {
  const corpora = options.corpora ?? loadCorpora();
  const teams = new TeamDirectory(corpora.teams);

  const tables = new Map<string, TableDescriptor>();
  for (const table of corpora.schema.tables) {
    tables.set(table.name.toLowerCase(), table);
  }

  return Object.freeze({
    tables,
    index: new SchemaIndex(corpora.schema.tables, corpora.schema.intents),
    teams,
    keywords: compileKeywords(corpora.keywords),
    players: buildPlayerIndex(options.playerNames ?? [], teams),
    settings: Object.freeze(defaultPipelineSettings(options.settings)),
  });
}

/**
 * A copy of the context with a different player-name index. The original
 * is left untouched.
 */
export function withPlayers(context: QueryContext, playerNames: readonly string[]): QueryContext {
  return Object.freeze({ ...context, players: buildPlayerIndex(playerNames, context.teams) });
}
