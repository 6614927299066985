/**
 * Request classification.
 *
 * Categories are assigned by an ordered list of (predicate, category)
 * rules over keyword signals; the first rule that holds wins. Detail and
 * prediction intents share vocabulary with schedule and result questions,
 * so they are tested first. Whether a team is named separates batch
 * (every game that day) from single-game intents.
 */

import type { Category, ResolvedEntities } from '../types/models.js';
import type { QueryContext } from './context.js';

export interface ClassifierSignals {
  readonly hasDate: boolean;
  readonly hasTeam: boolean;
  readonly futureDetail: boolean;
  readonly prediction: boolean;
  readonly result: boolean;
  readonly schedule: boolean;
  /** A game word or a result word. */
  readonly gameReference: boolean;
}

export interface ClassificationRule {
  readonly name: string;
  readonly category: Category;
  readonly when: (signals: ClassifierSignals) => boolean;
}

export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    name: 'future-game-detail',
    category: 'FutureGameDetail',
    when: (s) => s.futureDetail && !s.prediction,
  },
  {
    name: 'prediction',
    category: 'GamePrediction',
    when: (s) => s.prediction,
  },
  {
    name: 'daily-results',
    category: 'DailyResultsAnalysis',
    when: (s) => s.hasDate && s.result && !s.hasTeam,
  },
  {
    name: 'daily-schedule',
    category: 'DailySchedule',
    when: (s) => s.schedule && !s.hasTeam,
  },
  {
    name: 'single-game',
    category: 'GameAnalysis',
    when: (s) => s.hasDate && s.gameReference && s.hasTeam,
  },
];

export interface Classification {
  readonly category: Category;
  /** Name of the rule that fired, or "fallback". */
  readonly rule: string;
  readonly signals: ClassifierSignals;
  /** Table suggested for generic questions by similarity search. */
  readonly tableHint: { table: string; score: number } | null;
}

export function collectSignals(
  question: string,
  entities: ResolvedEntities,
  context: QueryContext
): ClassifierSignals {
  const { keywords } = context;
  const result = keywords.result.matches(question);
  return {
    hasDate: entities.date.kind !== 'none',
    hasTeam: entities.teams.length > 0,
    futureDetail: keywords.futureDetail.matches(question),
    prediction: keywords.prediction.matches(question),
    result,
    schedule: keywords.schedule.matches(question),
    gameReference: result || keywords.game.matches(question),
  };
}

export function classifyWithDetail(
  question: string,
  entities: ResolvedEntities,
  context: QueryContext,
  rules: readonly ClassificationRule[] = CLASSIFICATION_RULES
): Classification {
  const signals = collectSignals(question, entities, context);

  for (const rule of rules) {
    if (rule.when(signals)) {
      return { category: rule.category, rule: rule.name, signals, tableHint: null };
    }
  }

  return {
    category: 'GenericQuery',
    rule: 'fallback',
    signals,
    tableHint: context.index.tableHint(question, context.settings.tableHintThreshold),
  };
}

export function classify(
  question: string,
  entities: ResolvedEntities,
  context: QueryContext
): Category {
  return classifyWithDetail(question, entities, context).category;
}
