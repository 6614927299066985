import { describe, expect, it } from 'vitest';
import { classify, classifyWithDetail } from '../src/services/classifier.js';
import type { ClassificationRule } from '../src/services/classifier.js';
import { extractEntities } from '../src/services/entities.js';
import { NOW, testContext } from './helpers/fixtures.js';

const context = testContext();

function categoryOf(question: string): string {
  return classify(question, extractEntities(question, context, NOW), context);
}

function detailOf(question: string, rules?: readonly ClassificationRule[]) {
  return classifyWithDetail(question, extractEntities(question, context, NOW), context, rules);
}

describe('classify', () => {
  it('routes detail questions about upcoming games', () => {
    expect(categoryOf('Who is the starting pitcher for Hanwha tomorrow?')).toBe('FutureGameDetail');
    expect(categoryOf('내일 한화 선발투수 누구야?')).toBe('FutureGameDetail');
  });

  it('routes prediction questions', () => {
    expect(categoryOf('Who will win the Hanwha game tomorrow?')).toBe('GamePrediction');
    expect(categoryOf('내일 한화 이길까?')).toBe('GamePrediction');
  });

  it('prefers prediction over schedule when both are asked', () => {
    expect(categoryOf("What's the schedule tomorrow and who will win?")).toBe('GamePrediction');
  });

  it('prefers prediction over detail when both are asked', () => {
    expect(categoryOf('Who is the probable starter and who will win?')).toBe('GamePrediction');
  });

  it('routes results for a day without a team to the daily batch', () => {
    expect(categoryOf("Show me yesterday's results")).toBe('DailyResultsAnalysis');
    expect(categoryOf('어제 경기 결과 알려줘')).toBe('DailyResultsAnalysis');
  });

  it('routes results with a team to the single game', () => {
    expect(categoryOf("How did Hanwha do in yesterday's game?")).toBe('GameAnalysis');
    expect(categoryOf('어제 한화 경기 결과')).toBe('GameAnalysis');
  });

  it('routes schedule questions without a team', () => {
    expect(categoryOf('What games are on today?')).toBe('DailySchedule');
    expect(categoryOf('오늘 경기 일정 알려줘')).toBe('DailySchedule');
  });

  it('falls back to the generic query', () => {
    expect(categoryOf('Who leads Hanwha in batting average?')).toBe('GenericQuery');
    expect(categoryOf('Tell me a joke')).toBe('GenericQuery');
  });
});

describe('classifyWithDetail', () => {
  it('reports the rule and signals', () => {
    const result = detailOf("How did Hanwha do in yesterday's game?");
    expect(result.rule).toBe('single-game');
    expect(result.signals).toEqual({
      hasDate: true,
      hasTeam: true,
      futureDetail: false,
      prediction: false,
      result: true,
      schedule: false,
      gameReference: true,
    });
    expect(result.tableHint).toBeNull();
  });

  it('suggests a table for generic questions above the threshold', () => {
    const result = detailOf('Who leads Hanwha in batting average?');
    expect(result.rule).toBe('fallback');
    expect(result.tableHint?.table).toBe('player_season_stats');
    expect(result.tableHint?.score).toBeCloseTo(0.4009, 3);
  });

  it('gives no hint below the threshold', () => {
    expect(detailOf('Who has the most saves?').tableHint).toBeNull();
    expect(detailOf('Tell me a joke').tableHint).toBeNull();
  });

  it('never turns a similarity match into a specialized category', () => {
    const result = detailOf('Hanwha head to head against LG');
    expect(result.category).toBe('GenericQuery');
    expect(result.tableHint?.table).toBe('game_schedule');
  });

  it('accepts a custom rule list', () => {
    const rules: ClassificationRule[] = [
      { name: 'always-schedule', category: 'DailySchedule', when: () => true },
    ];
    expect(detailOf('Tell me a joke', rules)).toMatchObject({
      category: 'DailySchedule',
      rule: 'always-schedule',
    });
  });
});
