import { describe, expect, it } from 'vitest';
import { Dugout, formatRows } from '../src/Dugout.js';
import { MESSAGES } from '../src/services/messages.js';
import type { StoreQuery } from '../src/services/store/types.js';
import type { Row } from '../src/types/utils.js';
import { FakeGameCenter, FakeLanguageModel } from './helpers/fakes.js';
import { batterRow, gameRow, NOW, silentLogger, standingRow, testContext, TODAY } from './helpers/fixtures.js';
import { MemoryTableStore } from './helpers/memory-store.js';

const LEADER_QUESTION = 'Who leads Hanwha in batting average?';
const LEADER_SQL =
  "SELECT player_name, team, hra FROM player_season_stats WHERE team = 'HH' ORDER BY hra DESC LIMIT 1;";

function leagueStore(): MemoryTableStore {
  return new MemoryTableStore({
    player_season_stats: [
      batterRow('Kim A', 'HH', 0.34, 200),
      batterRow('Kim B', 'HH', 0.31, 450),
      batterRow('Kim E', 'HH', 0.33, 380),
      batterRow('Lee', 'LG', 0.35, 500),
      batterRow('Old Timer', 'HH', 0.4, 500, { gyear: 2024 }),
    ],
    game_result: [standingRow('HH', { game_count: 130 })],
    game_schedule: [gameRow({ game_id: 'g1' })],
  });
}

function setup(responses: string[] = [], store = leagueStore()) {
  const llm = new FakeLanguageModel(responses);
  const dugout = new Dugout({
    context: testContext(),
    store,
    llm,
    gameCenter: new FakeGameCenter(),
    logger: silentLogger,
  });
  return { dugout, llm, store };
}

class BrokenStore extends MemoryTableStore {
  async select(_table: string, _query: StoreQuery): Promise<Row[]> {
    throw new TypeError('unexpected shape');
  }
}

describe('Dugout.ask', () => {
  it('answers a generic question with the qualified leader only', async () => {
    const { dugout, llm } = setup([LEADER_SQL]);
    const answer = await dugout.ask(LEADER_QUESTION, { now: NOW });

    expect(answer.kind).toBe('rows');
    if (answer.kind !== 'rows') return;
    expect(answer.rows).toEqual([batterRow('Kim B', 'HH', 0.31, 450)]);
    expect(answer.sql).toBe(LEADER_SQL);

    const prompt = llm.prompts[0];
    expect(prompt).toContain(`Today: ${TODAY}`);
    expect(prompt).toContain('Teams in the question: HH');
    expect(prompt.endsWith(`Question: ${LEADER_QUESTION}`)).toBe(true);
  });

  it('takes the statement out of a fenced reply', async () => {
    const { dugout } = setup([`Here you go:\n\`\`\`sql\n${LEADER_SQL}\n\`\`\``]);
    const answer = await dugout.ask(LEADER_QUESTION, { now: NOW });
    expect(answer.kind === 'rows' && answer.sql).toBe(LEADER_SQL);
  });

  it('rejects malformed SQL without touching the store', async () => {
    const { dugout, store } = setup(['DROP TABLE player_season_stats;']);
    expect(await dugout.ask(LEADER_QUESTION, { now: NOW })).toEqual({
      kind: 'failure',
      category: 'GenericQuery',
      reason: 'compile',
      text: MESSAGES.compileFailure,
    });
    expect(store.calls).toEqual([]);
  });

  it('reports unsupported tables separately', async () => {
    const { dugout, store } = setup(['SELECT player_name FROM salaries;']);
    const answer = await dugout.ask('Who earns the most?', { now: NOW });
    expect(answer).toEqual({
      kind: 'failure',
      category: 'GenericQuery',
      reason: 'unsupportedTable',
      text: MESSAGES.unsupportedTable,
    });
    expect(store.calls).toEqual([]);
  });

  it('turns a model failure into the fixed text', async () => {
    const { dugout } = setup([]);
    expect(await dugout.ask(LEADER_QUESTION, { now: NOW })).toEqual({
      kind: 'failure',
      category: 'GenericQuery',
      reason: 'llm',
      text: MESSAGES.llmFailure,
    });
  });

  it('says no player data when a player filter matches nothing', async () => {
    const { dugout } = setup([
      "SELECT player_name, hra FROM player_season_stats WHERE player_name = 'Park Nobody';",
    ]);
    expect(await dugout.ask('How is Park Nobody hitting?', { now: NOW })).toEqual({
      kind: 'text',
      category: 'GenericQuery',
      text: MESSAGES.noPlayerData,
    });
  });

  it('says no filter data when other filters match nothing', async () => {
    const { dugout } = setup(["SELECT player_name, hra FROM player_season_stats WHERE team = 'WO';"]);
    expect(await dugout.ask('Show Kiwoom hitters', { now: NOW })).toEqual({
      kind: 'text',
      category: 'GenericQuery',
      text: MESSAGES.noFilterData,
    });
  });

  it('routes schedule questions to the handler without calling the model', async () => {
    const { dugout, llm } = setup();
    expect(await dugout.ask('What games are on today?', { now: NOW })).toEqual({
      kind: 'text',
      category: 'DailySchedule',
      text: 'Games on Sat, Sep 20, 2025:\n- Hanwha Eagles vs LG Twins at Jamsil, 18:30 (scheduled)',
    });
    expect(llm.prompts).toEqual([]);
  });

  it('never throws', async () => {
    const { dugout } = setup([], new BrokenStore());
    expect(await dugout.ask('What games are on today?', { now: NOW })).toEqual({
      kind: 'failure',
      category: 'GenericQuery',
      reason: 'internal',
      text: MESSAGES.internalFailure,
    });
  });
});

describe('Dugout.init', () => {
  it('loads the current season player names', async () => {
    const { dugout, store } = setup();
    await dugout.init();

    expect(dugout.queryContext.players.names).toEqual(['Kim A', 'Kim B', 'Kim E', 'Lee']);
    expect(store.calls[0]).toEqual({
      table: 'player_season_stats',
      query: { filters: [{ column: 'gyear', value: 2025 }] },
    });
  });

  it('keeps going without player names when the store fails', async () => {
    const { dugout, store } = setup();
    store.failOn.add('player_season_stats');
    await dugout.init();
    expect(dugout.queryContext.players.names).toEqual([]);
  });
});

describe('Dugout.answer', () => {
  it('phrases rows through the model', async () => {
    const { dugout } = setup([LEADER_SQL]);
    expect(await dugout.answer(LEADER_QUESTION, { now: NOW })).toBe(`1 row(s) for: ${LEADER_QUESTION}`);
  });

  it('lists rows plainly when phrasing fails', async () => {
    const { dugout, llm } = setup([LEADER_SQL]);
    llm.renderFails = true;
    expect(await dugout.answer(LEADER_QUESTION, { now: NOW })).toBe('1. player_name: Kim B, team: HH, hra: 0.31');
  });

  it('passes text answers through', async () => {
    const { dugout } = setup([]);
    expect(await dugout.answer(LEADER_QUESTION, { now: NOW })).toBe(MESSAGES.llmFailure);
  });
});

describe('formatRows', () => {
  it('shows every column when none are named', () => {
    expect(formatRows([{ a: 1, b: null }, { a: 2, b: 'x' }])).toBe('1. a: 1, b: -\n2. a: 2, b: x');
  });
});

describe('Dugout.close', () => {
  it('closes the store', async () => {
    const { dugout, store } = setup();
    await dugout.close();
    expect(store.closed).toBe(true);
  });
});
