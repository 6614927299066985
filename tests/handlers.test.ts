import { beforeEach, describe, expect, it } from 'vitest';
import { PreviewDataSchema, RecordDataSchema } from '../src/services/game-center.js';
import {
  dailyResults,
  dailySchedule,
  futureGameDetail,
  gameAnalysis,
  gamePrediction,
  inningsPitched,
  predictGame,
  recentWins,
  scoringPattern,
} from '../src/services/handlers/index.js';
import type { HandlerDeps, HandlerRequest } from '../src/services/handlers/index.js';
import { MESSAGES } from '../src/services/messages.js';
import { ScheduleRepository, toStanding } from '../src/services/schedule.js';
import type { DateRef } from '../src/types/models.js';
import { describeDate } from '../src/utils/dates.js';
import { FakeGameCenter } from './helpers/fakes.js';
import { gameRow, silentLogger, standingRow, testContext, TODAY } from './helpers/fixtures.js';
import { MemoryTableStore } from './helpers/memory-store.js';

const TOMORROW = '2025-09-21';

const SCHEDULE = [
  gameRow({
    game_id: 'g1',
    game_date_time: `${TODAY}T18:30:00`,
    home_team_code: 'LG',
    away_team_code: 'OB',
    stadium: 'Jamsil',
    home_team_score: 5,
    away_team_score: 3,
    winner: 'HOME',
    status_code: 'RESULT',
  }),
  gameRow({
    game_id: 'g2',
    game_date_time: `${TODAY}T17:00:00`,
    home_team_code: 'KT',
    away_team_code: 'HH',
    stadium: 'Suwon',
    home_team_score: 2,
    away_team_score: 4,
    winner: 'AWAY',
    status_code: 'RESULT',
  }),
  gameRow({
    game_id: 'g3',
    game_date_time: `${TODAY}T18:00:00`,
    home_team_code: 'SS',
    away_team_code: 'NC',
    stadium: 'Daegu',
    status_code: 'CANCEL',
  }),
  gameRow({
    game_id: 'g4',
    game_date: TOMORROW,
    game_date_time: `${TOMORROW}T14:00:00`,
    home_team_code: 'LG',
    away_team_code: 'HH',
    stadium: 'Jamsil',
  }),
];

const G1_RECORD = RecordDataSchema.parse({
  gameInfo: { stadium: 'Jamsil' },
  scoreBoard: {
    rheb: { home: { r: 5 }, away: { r: 3 } },
    inn: { home: [2, 0, 0, 0, 0, 0, 3, 0, '-'], away: [0, 0, 0, 1, 1, 1, 0, 0, 0] },
  },
  pitchersBoxscore: {
    home: [
      { name: 'Lim Starter', inn: '6 1/3' },
      { name: 'Go Closer', inn: '2 2/3' },
    ],
    away: [
      { name: 'Kwak Starter', inn: '5' },
      { name: 'Kim Relief', inn: '3' },
    ],
  },
  etcRecords: [
    { how: '홈런', result: 'Oh Slugger (7th, 3 runs)' },
    { how: '결승타', result: 'Moon Clutch' },
  ],
});

const G4_PREVIEW = PreviewDataSchema.parse({
  gameInfo: { stadium: 'Jamsil' },
  homeStandings: { rank: 1, w: 80, l: 55, wra: 0.593 },
  awayStandings: { rank: 2, w: 78, l: 57, wra: 0.578 },
  homeStarter: { playerInfo: { name: 'Park Ace', backnum: 1 }, currentSeasonStats: { era: 3.03, w: 11, l: 7 } },
  awayStarter: { playerInfo: { name: 'Choi Arm', backnum: 30 }, currentSeasonStats: { era: 1.89, w: 17, l: 1 } },
  seasonVsResult: { hw: 8, aw: 7, hd: 1 },
  awayTeamLineUp: {
    fullLineUp: [
      { playerName: 'Lee Lead', positionName: 'DH', batorder: 1 },
      { playerName: 'Jung Two', positionName: 'LF', batorder: 2 },
    ],
  },
});

const STANDINGS = [
  standingRow('LG', { ranking: 1, wra: 0.593, offense_ops: 0.78, defense_era: 3.9, last_five_games: 'WWLWW' }),
  standingRow('HH', { ranking: 2, wra: 0.578, offense_ops: 0.74, defense_era: 3.5, last_five_games: 'LWLWD' }),
];

let store: MemoryTableStore;
let gameCenter: FakeGameCenter;
let deps: HandlerDeps;

beforeEach(() => {
  store = new MemoryTableStore({ game_schedule: SCHEDULE, game_result: STANDINGS });
  gameCenter = new FakeGameCenter();
  deps = {
    context: testContext(),
    schedule: new ScheduleRepository(store, silentLogger),
    gameCenter,
    logger: silentLogger,
  };
});

function request(date: DateRef, teams: string[] = []): HandlerRequest {
  return { question: 'q', entities: { date, teams, players: [] }, today: TODAY };
}

const onDay = (date: string): DateRef => ({ kind: 'day', date });
const NO_DATE: DateRef = { kind: 'none' };

const G1_BASIC = 'Doosan Bears 3 : 5 LG Twins at Jamsil (final, LG Twins won)';
const G2_BASIC = 'Hanwha Eagles 4 : 2 KT Wiz at Suwon (final, Hanwha Eagles won)';
const G3_BASIC = 'NC Dinos vs Samsung Lions at Daegu (cancelled)';
const G4_BASIC = 'Hanwha Eagles vs LG Twins at Jamsil, 14:00 (scheduled)';

describe('dailySchedule', () => {
  it('lists every game of the day in start order', async () => {
    expect(await dailySchedule(request(NO_DATE), deps)).toBe(
      [`Games on ${describeDate(TODAY)}:`, `- ${G2_BASIC}`, `- ${G3_BASIC}`, `- ${G1_BASIC}`].join('\n')
    );
  });

  it('covers each day of a week', async () => {
    const text = await dailySchedule(request({ kind: 'range', from: '2025-09-15', to: '2025-09-21' }), deps);
    expect(text.split('\n\n')).toEqual([
      [`Games on ${describeDate(TODAY)}:`, `- ${G2_BASIC}`, `- ${G3_BASIC}`, `- ${G1_BASIC}`].join('\n'),
      [`Games on ${describeDate(TOMORROW)}:`, `- ${G4_BASIC}`].join('\n'),
    ]);
    expect(store.callsTo('game_schedule')).toHaveLength(7);
  });

  it('says so when no games are scheduled', async () => {
    expect(await dailySchedule(request(onDay('2025-09-10')), deps)).toBe(MESSAGES.noGamesScheduled);
  });

  it('answers with the no-data text when the schedule is unreachable', async () => {
    store.failOn.add('game_schedule');
    expect(await dailySchedule(request(NO_DATE), deps)).toBe(MESSAGES.noGamesScheduled);
  });
});

describe('dailyResults', () => {
  it('summarizes each game and degrades one failing lookup to the schedule line', async () => {
    gameCenter.records.set('g1', G1_RECORD);
    gameCenter.failing.add('g2');

    const text = await dailyResults(request(onDay(TODAY)), deps);

    expect(text.split('\n\n')).toEqual([
      `Results for ${describeDate(TODAY)}:`,
      G2_BASIC,
      G3_BASIC,
      [
        `Doosan Bears 3 : 5 LG Twins at Jamsil (${describeDate(TODAY)})`,
        'LG Twins won 5-3.',
        'Scoring: Doosan Bears spread their scoring; LG Twins scored early and late.',
        'Starters: Doosan Bears Kwak Starter (5 IP) vs LG Twins Lim Starter (6 1/3 IP).',
        'Home runs: Oh Slugger (7th, 3 runs).',
        'Game-winning hit: Moon Clutch.',
      ].join('\n'),
      'Home teams won 1 and away teams won 1.',
    ]);
    // cancelled games are not looked up
    expect(gameCenter.requested).toEqual(['record:g2', 'record:g1']);
  });

  it('returns the fixed text for a day without games', async () => {
    expect(await dailyResults(request(onDay('2025-09-10')), deps)).toBe(MESSAGES.noGamesPlayed);
  });

  it('covers each day of a range with its own tally', async () => {
    const text = await dailyResults(request({ kind: 'range', from: '2025-09-15', to: '2025-09-21' }), deps);

    expect(text.split('\n\n')).toEqual([
      `Results for ${describeDate(TODAY)}:`,
      G2_BASIC,
      G3_BASIC,
      G1_BASIC,
      'Home teams won 1 and away teams won 1.',
      `Results for ${describeDate(TOMORROW)}:`,
      G4_BASIC,
      'Home teams won 0 and away teams won 0.',
    ]);
    expect(store.callsTo('game_schedule')).toHaveLength(7);
  });

  it('skips days whose schedule is unreachable', async () => {
    store.failOn.add('game_schedule');
    const text = await dailyResults(request({ kind: 'range', from: '2025-09-19', to: '2025-09-20' }), deps);
    expect(text).toBe(MESSAGES.noGamesPlayed);
  });
});

describe('gameAnalysis', () => {
  it('finds the team on either side and summarizes the game', async () => {
    expect(await gameAnalysis(request(onDay(TODAY), ['HH']), deps)).toBe(G2_BASIC);
    // home lookup first, then away
    expect(store.callsTo('game_schedule').map((call) => call.query.filters[1].column)).toEqual([
      'home_team_code',
      'away_team_code',
    ]);
  });

  it('shows the preview for a game not yet played', async () => {
    gameCenter.previews.set('g4', G4_PREVIEW);
    const text = await gameAnalysis(request(onDay(TOMORROW), ['LG']), deps);
    expect(text.split('\n')[0]).toBe(`Hanwha Eagles at LG Twins, Jamsil, ${describeDate(TOMORROW)} 14:00`);
  });

  it('reports a day the team did not play', async () => {
    expect(await gameAnalysis(request(onDay(TODAY), ['WO']), deps)).toBe(
      `No Kiwoom Heroes game on ${describeDate(TODAY)}.`
    );
  });

  it('asks for a team when none is named', async () => {
    expect(await gameAnalysis(request(onDay(TODAY)), deps)).toBe(MESSAGES.noTeamNamed);
  });
});

describe('futureGameDetail', () => {
  it("renders the preview of the team's next game", async () => {
    gameCenter.previews.set('g4', G4_PREVIEW);
    expect(await futureGameDetail(request(NO_DATE, ['HH']), deps)).toBe(
      [
        `Hanwha Eagles at LG Twins, Jamsil, ${describeDate(TOMORROW)} 14:00`,
        'Standings: Hanwha Eagles #2 (78-57, 0.578) vs LG Twins #1 (80-55, 0.593).',
        'Starters: Hanwha Eagles Choi Arm (#30, 17-1, 1.89 ERA) vs LG Twins Park Ace (#1, 11-7, 3.03 ERA).',
        'Season series: Hanwha Eagles 7 wins, LG Twins 8 wins.',
        'Hanwha Eagles lineup: 1. Lee Lead (DH), 2. Jung Two (LF)',
      ].join('\n')
    );
  });

  it('falls back to the schedule line without a preview', async () => {
    expect(await futureGameDetail(request(onDay(TOMORROW)), deps)).toBe(
      `${G4_BASIC}\nNo preview is available yet.`
    );
  });

  it('reports no upcoming game within the window', async () => {
    expect(await futureGameDetail(request(NO_DATE, ['WO']), deps)).toBe(
      'No upcoming Kiwoom Heroes game in the next 7 days.'
    );
  });
});

describe('gamePrediction', () => {
  it('favors the team ahead in most categories', async () => {
    gameCenter.previews.set('g4', G4_PREVIEW);
    expect(await gamePrediction(request(NO_DATE, ['HH']), deps)).toBe(
      `Hanwha Eagles at LG Twins (${describeDate(TOMORROW)}): LG Twins are favored. ` +
        'Home edge in 3 of 4 categories (rank, win rate, OPS, ERA). ' +
        'Last five: Hanwha Eagles 2W, LG Twins 4W.\n' +
        'Probable starters: Hanwha Eagles Choi Arm, LG Twins Park Ace.'
    );
  });

  it('declines to predict without standings', async () => {
    store = new MemoryTableStore({ game_schedule: SCHEDULE, game_result: [] });
    deps = { ...deps, schedule: new ScheduleRepository(store, silentLogger) };
    expect(await gamePrediction(request(onDay(TOMORROW)), deps)).toBe(
      `Hanwha Eagles at LG Twins (${describeDate(TOMORROW)}): not enough data to predict.`
    );
  });

  it('skips games that are already decided', async () => {
    expect(await gamePrediction(request(onDay(TODAY)), deps)).toBe(
      `No upcoming games on ${describeDate(TODAY)}.`
    );
  });
});

describe('predictGame', () => {
  const base = toStanding(standingRow('XX'));

  it('calls a split decision too close', () => {
    const home = { ...base, rank: 3, winRate: 0.55, ops: 0.7, era: 4.5 };
    const away = { ...base, rank: 4, winRate: 0.52, ops: 0.75, era: 4.0 };
    expect(predictGame(home, away)).toEqual({ favorite: 'close', homeEdges: 2 });
  });

  it('scores nothing for missing figures', () => {
    const home = { ...base, rank: null, winRate: null, ops: null, era: 3.0 };
    const away = { ...base, rank: 1, winRate: 0.6, ops: 0.8, era: 4.0 };
    expect(predictGame(home, away)).toEqual({ favorite: 'away', homeEdges: 1 });
  });
});

describe('render helpers', () => {
  it('counts recent wins', () => {
    expect(recentWins('WLWDL')).toBe(2);
    expect(recentWins('승패승승무')).toBe(3);
  });

  it('reads innings pitched with thirds', () => {
    expect(inningsPitched('6 2/3')).toBeCloseTo(6.667, 3);
    expect(inningsPitched('1/3')).toBeCloseTo(0.333, 3);
    expect(inningsPitched(7)).toBe(7);
  });

  it('describes when a team scored', () => {
    expect(scoringPattern([])).toBe('has no inning data');
    expect(scoringPattern([0, 0, 0])).toBe('did not score');
    expect(scoringPattern([0, 0, 0, 0, 2])).toBe('scored only in inning 5');
    expect(scoringPattern([1, 2, 0, 0])).toBe('scored early (innings 1-3)');
    expect(scoringPattern([0, 0, 0, 0, 0, 0, 1, 1])).toBe('scored late (inning 7 on)');
  });
});
