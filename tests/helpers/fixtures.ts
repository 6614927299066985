import pino from 'pino';
import { createContext } from '../../src/services/context.js';
import type { QueryContext } from '../../src/services/context.js';
import type { PipelineSettings } from '../../src/config.js';
import type { Row } from '../../src/types/utils.js';

export const silentLogger = pino({ level: 'silent' });

/** Saturday 2025-09-20, noon in Seoul. */
export const NOW = new Date('2025-09-20T03:00:00Z');
export const TODAY = '2025-09-20';

export function testContext(
  playerNames: readonly string[] = [],
  settings: Partial<PipelineSettings> = {}
): QueryContext {
  return createContext({
    playerNames,
    settings: { currentSeason: 2025, timeZone: 'Asia/Seoul', ...settings },
  });
}

export function gameRow(overrides: Row & { game_id: string }): Row {
  return {
    game_date: TODAY,
    game_date_time: `${TODAY}T18:30:00`,
    stadium: 'Jamsil',
    home_team_code: 'LG',
    home_team_name: 'LG',
    away_team_code: 'HH',
    away_team_name: 'Hanwha',
    home_team_score: null,
    away_team_score: null,
    winner: null,
    status_code: 'BEFORE',
    ...overrides,
  };
}

export function batterRow(
  player_name: string,
  team: string,
  hra: number | null,
  pa: number,
  extra: Row = {}
): Row {
  return {
    player_name,
    team,
    gyear: 2025,
    position: 'IF',
    gamenum: 120,
    pa,
    hra,
    era: null,
    ...extra,
  };
}

export function standingRow(
  team_id: string,
  overrides: Row = {}
): Row {
  return {
    team_id,
    team_name: team_id,
    year: 2025,
    ranking: 5,
    wra: 0.5,
    game_count: 130,
    win_game_count: 64,
    lose_game_count: 64,
    drawn_game_count: 2,
    game_behind: 10,
    offense_hra: 0.26,
    offense_hr: 120,
    offense_ops: 0.72,
    defense_era: 4.3,
    last_five_games: 'WLWLW',
    ...overrides,
  };
}
