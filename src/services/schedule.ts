/**
 * Read access to the schedule and standings tables.
 */

import type { Logger } from 'pino';
import type { GameWinner, ScheduledGame, TeamStanding } from '../types/models.js';
import { toNumber } from '../types/utils.js';
import type { Row } from '../types/utils.js';
import { addDays } from '../utils/dates.js';
import type { TableStore } from './store/types.js';

const SCHEDULE_TABLE = 'game_schedule';
const STANDINGS_TABLE = 'game_result';

function text(value: Row[string] | undefined): string {
  return value === null || value === undefined ? '' : String(value);
}

function winnerOf(value: Row[string] | undefined): GameWinner | null {
  const upper = text(value).toUpperCase();
  return upper === 'HOME' || upper === 'AWAY' || upper === 'DRAW' ? upper : null;
}

export function toScheduledGame(row: Row): ScheduledGame {
  return {
    gameId: text(row.game_id),
    date: text(row.game_date).slice(0, 10),
    startsAt: row.game_date_time === null || row.game_date_time === undefined ? null : text(row.game_date_time),
    stadium: text(row.stadium),
    homeCode: text(row.home_team_code),
    homeName: text(row.home_team_name),
    awayCode: text(row.away_team_code),
    awayName: text(row.away_team_name),
    homeScore: toNumber(row.home_team_score),
    awayScore: toNumber(row.away_team_score),
    winner: winnerOf(row.winner),
    status: text(row.status_code).toUpperCase() || 'BEFORE',
  };
}

export function toStanding(row: Row): TeamStanding {
  return {
    code: text(row.team_id),
    name: text(row.team_name),
    rank: toNumber(row.ranking),
    winRate: toNumber(row.wra),
    wins: toNumber(row.win_game_count),
    losses: toNumber(row.lose_game_count),
    draws: toNumber(row.drawn_game_count),
    games: toNumber(row.game_count),
    ops: toNumber(row.offense_ops),
    era: toNumber(row.defense_era),
    lastFive: text(row.last_five_games),
  };
}

function byStartTime(a: ScheduledGame, b: ScheduledGame): number {
  return (
    a.date.localeCompare(b.date) ||
    (a.startsAt ?? '').localeCompare(b.startsAt ?? '') ||
    a.gameId.localeCompare(b.gameId)
  );
}

export function isFinished(game: ScheduledGame): boolean {
  return game.status === 'RESULT';
}

export function isCancelled(game: ScheduledGame): boolean {
  return game.status === 'CANCEL';
}

/**
 * Every read throws StoreError on transport failure; callers decide how
 * to degrade.
 */
export class ScheduleRepository {
  constructor(
    private readonly store: TableStore,
    private readonly logger: Logger
  ) {}

  async gamesOn(date: string): Promise<ScheduledGame[]> {
    const rows = await this.store.select(SCHEDULE_TABLE, {
      filters: [{ column: 'game_date', value: date }],
    });
    return rows.map(toScheduledGame).sort(byStartTime);
  }

  /**
   * A team's game on a date, looking at home games first, then away
   * games. With a doubleheader the later game wins.
   */
  async teamGameOn(date: string, team: string): Promise<ScheduledGame | null> {
    for (const side of ['home_team_code', 'away_team_code']) {
      const rows = await this.store.select(SCHEDULE_TABLE, {
        filters: [
          { column: 'game_date', value: date },
          { column: side, value: team },
        ],
      });
      const games = rows.map(toScheduledGame).sort(byStartTime);
      if (games.length > 0) {
        return games[games.length - 1];
      }
    }
    this.logger.debug({ date, team }, 'No game for team on date');
    return null;
  }

  /**
   * A team's games between two dates inclusive, in start order.
   */
  async teamGamesBetween(team: string, from: string, to: string): Promise<ScheduledGame[]> {
    const games: ScheduledGame[] = [];
    for (const side of ['home_team_code', 'away_team_code']) {
      const rows = await this.store.select(SCHEDULE_TABLE, {
        filters: [{ column: side, value: team }],
      });
      games.push(...rows.map(toScheduledGame).filter((g) => g.date >= from && g.date <= to));
    }
    return games.sort(byStartTime);
  }

  /**
   * The first game of a team from `from` on that has not finished, within
   * `days` days.
   */
  async nextGame(team: string, from: string, days: number): Promise<ScheduledGame | null> {
    const games = await this.teamGamesBetween(team, from, addDays(from, days - 1));
    return games.find((game) => !isFinished(game) && !isCancelled(game)) ?? null;
  }

  async standings(season: number): Promise<Map<string, TeamStanding>> {
    const rows = await this.store.select(STANDINGS_TABLE, {
      filters: [{ column: 'year', value: season }],
    });
    return new Map(rows.map(toStanding).map((standing) => [standing.code, standing]));
  }
}
