import { StoreError } from '../../types/errors.js';
import type { ScheduledGame, TeamStanding } from '../../types/models.js';
import { describeDate, yearOf } from '../../utils/dates.js';
import { MESSAGES } from '../messages.js';
import { isCancelled, isFinished } from '../schedule.js';
import { firstDay } from './days.js';
import { targetGames } from './future-game.js';
import { teamLabel } from './render.js';
import type { Handler, HandlerDeps } from './types.js';

export type Favorite = 'home' | 'away' | 'close';

export interface Prediction {
  favorite: Favorite;
  /** Categories (rank, win rate, OPS, ERA) in which the home team is ahead. */
  homeEdges: number;
}

type Compare = (home: number, away: number) => boolean;

const EDGES: ReadonlyArray<[keyof TeamStanding, Compare]> = [
  ['rank', (home, away) => home < away],
  ['winRate', (home, away) => home > away],
  ['ops', (home, away) => home > away],
  ['era', (home, away) => home < away],
];

function numeric(standing: TeamStanding, key: keyof TeamStanding): number | null {
  const value = standing[key];
  return typeof value === 'number' ? value : null;
}

/**
 * Standings heuristic. A comparison with a missing figure on either side
 * scores for nobody.
 */
export function predictGame(home: TeamStanding, away: TeamStanding): Prediction {
  let homeEdges = 0;
  for (const [key, better] of EDGES) {
    const h = numeric(home, key);
    const a = numeric(away, key);
    if (h !== null && a !== null && better(h, a)) homeEdges++;
  }
  const favorite: Favorite = homeEdges >= 3 ? 'home' : homeEdges <= 1 ? 'away' : 'close';
  return { favorite, homeEdges };
}

/**
 * "WLWDL" -> 2
 */
export function recentWins(lastFive: string): number {
  return [...lastFive.toUpperCase()].filter((c) => c === 'W' || c === '승').length;
}

async function predictOne(
  game: ScheduledGame,
  standingsBySeason: Map<number, Map<string, TeamStanding>>,
  deps: HandlerDeps
): Promise<string> {
  const { context, gameCenter, logger, schedule } = deps;
  const home = teamLabel(context.teams, game.homeCode, game.homeName);
  const away = teamLabel(context.teams, game.awayCode, game.awayName);
  const header = `${away} at ${home} (${describeDate(game.date)})`;

  const season = yearOf(game.date);
  let standings = standingsBySeason.get(season);
  if (!standings) {
    standings = await schedule.standings(season);
    standingsBySeason.set(season, standings);
  }

  const homeStanding = standings.get(game.homeCode);
  const awayStanding = standings.get(game.awayCode);
  if (!homeStanding || !awayStanding) {
    return `${header}: not enough data to predict.`;
  }

  const { favorite, homeEdges } = predictGame(homeStanding, awayStanding);
  const verdict =
    favorite === 'home' ? `${home} are favored` : favorite === 'away' ? `${away} are favored` : 'too close to call';
  const lines = [
    `${header}: ${verdict}. Home edge in ${homeEdges} of 4 categories (rank, win rate, OPS, ERA). ` +
      `Last five: ${away} ${recentWins(awayStanding.lastFive)}W, ${home} ${recentWins(homeStanding.lastFive)}W.`,
  ];

  try {
    const preview = await gameCenter.getPreview(game.gameId);
    const homeStarter = preview?.homeStarter?.playerInfo?.name;
    const awayStarter = preview?.awayStarter?.playerInfo?.name;
    if (homeStarter || awayStarter) {
      lines.push(`Probable starters: ${away} ${awayStarter ?? 'TBD'}, ${home} ${homeStarter ?? 'TBD'}.`);
    }
  } catch (error) {
    logger.warn({ gameId: game.gameId, err: error }, 'Game preview failed');
  }

  return lines.join('\n');
}

/**
 * Who is likely to win an upcoming game, from the current standings.
 */
export const gamePrediction: Handler = async ({ entities, today }, deps) => {
  let games: ScheduledGame[];
  try {
    games = (await targetGames(entities, today, deps)).filter(
      (game) => !isFinished(game) && !isCancelled(game)
    );
  } catch (error) {
    if (!(error instanceof StoreError)) throw error;
    deps.logger.warn({ err: error }, 'Schedule unavailable');
    games = [];
  }

  if (games.length === 0) {
    const team = entities.teams[0];
    return team
      ? `No upcoming ${deps.context.teams.nameOf(team)} game to predict.`
      : entities.date.kind === 'none'
        ? MESSAGES.noGamesScheduled
        : `No upcoming games on ${describeDate(firstDay(entities.date, today))}.`;
  }

  const standingsBySeason = new Map<number, Map<string, TeamStanding>>();
  const parts: string[] = [];
  for (const game of games) {
    try {
      parts.push(await predictOne(game, standingsBySeason, deps));
    } catch (error) {
      if (!(error instanceof StoreError)) throw error;
      deps.logger.warn({ gameId: game.gameId, err: error }, 'Standings unavailable');
      parts.push(`${teamLabel(deps.context.teams, game.awayCode, game.awayName)} at ${teamLabel(deps.context.teams, game.homeCode, game.homeName)}: not enough data to predict.`);
    }
  }
  return parts.join('\n\n');
};
