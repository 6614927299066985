import { StoreError } from '../../types/errors.js';
import type { ResolvedEntities, ScheduledGame } from '../../types/models.js';
import { describeDate } from '../../utils/dates.js';
import { MESSAGES } from '../messages.js';
import { isCancelled, isFinished } from '../schedule.js';
import { firstDay } from './days.js';
import { basicSummary, previewSummary } from './render.js';
import type { Handler, HandlerDeps } from './types.js';

export const NO_PREVIEW = 'No preview is available yet.';

/**
 * The games a question about an upcoming game points at. A named team
 * without a date means that team's next game within the upcoming window.
 */
export async function targetGames(
  entities: ResolvedEntities,
  today: string,
  deps: HandlerDeps
): Promise<ScheduledGame[]> {
  const team = entities.teams[0];
  if (team) {
    const game =
      entities.date.kind === 'none'
        ? await deps.schedule.nextGame(team, today, deps.context.settings.upcomingWindowDays)
        : await deps.schedule.teamGameOn(firstDay(entities.date, today), team);
    return game ? [game] : [];
  }
  return deps.schedule.gamesOn(firstDay(entities.date, today));
}

async function detail(game: ScheduledGame, deps: HandlerDeps): Promise<string> {
  const { gameCenter, context, logger } = deps;
  if (isFinished(game) || isCancelled(game)) {
    return basicSummary(game, context.teams);
  }
  try {
    const preview = await gameCenter.getPreview(game.gameId);
    if (preview) return previewSummary(preview, game, context.teams);
  } catch (error) {
    logger.warn({ gameId: game.gameId, err: error }, 'Game preview failed');
  }
  return `${basicSummary(game, context.teams)}\n${NO_PREVIEW}`;
}

/**
 * Starters, lineups, venue and start time for upcoming games.
 */
export const futureGameDetail: Handler = async ({ entities, today }, deps) => {
  let games: ScheduledGame[];
  try {
    games = await targetGames(entities, today, deps);
  } catch (error) {
    if (!(error instanceof StoreError)) throw error;
    deps.logger.warn({ err: error }, 'Schedule unavailable');
    games = [];
  }

  if (games.length === 0) {
    const team = entities.teams[0];
    if (team && entities.date.kind === 'none') {
      return `No upcoming ${deps.context.teams.nameOf(team)} game in the next ${deps.context.settings.upcomingWindowDays} days.`;
    }
    if (team) {
      return `No ${deps.context.teams.nameOf(team)} game on ${describeDate(firstDay(entities.date, today))}.`;
    }
    return MESSAGES.noGamesScheduled;
  }

  const parts: string[] = [];
  for (const game of games) {
    parts.push(await detail(game, deps));
  }
  return parts.join('\n\n');
};
