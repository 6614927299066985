import { StoreError } from '../../types/errors.js';
import type { ScheduledGame } from '../../types/models.js';
import { describeDate } from '../../utils/dates.js';
import { MESSAGES } from '../messages.js';
import { isCancelled, isFinished } from '../schedule.js';
import { firstDay } from './days.js';
import { basicSummary, previewSummary, recordSummary } from './render.js';
import type { Handler, HandlerDeps } from './types.js';

/**
 * Full text for one game: the record once it is final, the preview
 * before that, the schedule line when neither is available.
 */
export async function describeGame(game: ScheduledGame, deps: HandlerDeps): Promise<string> {
  const { gameCenter, context, logger } = deps;
  if (isCancelled(game)) {
    return basicSummary(game, context.teams);
  }
  try {
    if (isFinished(game)) {
      const record = await gameCenter.getRecord(game.gameId);
      if (record) return recordSummary(record, game, context.teams);
    } else {
      const preview = await gameCenter.getPreview(game.gameId);
      if (preview) return previewSummary(preview, game, context.teams);
    }
  } catch (error) {
    logger.warn({ gameId: game.gameId, err: error }, 'Game center lookup failed');
  }
  return basicSummary(game, context.teams);
}

export const gameAnalysis: Handler = async ({ entities, today }, deps) => {
  const team = entities.teams[0];
  if (!team) {
    return MESSAGES.noTeamNamed;
  }
  const day = firstDay(entities.date, today);
  const teamName = deps.context.teams.nameOf(team);

  let game: ScheduledGame | null;
  try {
    game = await deps.schedule.teamGameOn(day, team);
  } catch (error) {
    if (!(error instanceof StoreError)) throw error;
    deps.logger.warn({ day, team, err: error }, 'Schedule unavailable');
    game = null;
  }
  if (!game) {
    return `No ${teamName} game on ${describeDate(day)}.`;
  }
  return describeGame(game, deps);
};
