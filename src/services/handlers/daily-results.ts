import { StoreError } from '../../types/errors.js';
import type { ScheduledGame } from '../../types/models.js';
import { describeDate } from '../../utils/dates.js';
import { MESSAGES } from '../messages.js';
import { isFinished } from '../schedule.js';
import { requestedDays } from './days.js';
import { basicSummary, recordSummary, winnerSide } from './render.js';
import type { Handler, HandlerDeps } from './types.js';

async function summarize(game: ScheduledGame, deps: HandlerDeps): Promise<string> {
  const { gameCenter, context, logger } = deps;
  if (!isFinished(game)) {
    return basicSummary(game, context.teams);
  }
  try {
    const record = await gameCenter.getRecord(game.gameId);
    if (record) {
      return recordSummary(record, game, context.teams);
    }
  } catch (error) {
    logger.warn({ gameId: game.gameId, err: error }, 'Game record failed, using schedule summary');
  }
  return basicSummary(game, context.teams);
}

export function tally(games: readonly ScheduledGame[]): string {
  let home = 0;
  let away = 0;
  let draws = 0;
  for (const game of games) {
    if (!isFinished(game)) continue;
    const side = winnerSide(game);
    if (side === 'HOME') home++;
    else if (side === 'AWAY') away++;
    else if (side === 'DRAW') draws++;
  }
  const base = `Home teams won ${home} and away teams won ${away}`;
  return draws > 0 ? `${base}, with ${draws} tied.` : `${base}.`;
}

/**
 * Summarizes every game of the requested day, or of each day of a
 * requested range, with a tally per day. Each game is summarized on its
 * own; one failing record lookup only degrades that game's entry.
 */
export const dailyResults: Handler = async ({ entities, today }, deps) => {
  const sections: string[] = [];

  for (const day of requestedDays(entities.date, today)) {
    let games: ScheduledGame[];
    try {
      games = await deps.schedule.gamesOn(day);
    } catch (error) {
      if (!(error instanceof StoreError)) throw error;
      deps.logger.warn({ day, err: error }, 'Schedule unavailable');
      continue;
    }
    if (games.length === 0) continue;

    const summaries: string[] = [];
    for (const game of games) {
      summaries.push(await summarize(game, deps));
    }
    sections.push([`Results for ${describeDate(day)}:`, ...summaries, tally(games)].join('\n\n'));
  }

  return sections.length > 0 ? sections.join('\n\n') : MESSAGES.noGamesPlayed;
};
