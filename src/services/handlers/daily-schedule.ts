import { StoreError } from '../../types/errors.js';
import type { ScheduledGame } from '../../types/models.js';
import { describeDate } from '../../utils/dates.js';
import { MESSAGES } from '../messages.js';
import { requestedDays } from './days.js';
import { basicSummary } from './render.js';
import type { Handler } from './types.js';

/**
 * Lists every game scheduled on the requested day (or each day of a
 * requested week).
 */
export const dailySchedule: Handler = async ({ entities, today }, { schedule, context, logger }) => {
  const sections: string[] = [];

  for (const day of requestedDays(entities.date, today)) {
    let games: ScheduledGame[];
    try {
      games = await schedule.gamesOn(day);
    } catch (error) {
      if (!(error instanceof StoreError)) throw error;
      logger.warn({ day, err: error }, 'Schedule unavailable');
      continue;
    }
    if (games.length === 0) continue;

    const lines = games.map((game) => `- ${basicSummary(game, context.teams)}`);
    sections.push([`Games on ${describeDate(day)}:`, ...lines].join('\n'));
  }

  return sections.length > 0 ? sections.join('\n\n') : MESSAGES.noGamesScheduled;
};
