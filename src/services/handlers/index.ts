import { dailyResults } from './daily-results.js';
import { dailySchedule } from './daily-schedule.js';
import { futureGameDetail } from './future-game.js';
import { gameAnalysis } from './game-analysis.js';
import { gamePrediction } from './prediction.js';
import type { HandledCategory, Handler } from './types.js';

export const HANDLERS: Readonly<Record<HandledCategory, Handler>> = {
  DailySchedule: dailySchedule,
  DailyResultsAnalysis: dailyResults,
  GamePrediction: gamePrediction,
  FutureGameDetail: futureGameDetail,
  GameAnalysis: gameAnalysis,
};

export { dailySchedule, dailyResults, futureGameDetail, gameAnalysis, gamePrediction };
export { predictGame, recentWins } from './prediction.js';
export { tally } from './daily-results.js';
export { describeGame } from './game-analysis.js';
export { requestedDays } from './days.js';
export * from './render.js';
export type { Handler, HandlerDeps, HandlerRequest, HandledCategory } from './types.js';
