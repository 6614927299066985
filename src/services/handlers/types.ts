import type { Logger } from 'pino';
import type { Category, ResolvedEntities } from '../../types/models.js';
import type { QueryContext } from '../context.js';
import type { GameCenterClient } from '../game-center.js';
import type { ScheduleRepository } from '../schedule.js';

export interface HandlerDeps {
  readonly context: QueryContext;
  readonly schedule: ScheduleRepository;
  readonly gameCenter: GameCenterClient;
  readonly logger: Logger;
}

export interface HandlerRequest {
  readonly question: string;
  readonly entities: ResolvedEntities;
  /** Local calendar day the question was asked on. */
  readonly today: string;
}

/**
 * A specialized handler always answers with text, falling back to a
 * "no data" message rather than an empty result or an exception.
 */
export type Handler = (request: HandlerRequest, deps: HandlerDeps) => Promise<string>;

export type HandledCategory = Exclude<Category, 'GenericQuery'>;
