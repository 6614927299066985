/**
 * Client for the read-only game-center endpoints: a finished game's
 * record and an upcoming game's preview, both looked up by game id.
 */

import { z } from 'zod';
import type { Logger } from 'pino';

const Num = z.union([z.number(), z.string()]).nullish();
const Text = z.string().nullish();

const GameInfoSchema = z
  .object({
    gdate: z.union([z.number(), z.string()]).nullish(),
    gtime: Text,
    stadium: Text,
    hFullName: Text,
    aFullName: Text,
    hName: Text,
    aName: Text,
    hCode: Text,
    aCode: Text,
    statusCode: Text,
  })
  .partial();

const RhebSchema = z.object({ r: Num, h: Num, e: Num, b: Num }).partial();

const PitcherLineSchema = z
  .object({
    name: z.string(),
    inn: Num,
    hit: Num,
    r: Num,
    er: Num,
    kk: Num,
    bb: Num,
    era: Num,
    wls: Text,
  })
  .partial();

export const RecordDataSchema = z.object({
  gameInfo: GameInfoSchema.default({}),
  scoreBoard: z
    .object({
      rheb: z.object({ home: RhebSchema.default({}), away: RhebSchema.default({}) }).partial(),
      inn: z
        .object({
          home: z.array(z.union([z.number(), z.string()])).default([]),
          away: z.array(z.union([z.number(), z.string()])).default([]),
        })
        .partial(),
    })
    .partial()
    .default({}),
  pitchersBoxscore: z
    .object({
      home: z.array(PitcherLineSchema).default([]),
      away: z.array(PitcherLineSchema).default([]),
    })
    .partial()
    .default({}),
  etcRecords: z.array(z.object({ how: z.string(), result: z.string() })).default([]),
});

const StandingSchema = z
  .object({
    name: Text,
    rank: Num,
    wra: Num,
    w: Num,
    l: Num,
    d: Num,
    hra: Num,
    era: Num,
    hr: Num,
  })
  .partial();

const PlayerInfoSchema = z
  .object({ name: Text, backnum: z.union([z.string(), z.number()]).nullish() })
  .partial();

const StarterSchema = z
  .object({
    playerInfo: PlayerInfoSchema.default({}),
    currentSeasonStats: z.object({ era: Num, w: Num, l: Num }).partial().default({}),
  })
  .partial();

const TopPlayerSchema = z
  .object({
    playerInfo: PlayerInfoSchema.default({}),
    currentSeasonStats: z.object({ hra: Num, hr: Num, rbi: Num }).partial().default({}),
  })
  .partial();

const LineupEntrySchema = z
  .object({
    playerName: z.string(),
    positionName: Text,
    backnum: z.union([z.string(), z.number()]).nullish(),
    batorder: Num,
  })
  .partial();

const LineupSchema = z.object({ fullLineUp: z.array(LineupEntrySchema).default([]) }).partial();

export const PreviewDataSchema = z.object({
  gameInfo: GameInfoSchema.default({}),
  homeStandings: StandingSchema.nullish(),
  awayStandings: StandingSchema.nullish(),
  homeStarter: StarterSchema.nullish(),
  awayStarter: StarterSchema.nullish(),
  homeTopPlayer: TopPlayerSchema.nullish(),
  awayTopPlayer: TopPlayerSchema.nullish(),
  seasonVsResult: z.object({ hw: Num, aw: Num, hd: Num }).partial().nullish(),
  homeTeamLineUp: LineupSchema.nullish(),
  awayTeamLineUp: LineupSchema.nullish(),
});

const RecordResponseSchema = z.object({
  code: z.number(),
  success: z.boolean().optional(),
  result: z.object({ recordData: RecordDataSchema.nullish() }).nullish(),
});

const PreviewResponseSchema = z.object({
  code: z.number(),
  success: z.boolean().optional(),
  result: z.object({ previewData: PreviewDataSchema.nullish() }).nullish(),
});

export type GameRecord = z.infer<typeof RecordDataSchema>;
export type GamePreview = z.infer<typeof PreviewDataSchema>;
export type PitcherLine = z.infer<typeof PitcherLineSchema>;
export type LineupEntry = z.infer<typeof LineupEntrySchema>;

export interface GameCenterClient {
  getRecord(gameId: string): Promise<GameRecord | null>;
  getPreview(gameId: string): Promise<GamePreview | null>;
}

export interface GameCenterOptions {
  baseUrl: string;
  timeoutMs: number;
  logger: Logger;
  fetch?: typeof fetch;
}

/**
 * HTTP client. Every failure (transport, status, envelope, shape) is
 * logged and reported as null.
 */
export class HttpGameCenterClient implements GameCenterClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(options: GameCenterOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger.child({ module: 'game-center' });
    this.fetchImpl = options.fetch ?? fetch;
  }

  private async getJson(gameId: string, resource: 'record' | 'preview'): Promise<unknown> {
    const url = `${this.baseUrl}/${encodeURIComponent(gameId)}/${resource}`;
    try {
      const response = await this.fetchImpl(url, {
        headers: { accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        this.logger.warn({ gameId, status: response.status }, `Game ${resource} request failed`);
        return null;
      }
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      this.logger.warn({ gameId, err: error }, `Game ${resource} request failed`);
      return null;
    }
  }

  async getRecord(gameId: string): Promise<GameRecord | null> {
    const body = await this.getJson(gameId, 'record');
    if (body === null) return null;

    const parsed = RecordResponseSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.warn({ gameId, issues: parsed.error.issues.length }, 'Unexpected game record shape');
      return null;
    }
    if (parsed.data.code !== 200 || !parsed.data.result?.recordData) {
      this.logger.info({ gameId, code: parsed.data.code }, 'No record for game');
      return null;
    }
    return parsed.data.result.recordData;
  }

  async getPreview(gameId: string): Promise<GamePreview | null> {
    const body = await this.getJson(gameId, 'preview');
    if (body === null) return null;

    const parsed = PreviewResponseSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.warn({ gameId, issues: parsed.error.issues.length }, 'Unexpected game preview shape');
      return null;
    }
    if (parsed.data.code !== 200 || parsed.data.success === false || !parsed.data.result?.previewData) {
      this.logger.info({ gameId, code: parsed.data.code }, 'No preview for game');
      return null;
    }
    return parsed.data.result.previewData;
  }
}
