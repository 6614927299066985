/**
 * Configuration management using Zod for validation.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { existsSync } from 'fs';
import { ConfigError } from './types/errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
export const rootDir = join(__dirname, '..');

const envPath = join(rootDir, '.env');
if (existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

const DEFAULT_MODELS = {
  anthropic: 'claude-sonnet-4-5-20250929',
  openai: 'gpt-4o',
} as const;

/**
 * Question pipeline variables. They need no credentials, so the offline
 * CLI commands validate these alone.
 */
const PipelineEnvSchema = z.object({
  CURRENT_SEASON: z.coerce.number().int().min(1982).default(2025),
  TIME_ZONE: z
    .string()
    .default('Asia/Seoul')
    .refine(isTimeZone, { message: 'Unknown IANA time zone' }),
  QUALIFIED_PA_MULTIPLIER: z.coerce.number().positive().default(3.1),
  ROLE_WEIGHT_ORDER_BY: z.coerce.number().nonnegative().default(10),
  ROLE_WEIGHT_SELECT: z.coerce.number().nonnegative().default(3),
  ROLE_WEIGHT_MENTION: z.coerce.number().nonnegative().default(1),
  TABLE_HINT_THRESHOLD: z.coerce.number().min(0).max(1).default(0.3),
  DEFAULT_LIMIT: z.coerce.number().int().positive().default(100),
  MAX_LIMIT: z.coerce.number().int().positive().default(1000),
  MAX_FAN_OUT: z.coerce.number().int().positive().default(12),
  UPCOMING_WINDOW_DAYS: z.coerce.number().int().positive().max(31).default(7),
});

type PipelineEnv = z.infer<typeof PipelineEnvSchema>;

function checkLimits(env: PipelineEnv, ctx: z.RefinementCtx): void {
  if (env.DEFAULT_LIMIT > env.MAX_LIMIT) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['DEFAULT_LIMIT'],
      message: 'DEFAULT_LIMIT cannot exceed MAX_LIMIT',
    });
  }
}

/**
 * Configuration schema with validation and defaults.
 */
const ConfigSchema = PipelineEnvSchema.extend({
  LOG_LEVEL: z
    .enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL', 'SILENT'])
    .default('INFO'),

  // LLM provider
  LLM_PROVIDER: z.enum(['anthropic', 'openai']).default('anthropic'),
  LLM_MODEL: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),

  // Table store
  STORE_TYPE: z.enum(['supabase', 'postgres']).default('supabase'),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_KEY: z.string().optional(),
  DATABASE_URL: z.string().optional(),

  // Network
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  GAME_CENTER_URL: z
    .string()
    .url()
    .default('https://api-gw.sports.naver.com/schedule/games'),
}).superRefine((env, ctx) => {
  if (env.STORE_TYPE === 'supabase' && (!env.SUPABASE_URL || !env.SUPABASE_KEY)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['SUPABASE_URL'],
      message: 'SUPABASE_URL and SUPABASE_KEY are required when STORE_TYPE=supabase',
    });
  }
  if (env.STORE_TYPE === 'postgres' && !env.DATABASE_URL) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['DATABASE_URL'],
      message: 'DATABASE_URL is required when STORE_TYPE=postgres',
    });
  }
  checkLimits(env, ctx);
});

function isTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

export type Env = z.infer<typeof ConfigSchema>;

export type LogLevel = Env['LOG_LEVEL'];

export interface LLMSettings {
  provider: Env['LLM_PROVIDER'];
  model: string;
  apiKey?: string;
}

export type StoreSettings =
  | { type: 'supabase'; url: string; key: string; timeoutMs: number }
  | { type: 'postgres'; connectionString: string; timeoutMs: number };

/**
 * Tunables of the question pipeline. Everything here is read-only per process.
 */
export interface PipelineSettings {
  currentSeason: number;
  timeZone: string;
  qualifiedMultiplier: number;
  roleWeights: { orderBy: number; select: number; mention: number };
  tableHintThreshold: number;
  defaultLimit: number;
  maxLimit: number;
  maxFanOut: number;
  upcomingWindowDays: number;
}

export interface Config {
  logLevel: LogLevel;
  llm: LLMSettings;
  store: StoreSettings;
  gameCenter: { baseUrl: string; timeoutMs: number };
  pipeline: PipelineSettings;
}

/**
 * Validate the environment and build the typed configuration.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw invalidConfig(parsed.error);
  }
  const e = parsed.data;

  let store: StoreSettings;
  if (e.STORE_TYPE === 'postgres' && e.DATABASE_URL) {
    store = { type: 'postgres', connectionString: e.DATABASE_URL, timeoutMs: e.REQUEST_TIMEOUT_MS };
  } else if (e.SUPABASE_URL && e.SUPABASE_KEY) {
    store = { type: 'supabase', url: e.SUPABASE_URL, key: e.SUPABASE_KEY, timeoutMs: e.REQUEST_TIMEOUT_MS };
  } else {
    throw new ConfigError(['STORE_TYPE: no store settings']);
  }

  return Object.freeze({
    logLevel: e.LOG_LEVEL,
    llm: {
      provider: e.LLM_PROVIDER,
      model: e.LLM_MODEL ?? DEFAULT_MODELS[e.LLM_PROVIDER],
      apiKey: e.LLM_PROVIDER === 'anthropic' ? e.ANTHROPIC_API_KEY : e.OPENAI_API_KEY,
    },
    store,
    gameCenter: { baseUrl: e.GAME_CENTER_URL, timeoutMs: e.REQUEST_TIMEOUT_MS },
    pipeline: toPipeline(e),
  });
}

/**
 * Validate only the pipeline variables. No store or model settings are
 * read.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadPipelineSettings(env: NodeJS.ProcessEnv = process.env): PipelineSettings {
  const parsed = PipelineEnvSchema.superRefine(checkLimits).safeParse(env);
  if (!parsed.success) {
    throw invalidConfig(parsed.error);
  }
  return toPipeline(parsed.data);
}

/**
 * Pipeline settings with every default applied, for callers that build
 * a context without going through the environment.
 */
export function defaultPipelineSettings(
  overrides: Partial<PipelineSettings> = {}
): PipelineSettings {
  return { ...loadPipelineSettings({}), ...overrides };
}

function invalidConfig(error: z.ZodError): ConfigError {
  return new ConfigError(error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
}

function toPipeline(e: PipelineEnv): PipelineSettings {
  return {
    currentSeason: e.CURRENT_SEASON,
    timeZone: e.TIME_ZONE,
    qualifiedMultiplier: e.QUALIFIED_PA_MULTIPLIER,
    roleWeights: {
      orderBy: e.ROLE_WEIGHT_ORDER_BY,
      select: e.ROLE_WEIGHT_SELECT,
      mention: e.ROLE_WEIGHT_MENTION,
    },
    tableHintThreshold: e.TABLE_HINT_THRESHOLD,
    defaultLimit: e.DEFAULT_LIMIT,
    maxLimit: e.MAX_LIMIT,
    maxFanOut: e.MAX_FAN_OUT,
    upcomingWindowDays: e.UPCOMING_WINDOW_DAYS,
  };
}
