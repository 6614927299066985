/**
 * Domain types and the Zod schemas for the read-only corpora.
 */

import { z } from 'zod';
import type { CompileError, UnsupportedTableError } from './errors.js';
import type { Literal, OrderSpec, Row } from './utils.js';

// ============================================================================
// CATEGORIES
// ============================================================================

export const CATEGORIES = [
	'DailySchedule',
	'DailyResultsAnalysis',
	'GamePrediction',
	'FutureGameDetail',
	'GameAnalysis',
	'GenericQuery',
] as const;

export type Category = (typeof CATEGORIES)[number];

// ============================================================================
// CORPUS SCHEMAS
// ============================================================================

export const ColumnTypeSchema = z.enum([
	'player',
	'team',
	'season',
	'date',
	'text',
	'integer',
	'rate',
]);

export const ColumnDescriptorSchema = z.object({
	name: z.string().min(1),
	type: ColumnTypeSchema,
	synonyms: z.array(z.string()).default([]),
	qualifiedRate: z.boolean().default(false),
});

const RoleSpecSchema = z.object({
	columns: z.array(z.string()).min(1),
	requiredColumn: z.string(),
});

/** Where the number of games each team has played is read from. */
const GamesSourceSchema = z.object({
	table: z.string(),
	teamColumn: z.string(),
	seasonColumn: z.string(),
	gamesColumn: z.string(),
});

export const TableDescriptorSchema = z.object({
	name: z.string().min(1),
	description: z.string(),
	keywords: z.array(z.string()).default([]),
	key: z.array(z.string()).default([]),
	seasonColumn: z.string().optional(),
	columns: z.array(ColumnDescriptorSchema).min(1),
	roles: z
		.object({
			pitcher: RoleSpecSchema,
			batter: RoleSpecSchema,
		})
		.optional(),
	qualification: z
		.object({
			paColumn: z.string(),
			teamColumn: z.string(),
			playerGamesColumn: z.string(),
			gamesSource: GamesSourceSchema,
		})
		.optional(),
});

export const IntentExemplarSchema = z.object({
	category: z.enum(CATEGORIES),
	description: z.string(),
	keywords: z.array(z.string()).min(1),
	table: z.string().optional(),
});

export const SchemaCorpusSchema = z.object({
	tables: z.array(TableDescriptorSchema).min(1),
	intents: z.array(IntentExemplarSchema),
});

export const TeamSchema = z.object({
	code: z.string().regex(/^[A-Z]{2}$/),
	name: z.string(),
	shortName: z.string(),
	stadium: z.string(),
	aliases: z.array(z.string()).min(1),
});

export const TeamCorpusSchema = z.object({
	teams: z.array(TeamSchema).min(1),
});

export const KeywordCorpusSchema = z.object({
	futureDetail: z.array(z.string()),
	prediction: z.array(z.string()),
	result: z.array(z.string()),
	schedule: z.array(z.string()),
	game: z.array(z.string()),
	qualification: z.array(z.string()),
	roles: z.object({
		pitcher: z.array(z.string()),
		batter: z.array(z.string()),
	}),
});

export type ColumnType = z.infer<typeof ColumnTypeSchema>;
export type ColumnDescriptor = z.infer<typeof ColumnDescriptorSchema>;
export type TableDescriptor = z.infer<typeof TableDescriptorSchema>;
export type IntentExemplar = z.infer<typeof IntentExemplarSchema>;
export type SchemaCorpus = z.infer<typeof SchemaCorpusSchema>;
export type Team = z.infer<typeof TeamSchema>;
export type KeywordCorpus = z.infer<typeof KeywordCorpusSchema>;
export type GamesSource = z.infer<typeof GamesSourceSchema>;

// ============================================================================
// ENTITIES
// ============================================================================

/**
 * A resolved date expression. Dates are local calendar days as YYYY-MM-DD.
 */
export type DateRef =
	| { readonly kind: 'none' }
	| { readonly kind: 'day'; readonly date: string }
	| { readonly kind: 'range'; readonly from: string; readonly to: string };

export interface ResolvedEntities {
	readonly date: DateRef;
	/** Canonical team codes in order of first appearance. */
	readonly teams: readonly string[];
	/** Known player names, longest first. */
	readonly players: readonly string[];
}

// ============================================================================
// PARSED QUERY
// ============================================================================

export type CompareOp = '>' | '>=' | '<' | '<=' | '!=';

/**
 * A WHERE clause term. IN lists and same-column OR groups collapse
 * into a single `eq` predicate with several values.
 */
export type Predicate =
	| { readonly kind: 'eq'; readonly column: string; readonly values: readonly Literal[] }
	| { readonly kind: 'compare'; readonly column: string; readonly op: CompareOp; readonly value: Literal }
	| { readonly kind: 'null'; readonly column: string; readonly negated: boolean };

export interface ParsedQuery {
	readonly table: string;
	/** Projected columns; empty for `SELECT *`. */
	readonly columns: readonly string[];
	readonly predicates: readonly Predicate[];
	readonly order?: OrderSpec;
	readonly limit?: number;
	readonly raw: string;
}

export type ParseResult =
	| { readonly ok: true; readonly query: ParsedQuery }
	| { readonly ok: false; readonly error: CompileError };

// ============================================================================
// COMPILED PLAN
// ============================================================================

export interface EqualityFilter {
	readonly column: string;
	readonly value: Literal;
}

/**
 * One request against the table store.
 */
export interface RemoteCall {
	readonly table: string;
	readonly filters: readonly EqualityFilter[];
	readonly order?: OrderSpec;
	readonly limit?: number;
}

/**
 * Filters applied in process after the remote calls return.
 */
export type PostFilter =
	| { readonly kind: 'notNull'; readonly column: string }
	| { readonly kind: 'isNull'; readonly column: string }
	| { readonly kind: 'compare'; readonly column: string; readonly op: CompareOp; readonly value: Literal }
	| {
			readonly kind: 'qualifiedBatter';
			readonly paColumn: string;
			readonly teamColumn: string;
			readonly playerGamesColumn: string;
			readonly gamesSource: GamesSource;
			/** Team code when the question names one; league average otherwise. */
			readonly team?: string;
			readonly season: number;
			readonly multiplier: number;
	  };

export type Role = 'pitcher' | 'batter' | 'both';

/** Where sort and limit are applied. */
export type Locality = 'server' | 'client';

export interface CompiledPlan {
	readonly table: string;
	readonly columns: readonly string[];
	readonly calls: readonly RemoteCall[];
	readonly postFilters: readonly PostFilter[];
	readonly order?: OrderSpec;
	readonly limit: number;
	readonly locality: Locality;
	readonly role: Role;
	/** Columns identifying a row when the results of several calls are merged. */
	readonly keyColumns: readonly string[];
}

export type CompileResult =
	| { readonly ok: true; readonly plan: CompiledPlan }
	| { readonly ok: false; readonly error: CompileError | UnsupportedTableError };

export type ExecutionResult =
	| { readonly kind: 'rows'; readonly rows: Row[] }
	| { readonly kind: 'unavailable'; readonly reason: string };

// ============================================================================
// GAMES
// ============================================================================

export type GameWinner = 'HOME' | 'AWAY' | 'DRAW';

export interface ScheduledGame {
	readonly gameId: string;
	readonly date: string;
	readonly startsAt: string | null;
	readonly stadium: string;
	readonly homeCode: string;
	readonly homeName: string;
	readonly awayCode: string;
	readonly awayName: string;
	readonly homeScore: number | null;
	readonly awayScore: number | null;
	readonly winner: GameWinner | null;
	/** BEFORE, LIVE, RESULT or CANCEL */
	readonly status: string;
}

export interface TeamStanding {
	readonly code: string;
	readonly name: string;
	readonly rank: number | null;
	readonly winRate: number | null;
	readonly wins: number | null;
	readonly losses: number | null;
	readonly draws: number | null;
	readonly games: number | null;
	readonly ops: number | null;
	readonly era: number | null;
	readonly lastFive: string;
}

// ============================================================================
// ANSWERS
// ============================================================================

export type FailureReason = 'compile' | 'unsupportedTable' | 'llm' | 'internal';

export type Answer =
	| {
			readonly kind: 'rows';
			readonly category: 'GenericQuery';
			readonly rows: Row[];
			readonly sql: string;
			readonly plan: CompiledPlan;
	  }
	| { readonly kind: 'text'; readonly category: Category; readonly text: string }
	| {
			readonly kind: 'failure';
			readonly category: Category;
			readonly reason: FailureReason;
			readonly text: string;
	  };

export interface AskOptions {
	/** Clock used for relative dates. */
	readonly now?: Date;
}
