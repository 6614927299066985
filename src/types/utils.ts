/**
 * Core type utilities shared across the pipeline.
 */

/**
 * Primitive JSON values.
 */
export type JsonPrimitive = string | number | boolean | null;

/**
 * One row as returned by the table store.
 */
export type Row = Record<string, JsonPrimitive>;

/**
 * Literal accepted in an equality filter.
 */
export type Literal = string | number | boolean;

/**
 * Sort direction for query results.
 */
export type SortDirection = 'asc' | 'desc';

export interface OrderSpec {
	readonly column: string;
	readonly direction: SortDirection;
}

/**
 * Reads a row value as a number. Numeric strings are accepted, anything
 * else yields null.
 */
export function toNumber(value: JsonPrimitive | undefined): number | null {
	if (typeof value === 'number') {
		return Number.isFinite(value) ? value : null;
	}
	if (typeof value === 'string' && value.trim() !== '') {
		const parsed = Number(value);
		return Number.isFinite(parsed) ? parsed : null;
	}
	return null;
}
