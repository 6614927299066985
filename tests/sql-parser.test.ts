import { describe, expect, it } from 'vitest';
import { parsePseudoSql } from '../src/services/sql-parser.js';
import type { ParsedQuery } from '../src/types/models.js';

function parsed(sql: string): ParsedQuery {
  const result = parsePseudoSql(sql);
  if (!result.ok) {
    throw new Error(`expected ${sql} to parse: ${result.error.message}`);
  }
  return result.query;
}

function failure(sql: string): string {
  const result = parsePseudoSql(sql);
  if (result.ok) {
    throw new Error(`expected ${sql} to be rejected`);
  }
  return result.error.message;
}

describe('parsePseudoSql', () => {
  it('parses a filtered, ordered, limited select', () => {
    const sql = "SELECT player_name, team, hra FROM player_season_stats WHERE team = 'HH' ORDER BY hra DESC LIMIT 1;";
    expect(parsed(sql)).toEqual({
      table: 'player_season_stats',
      columns: ['player_name', 'team', 'hra'],
      predicates: [{ kind: 'eq', column: 'team', values: ['HH'] }],
      order: { column: 'hra', direction: 'desc' },
      limit: 1,
      raw: sql,
    });
  });

  it('reads * as every column and trims the input', () => {
    const query = parsed('  select * from game_result;\n');
    expect(query.columns).toEqual([]);
    expect(query.predicates).toEqual([]);
    expect(query.order).toBeUndefined();
    expect(query.limit).toBeUndefined();
    expect(query.raw).toBe('select * from game_result;');
  });

  it('drops qualifiers and table aliases', () => {
    const query = parsed(`SELECT s."player_name" FROM player_season_stats s WHERE s.team IN ('HH', 'LG');`);
    expect(query.table).toBe('player_season_stats');
    expect(query.columns).toEqual(['player_name']);
    expect(query.predicates).toEqual([{ kind: 'eq', column: 'team', values: ['HH', 'LG'] }]);
  });

  it('merges OR groups over one column into a single equality', () => {
    const query = parsed("SELECT * FROM player_season_stats WHERE (team = 'HH' OR team = 'LG') AND hr >= 20;");
    expect(query.predicates).toEqual([
      { kind: 'eq', column: 'team', values: ['HH', 'LG'] },
      { kind: 'compare', column: 'hr', op: '>=', value: 20 },
    ]);
  });

  it('rejects OR across columns', () => {
    expect(failure("SELECT * FROM player_season_stats WHERE team = 'HH' OR hr = 3;")).toBe(
      'OR is only supported between values of one column (near "hr")'
    );
  });

  it('expands BETWEEN into two comparisons', () => {
    expect(parsed('SELECT * FROM player_season_stats WHERE hra BETWEEN 0.3 AND 0.4;').predicates).toEqual([
      { kind: 'compare', column: 'hra', op: '>=', value: 0.3 },
      { kind: 'compare', column: 'hra', op: '<=', value: 0.4 },
    ]);
  });

  it('accepts IS NOT NULL but no other NOT', () => {
    expect(parsed('SELECT * FROM player_season_stats WHERE era IS NOT NULL;').predicates).toEqual([
      { kind: 'null', column: 'era', negated: true },
    ]);
    expect(failure("SELECT * FROM player_season_stats WHERE NOT team = 'HH';")).toBe(
      'NOT is not supported (near "NOT")'
    );
  });

  it('normalizes <> to != and allows text on inequality', () => {
    expect(parsed("SELECT * FROM game_result WHERE team_id <> 'HH';").predicates).toEqual([
      { kind: 'compare', column: 'team_id', op: '!=', value: 'HH' },
    ]);
  });

  it('requires numbers for ordering comparisons', () => {
    expect(failure("SELECT * FROM player_season_stats WHERE hr > 'ten';")).toBe('expected a number (near "ten")');
  });

  it('unescapes doubled quotes in strings', () => {
    expect(parsed("SELECT * FROM player_season_stats WHERE player_name = 'O''Neil';").predicates).toEqual([
      { kind: 'eq', column: 'player_name', values: ["O'Neil"] },
    ]);
  });

  it('resolves ORDER BY through select aliases and ignores secondary keys', () => {
    const query = parsed('SELECT hra AS avg, hr FROM player_season_stats ORDER BY avg DESC NULLS LAST, hr ASC LIMIT 5;');
    expect(query.order).toEqual({ column: 'hra', direction: 'desc' });
    expect(query.limit).toBe(5);
  });

  it('rejects write statements wherever they appear', () => {
    expect(failure('DELETE FROM game_result;')).toBe(
      'only read-only SELECT statements are supported (near "DELETE")'
    );
    expect(failure('SELECT * FROM game_result; DROP TABLE game_result;')).toBe(
      'only read-only SELECT statements are supported (near "DROP")'
    );
  });

  it('rejects a second statement', () => {
    expect(failure('SELECT * FROM game_result; SELECT * FROM game_schedule;')).toBe(
      'only a single statement is allowed (near "SELECT")'
    );
  });

  it('requires the terminating semicolon', () => {
    expect(failure('SELECT * FROM game_result')).toBe('statement must end with ";" (near "end of input")');
  });

  it('rejects functions, joins and comments', () => {
    expect(failure('SELECT COUNT(*) FROM game_result;')).toBe(
      'functions and aggregates are not supported (near "COUNT")'
    );
    expect(failure('SELECT * FROM game_result JOIN game_schedule;')).toBe('JOIN is not supported (near "JOIN")');
    expect(failure('SELECT * FROM game_result; -- hi')).toBe('comments are not allowed (near "-- hi")');
  });

  it('requires a positive integer limit', () => {
    expect(failure('SELECT * FROM game_result LIMIT 0;')).toBe('LIMIT must be a positive integer (near "0")');
  });
});
