/**
 * Alias table mapping every way a team is written to its canonical code.
 */

import type { Team } from '../types/models.js';
import { keywordPattern, matchLongestFirst } from '../utils/text.js';

interface AliasEntry {
  pattern: RegExp;
  value: string;
  length: number;
}

export class TeamDirectory {
  private readonly teams: ReadonlyMap<string, Team>;
  private readonly exact: ReadonlyMap<string, string>;
  private readonly entries: readonly AliasEntry[];

  constructor(teams: readonly Team[]) {
    const byCode = new Map<string, Team>();
    const exact = new Map<string, string>();
    const entries: AliasEntry[] = [];

    for (const team of teams) {
      if (byCode.has(team.code)) {
        throw new Error(`Duplicate team code: ${team.code}`);
      }
      byCode.set(team.code, team);

      // Codes are matched case-sensitively; "lt" or "ss" in prose is not a team.
      exact.set(team.code, team.code);
      entries.push({ pattern: keywordPattern(team.code, true), value: team.code, length: team.code.length });

      for (const alias of new Set([team.name, team.shortName, ...team.aliases])) {
        const key = alias.toLowerCase();
        const owner = exact.get(key);
        if (owner !== undefined && owner !== team.code) {
          throw new Error(`Alias "${alias}" maps to both ${owner} and ${team.code}`);
        }
        exact.set(key, team.code);
        entries.push({ pattern: keywordPattern(alias), value: team.code, length: alias.length });
      }
    }

    this.teams = byCode;
    this.exact = exact;
    this.entries = entries.sort((a, b) => b.length - a.length);
  }

  get codes(): string[] {
    return [...this.teams.keys()];
  }

  get(code: string): Team | undefined {
    return this.teams.get(code);
  }

  /**
   * Display name for a code, falling back to the code itself.
   */
  nameOf(code: string): string {
    return this.teams.get(code)?.name ?? code;
  }

  /**
   * Resolve a whole value (a filter literal, a CLI flag) to a code.
   */
  resolve(value: string): string | undefined {
    const trimmed = value.trim();
    return this.exact.get(trimmed) ?? this.exact.get(trimmed.toLowerCase());
  }

  /**
   * True when the value is a team code or any alias of one.
   */
  isTeamReference(value: string): boolean {
    return this.resolve(value) !== undefined;
  }

  /**
   * Every team mentioned in free text, longest alias first, in order of
   * appearance and without duplicates.
   */
  findAll(text: string): string[] {
    const codes: string[] = [];
    for (const hit of matchLongestFirst(text, this.entries)) {
      if (!codes.includes(hit.value)) codes.push(hit.value);
    }
    return codes;
  }
}
