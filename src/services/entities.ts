/**
 * Entity extraction: dates, teams and player names from free text.
 * Nothing here throws; an unmatched entity is an explicit "none".
 */

import type { DateRef, ResolvedEntities } from '../types/models.js';
import {
  addDays,
  formatDate,
  isValidDate,
  localDate,
  weekdayIndex,
  yearOf,
} from '../utils/dates.js';
import { matchLongestFirst } from '../utils/text.js';
import type { QueryContext } from './context.js';

const NONE: DateRef = { kind: 'none' };

const MONTHS: Record<string, number> = {
  january: 1, jan: 1,
  february: 2, feb: 2,
  march: 3, mar: 3,
  april: 4, apr: 4,
  may: 5,
  june: 6, jun: 6,
  july: 7, jul: 7,
  august: 8, aug: 8,
  september: 9, sept: 9, sep: 9,
  october: 10, oct: 10,
  november: 11, nov: 11,
  december: 12, dec: 12,
};

const WEEKDAYS: Record<string, number> = {
  monday: 0, mon: 0, 월: 0,
  tuesday: 1, tue: 1, tues: 1, 화: 1,
  wednesday: 2, wed: 2, 수: 2,
  thursday: 3, thu: 3, thur: 3, thurs: 3, 목: 3,
  friday: 4, fri: 4, 금: 4,
  saturday: 5, sat: 5, 토: 5,
  sunday: 6, sun: 6, 일: 6,
};

const MONTH_NAMES = Object.keys(MONTHS).sort((a, b) => b.length - a.length).join('|');
const WEEKDAY_NAMES = Object.keys(WEEKDAYS)
  .filter((name) => /^[a-z]/.test(name))
  .sort((a, b) => b.length - a.length)
  .join('|');

type DateParts = [year: number, month: number, day: number];

interface ExplicitPattern {
  regex: RegExp;
  parts(match: RegExpMatchArray, today: string): DateParts;
}

const EXPLICIT_PATTERNS: readonly ExplicitPattern[] = [
  {
    regex: /(?<!\d)(\d{4})-(\d{1,2})-(\d{1,2})(?!\d)/g,
    parts: (m) => [Number(m[1]), Number(m[2]), Number(m[3])],
  },
  {
    regex: /(?<!\d)(\d{4})[./](\d{1,2})[./](\d{1,2})(?!\d)/g,
    parts: (m) => [Number(m[1]), Number(m[2]), Number(m[3])],
  },
  {
    regex: /(\d{4})\s*년\s*(\d{1,2})\s*월\s*(\d{1,2})\s*일/g,
    parts: (m) => [Number(m[1]), Number(m[2]), Number(m[3])],
  },
  {
    regex: /(?<!\d)(\d{1,2})\s*월\s*(\d{1,2})\s*일/g,
    parts: (m, today) => [yearOf(today), Number(m[1]), Number(m[2])],
  },
  {
    regex: new RegExp(
      `\\b(${MONTH_NAMES})\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?\\b(?:,?\\s+(\\d{4})\\b)?`,
      'gi'
    ),
    parts: (m, today) => [
      m[3] ? Number(m[3]) : yearOf(today),
      MONTHS[m[1].toLowerCase()],
      Number(m[2]),
    ],
  },
  {
    regex: /(?<![\d/])(\d{1,2})\/(\d{1,2})(?![\d/])/g,
    parts: (m, today) => [yearOf(today), Number(m[1]), Number(m[2])],
  },
];

function explicitDate(text: string, today: string): DateRef | null {
  for (const { regex, parts } of EXPLICIT_PATTERNS) {
    for (const match of text.matchAll(regex)) {
      const [year, month, day] = parts(match, today);
      if (isValidDate(year, month, day)) {
        return { kind: 'day', date: formatDate(year, month, day) };
      }
    }
  }
  return null;
}

const OFFSET_PATTERNS: ReadonlyArray<{ regex: RegExp; sign(match: RegExpMatchArray): number }> = [
  {
    regex: /\b(\d{1,3})\s*days?\s+(ago|before|earlier|later|after|from now)\b/i,
    sign: (m) => (/ago|before|earlier/i.test(m[2]) ? -1 : 1),
  },
  {
    regex: /\bin\s+(\d{1,3})\s+days?\b/i,
    sign: () => 1,
  },
  {
    regex: /(\d{1,3})\s*일\s*(전|후|뒤)/,
    sign: (m) => (m[2] === '전' ? -1 : 1),
  },
];

function dayOffset(text: string, today: string): DateRef | null {
  for (const { regex, sign } of OFFSET_PATTERNS) {
    const match = text.match(regex);
    if (match) {
      return { kind: 'day', date: addDays(today, sign(match) * Number(match[1])) };
    }
  }
  return null;
}

function weekStart(today: string): string {
  return addDays(today, -weekdayIndex(today));
}

function weekRange(today: string, weeks: number): DateRef {
  const from = addDays(weekStart(today), weeks * 7);
  return { kind: 'range', from, to: addDays(from, 6) };
}

/**
 * Weekday relative to the Monday-to-Sunday week of `today`. "coming" is
 * the first such weekday strictly after today.
 */
function weekday(today: string, modifier: string, day: number): DateRef {
  const thisWeek = addDays(weekStart(today), day);
  switch (modifier) {
    case 'next':
    case '다음':
      return { kind: 'day', date: addDays(thisWeek, 7) };
    case 'last':
    case '지난':
    case '저번':
      return { kind: 'day', date: addDays(thisWeek, -7) };
    case 'coming': {
      const ahead = (day - weekdayIndex(today) + 7) % 7 || 7;
      return { kind: 'day', date: addDays(today, ahead) };
    }
    default:
      return { kind: 'day', date: thisWeek };
  }
}

const RELATIVE_TERMS: ReadonlyArray<{
  regex: RegExp;
  resolve(today: string, match: RegExpMatchArray): DateRef;
}> = [
  { regex: /\bday after tomorrow\b|모레/i, resolve: (t) => ({ kind: 'day', date: addDays(t, 2) }) },
  { regex: /\bday before yesterday\b|그저께|그제/i, resolve: (t) => ({ kind: 'day', date: addDays(t, -2) }) },
  { regex: /글피/, resolve: (t) => ({ kind: 'day', date: addDays(t, 3) }) },
  {
    regex: new RegExp(`\\b(this|next|last|coming)\\s+(${WEEKDAY_NAMES})\\b`, 'i'),
    resolve: (t, m) => weekday(t, m[1].toLowerCase(), WEEKDAYS[m[2].toLowerCase()]),
  },
  {
    regex: /(이번|다음|지난|저번)\s*주\s*([월화수목금토일])요일/,
    resolve: (t, m) => weekday(t, m[1], WEEKDAYS[m[2]]),
  },
  { regex: /\bthis week\b|이번\s*주/i, resolve: (t) => weekRange(t, 0) },
  { regex: /\bnext week\b|다음\s*주/i, resolve: (t) => weekRange(t, 1) },
  { regex: /\blast week\b|지난\s*주|저번\s*주/i, resolve: (t) => weekRange(t, -1) },
  { regex: /\btomorrow\b|내일/i, resolve: (t) => ({ kind: 'day', date: addDays(t, 1) }) },
  { regex: /\byesterday\b|어제/i, resolve: (t) => ({ kind: 'day', date: addDays(t, -1) }) },
  { regex: /\btoday\b|\btonight\b|오늘/i, resolve: (t) => ({ kind: 'day', date: t }) },
];

function relativeTerm(text: string, today: string): DateRef | null {
  for (const { regex, resolve } of RELATIVE_TERMS) {
    const match = text.match(regex);
    if (match) return resolve(today, match);
  }
  return null;
}

const DATE_RULES = [explicitDate, dayOffset, relativeTerm] as const;

/**
 * Resolve the first date expression by precedence: explicit date, then
 * "N days before/after", then a named relative term.
 */
export function extractDate(text: string, today: string): DateRef {
  for (const rule of DATE_RULES) {
    const resolved = rule(text, today);
    if (resolved) return resolved;
  }
  return NONE;
}

/**
 * Known player names found in the text, longest first. A name lying inside
 * a longer matched name is not reported.
 */
export function extractPlayers(text: string, context: QueryContext): string[] {
  const found = matchLongestFirst(text, context.players.entries).map((hit) => hit.value);
  return [...new Set(found)]
    .filter((name) => !context.teams.isTeamReference(name))
    .sort((a, b) => b.length - a.length);
}

export function extractEntities(
  question: string,
  context: QueryContext,
  now: Date = new Date()
): ResolvedEntities {
  const today = localDate(now, context.settings.timeZone);
  return {
    date: extractDate(question, today),
    teams: context.teams.findAll(question),
    players: extractPlayers(question, context),
  };
}
