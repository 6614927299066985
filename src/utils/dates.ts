/**
 * Calendar-day arithmetic on YYYY-MM-DD strings.
 *
 * Days are computed in UTC so that adding days never crosses a DST edge;
 * the only zone-aware step is turning "now" into a local day.
 */

const DAY_MS = 86_400_000;

export function formatDate(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

export function isValidDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const candidate = new Date(Date.UTC(year, month - 1, day));
  return candidate.getUTCMonth() === month - 1 && candidate.getUTCDate() === day;
}

function toUtc(date: string): Date {
  const [year, month, day] = date.split('-').map(Number);
  return new Date(Date.UTC(year, month - 1, day));
}

function fromUtc(date: Date): string {
  return formatDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
}

/**
 * The calendar day of `now` in the given IANA zone.
 */
export function localDate(now: Date, timeZone: string): string {
  // en-CA formats as YYYY-MM-DD
  return new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).format(now);
}

export function addDays(date: string, days: number): string {
  return fromUtc(new Date(toUtc(date).getTime() + days * DAY_MS));
}

/**
 * Day of week with Monday as 0 and Sunday as 6.
 */
export function weekdayIndex(date: string): number {
  return (toUtc(date).getUTCDay() + 6) % 7;
}

export function yearOf(date: string): number {
  return Number(date.slice(0, 4));
}

/**
 * Every day from `from` to `to` inclusive, at most `max` of them.
 */
export function eachDay(from: string, to: string, max = 31): string[] {
  const days: string[] = [];
  for (let day = from; day <= to && days.length < max; day = addDays(day, 1)) {
    days.push(day);
  }
  return days;
}

/**
 * "2025-09-20" -> "Sat, Sep 20, 2025"
 */
export function describeDate(date: string): string {
  return new Intl.DateTimeFormat('en-US', {
    timeZone: 'UTC',
    weekday: 'short',
    month: 'short',
    day: 'numeric',
    year: 'numeric',
  }).format(toUtc(date));
}
