import type { DateRef } from '../../types/models.js';
import { eachDay } from '../../utils/dates.js';

/**
 * The calendar days a date reference covers, defaulting to today.
 */
export function requestedDays(ref: DateRef, today: string): string[] {
  switch (ref.kind) {
    case 'none':
      return [today];
    case 'day':
      return [ref.date];
    case 'range':
      return eachDay(ref.from, ref.to);
  }
}

export function firstDay(ref: DateRef, today: string): string {
  return requestedDays(ref, today)[0] ?? today;
}
