import { describe, expect, it } from 'vitest';
import { addDays, describeDate, eachDay, isValidDate, localDate, weekdayIndex } from '../src/utils/dates.js';

describe('dates', () => {
  it('takes the calendar day in the given zone', () => {
    const lateEvening = new Date('2025-09-19T16:00:00Z');
    expect(localDate(lateEvening, 'Asia/Seoul')).toBe('2025-09-20');
    expect(localDate(lateEvening, 'UTC')).toBe('2025-09-19');
  });

  it('adds days across month and year ends', () => {
    expect(addDays('2025-02-28', 1)).toBe('2025-03-01');
    expect(addDays('2025-01-01', -1)).toBe('2024-12-31');
  });

  it('checks calendar validity', () => {
    expect(isValidDate(2024, 2, 29)).toBe(true);
    expect(isValidDate(2025, 2, 29)).toBe(false);
    expect(isValidDate(2025, 13, 1)).toBe(false);
  });

  it('counts weekdays from Monday', () => {
    expect(weekdayIndex('2025-09-15')).toBe(0);
    expect(weekdayIndex('2025-09-20')).toBe(5);
    expect(weekdayIndex('2025-09-21')).toBe(6);
  });

  it('lists each day of a range', () => {
    expect(eachDay('2025-09-29', '2025-10-02')).toEqual(['2025-09-29', '2025-09-30', '2025-10-01', '2025-10-02']);
    expect(eachDay('2025-09-01', '2025-12-31', 3)).toHaveLength(3);
  });

  it('describes a day for display', () => {
    expect(describeDate('2025-09-20')).toBe('Sat, Sep 20, 2025');
  });
});
