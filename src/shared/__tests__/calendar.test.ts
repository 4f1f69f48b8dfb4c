import { describe, it, expect } from 'vitest';
import { monthBucket, parseCalendarDate, toCalendarDate } from '../calendar';

describe('parseCalendarDate', () => {
  it('parses valid dates', () => {
    expect(parseCalendarDate('2024-02-29')).toEqual({ year: 2024, month: 2, day: 29 });
  });

  it('rejects impossible or malformed dates', () => {
    expect(parseCalendarDate('2023-02-29')).toBeNull();
    expect(parseCalendarDate('2024-13-01')).toBeNull();
    expect(parseCalendarDate('2024-1-01')).toBeNull();
    expect(parseCalendarDate('2024-01-01T00:00:00Z')).toBeNull();
    expect(parseCalendarDate('')).toBeNull();
  });
});

describe('toCalendarDate', () => {
  it('uses the UTC day', () => {
    expect(toCalendarDate(new Date('2024-03-31T23:30:00-02:00'))).toBe('2024-04-01');
  });
});

describe('monthBucket', () => {
  it('zero-pads the month', () => {
    expect(monthBucket(2024, 3)).toBe('2024-03');
    expect(monthBucket(2024, 12)).toBe('2024-12');
  });
});
