import { describe, expect, it } from 'vitest';
import { addDays, canAddDays, compareIsoDates, diffInDays, isIsoDate, todayIsoDate } from './dates';

describe('dates', () => {
  it('adds days across month ends and leap days', () => {
    expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
    expect(addDays('2023-02-28', 1)).toBe('2023-03-01');
    expect(addDays('2024-01-01', 365)).toBe('2024-12-31');
    expect(addDays('2024-03-10', -10)).toBe('2024-02-29');
  });

  it('ignores daylight saving transitions', () => {
    expect(addDays('2024-03-09', 2)).toBe('2024-03-11');
    expect(addDays('2024-10-26', 2)).toBe('2024-10-28');
  });

  it('counts whole days between dates', () => {
    expect(diffInDays('2024-01-01', '2024-03-05')).toBe(64);
    expect(diffInDays('2024-03-05', '2024-01-01')).toBe(-64);
  });

  it('validates calendar dates', () => {
    expect(isIsoDate('2024-02-29')).toBe(true);
    expect(isIsoDate('2023-02-29')).toBe(false);
    expect(isIsoDate('2024-2-3')).toBe(false);
    expect(isIsoDate(20240101)).toBe(false);
    expect(() => addDays('01/02/2024', 1)).toThrow(RangeError);
  });

  it('orders dates', () => {
    expect(compareIsoDates('2024-01-02', '2024-01-10')).toBe(-1);
    expect(compareIsoDates('2024-01-10', '2024-01-10')).toBe(0);
    expect(compareIsoDates('2025-01-01', '2024-12-31')).toBe(1);
  });

  it('refuses shifts past the four-digit year range', () => {
    expect(canAddDays('9999-12-30', 1)).toBe(true);
    expect(canAddDays('9999-12-31', 1)).toBe(false);
    expect(canAddDays('2024-01-01', 395)).toBe(true);
    expect(canAddDays('2024-01-01', 1e12)).toBe(false);
  });

  it('takes today from the UTC calendar', () => {
    expect(todayIsoDate(new Date('2026-10-18T23:30:00Z'))).toBe('2026-10-18');
  });
});
