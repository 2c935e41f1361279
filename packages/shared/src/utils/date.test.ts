import { describe, it, expect } from 'vitest';
import {
  addServiceDays,
  daysBetween,
  isValidServiceDate,
  isWithinLookback,
  parseServiceDate,
  toNcpdpDate,
  toServiceDate,
} from './date.js';

describe('isValidServiceDate', () => {
  it('accepts a calendar date in yyyy-MM-dd form', () => {
    expect(isValidServiceDate('2026-02-20')).toBe(true);
  });

  it('accepts a leap day in a leap year', () => {
    expect(isValidServiceDate('2028-02-29')).toBe(true);
  });

  it('rejects a leap day outside a leap year', () => {
    expect(isValidServiceDate('2026-02-29')).toBe(false);
  });

  it('rejects other formats', () => {
    expect(isValidServiceDate('2026-2-1')).toBe(false);
    expect(isValidServiceDate('02/20/2026')).toBe(false);
    expect(isValidServiceDate('')).toBe(false);
  });
});

describe('parseServiceDate', () => {
  it('round-trips through toServiceDate', () => {
    expect(toServiceDate(parseServiceDate('2026-06-15'))).toBe('2026-06-15');
  });

  it('throws on invalid input', () => {
    expect(() => parseServiceDate('2026-13-01')).toThrow('Invalid service date');
  });
});

describe('addServiceDays', () => {
  it('crosses a month boundary', () => {
    expect(addServiceDays('2026-02-20', 10)).toBe('2026-03-02');
  });

  it('subtracts with a negative offset', () => {
    expect(addServiceDays('2026-01-05', -10)).toBe('2025-12-26');
  });
});

describe('daysBetween', () => {
  it('counts calendar days forward', () => {
    expect(daysBetween('2026-02-20', '2026-03-02')).toBe(10);
  });

  it('is negative when the second date is earlier', () => {
    expect(daysBetween('2026-03-02', '2026-02-20')).toBe(-10);
  });

  it('is zero for the same day', () => {
    expect(daysBetween('2026-02-20', '2026-02-20')).toBe(0);
  });
});

describe('isWithinLookback', () => {
  it('returns true for a date inside the window', () => {
    expect(isWithinLookback('2026-02-10', 30, '2026-02-20')).toBe(true);
  });

  it('includes the lower bound', () => {
    // Exactly 30 days before
    expect(isWithinLookback('2026-01-21', 30, '2026-02-20')).toBe(true);
  });

  it('excludes the day before the lower bound', () => {
    expect(isWithinLookback('2026-01-20', 30, '2026-02-20')).toBe(false);
  });

  it('includes the as-of date itself', () => {
    expect(isWithinLookback('2026-02-20', 30, '2026-02-20')).toBe(true);
  });

  it('excludes dates after the as-of date', () => {
    expect(isWithinLookback('2026-02-21', 30, '2026-02-20')).toBe(false);
  });
});

describe('toNcpdpDate', () => {
  it('formats as yyyyMMdd', () => {
    expect(toNcpdpDate('2026-03-05')).toBe('20260305');
  });
});
