import { describe, expect, it } from '@jest/globals';
import {
  addDays,
  billingPeriod,
  businessDate,
  daysBetween,
  daysPerMonth,
  isCalendarDate,
  monthKey,
  startOfMonth,
} from '../date.util';

describe('businessDate', () => {
  it('uses the business timezone, not UTC', () => {
    // 20:00 UTC is 01:30 the next day in Kolkata
    expect(businessDate(new Date('2026-03-10T20:00:00Z'), 'Asia/Kolkata')).toBe('2026-03-11');
    expect(businessDate(new Date('2026-03-10T20:00:00Z'), 'UTC')).toBe('2026-03-10');
  });
});

describe('calendar arithmetic', () => {
  it('adds days across month and year boundaries', () => {
    expect(addDays('2026-01-31', 1)).toBe('2026-02-01');
    expect(addDays('2025-12-31', 1)).toBe('2026-01-01');
    expect(addDays('2026-03-01', -1)).toBe('2026-02-28');
  });

  it('counts whole days between dates', () => {
    expect(daysBetween('2026-03-01', '2026-03-07')).toBe(6);
    expect(daysBetween('2026-03-07', '2026-03-01')).toBe(-6);
    expect(daysBetween('2024-02-28', '2024-03-01')).toBe(2);
  });

  it('validates real calendar dates only', () => {
    expect(isCalendarDate('2026-02-28')).toBe(true);
    expect(isCalendarDate('2026-02-29')).toBe(false);
    expect(isCalendarDate('2026-3-1')).toBe(false);
  });

  it('derives month and billing keys', () => {
    expect(monthKey('2026-03-10')).toBe('2026-03');
    expect(billingPeriod('2026-03-10')).toBe('202603');
    expect(startOfMonth('2026-03-10')).toBe('2026-03-01');
  });

  it('splits a range by month', () => {
    expect(Array.from(daysPerMonth('2026-03-30', '2026-04-02'))).toEqual([
      ['2026-03', 2],
      ['2026-04', 2],
    ]);
  });
});
