/**
 * Calendar arithmetic for revenue periods. All buckets are UTC, weeks start on
 * Monday, and a bucket spans `[start, nextStart − 1ms]` so consecutive buckets
 * are contiguous and never overlap.
 */

import Decimal from 'decimal.js';
import { ValidationError } from './errors';
import { POLICY } from './config';
import type { CalendarGranularity, DateRange, RevenuePeriod } from '../types/revenue';

const DAY_MS = 24 * 60 * 60 * 1000;

export function isValidDate(d: Date): boolean {
  return d instanceof Date && !Number.isNaN(d.getTime());
}

export function isValidRange(range: DateRange): boolean {
  return isValidDate(range.startDate) && isValidDate(range.endDate) && range.startDate.getTime() <= range.endDate.getTime();
}

export function assertValidRange(range: DateRange, field = 'dateRange'): void {
  if (!isValidRange(range)) {
    throw new ValidationError(field, 'Date range start must not be after its end', 'invalid_date_range');
  }
}

export function rangeContains(range: DateRange, at: Date): boolean {
  const t = at.getTime();
  return t >= range.startDate.getTime() && t <= range.endDate.getTime();
}

export function rangeDays(range: DateRange): number {
  return (range.endDate.getTime() - range.startDate.getTime() + 1) / DAY_MS;
}

export function addMonthsUTC(date: Date, months: number): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + months, 1));
}

export function bucketStart(granularity: CalendarGranularity, at: Date): Date {
  const y = at.getUTCFullYear();
  const m = at.getUTCMonth();
  const d = at.getUTCDate();
  switch (granularity) {
    case 'daily':
      return new Date(Date.UTC(y, m, d));
    case 'weekly': {
      const offset = (at.getUTCDay() + 6) % 7;
      return new Date(Date.UTC(y, m, d - offset));
    }
    case 'monthly':
      return new Date(Date.UTC(y, m, 1));
    case 'quarterly':
      return new Date(Date.UTC(y, m - (m % 3), 1));
    case 'yearly':
      return new Date(Date.UTC(y, 0, 1));
    default: {
      const unreachable: never = granularity;
      throw new ValidationError('granularity', `Unknown granularity: ${String(unreachable)}`, 'invalid_period');
    }
  }
}

/** Shifts a bucket start by `steps` buckets. */
export function shiftBucket(granularity: CalendarGranularity, start: Date, steps: number): Date {
  const y = start.getUTCFullYear();
  const m = start.getUTCMonth();
  const d = start.getUTCDate();
  switch (granularity) {
    case 'daily':
      return new Date(Date.UTC(y, m, d + steps));
    case 'weekly':
      return new Date(Date.UTC(y, m, d + steps * 7));
    case 'monthly':
      return new Date(Date.UTC(y, m + steps, 1));
    case 'quarterly':
      return new Date(Date.UTC(y, m + steps * 3, 1));
    case 'yearly':
      return new Date(Date.UTC(y + steps, 0, 1));
    default: {
      const unreachable: never = granularity;
      throw new ValidationError('granularity', `Unknown granularity: ${String(unreachable)}`, 'invalid_period');
    }
  }
}

export function bucketRange(granularity: CalendarGranularity, at: Date): DateRange {
  const startDate = bucketStart(granularity, at);
  const next = shiftBucket(granularity, startDate, 1);
  return { startDate, endDate: new Date(next.getTime() - 1) };
}

/** `count` consecutive buckets ending with the one containing `asOf`, oldest first. */
export function trailingBuckets(granularity: CalendarGranularity, asOf: Date, count: number): DateRange[] {
  const last = bucketStart(granularity, asOf);
  const out: DateRange[] = [];
  for (let i = count - 1; i >= 0; i--) {
    out.push(bucketRange(granularity, shiftBucket(granularity, last, -i)));
  }
  return out;
}

export function isAlignedBucket(granularity: CalendarGranularity, range: DateRange): boolean {
  if (!isValidRange(range)) return false;
  const expected = bucketRange(granularity, range.startDate);
  return (
    expected.startDate.getTime() === range.startDate.getTime() &&
    expected.endDate.getTime() === range.endDate.getTime()
  );
}

// ── Periods ───────────────────────────────────────────────────────────────────

export function copyRange(range: DateRange): DateRange {
  return { startDate: new Date(range.startDate.getTime()), endDate: new Date(range.endDate.getTime()) };
}

export function resolvePeriod(period: RevenuePeriod, now: Date = new Date()): DateRange {
  if (period.granularity === 'custom') {
    assertValidRange(period.range, 'period');
    return copyRange(period.range);
  }
  const reference = period.reference ?? now;
  if (!isValidDate(reference)) {
    throw new ValidationError('period', 'Period reference is not a valid date', 'invalid_period');
  }
  return bucketRange(period.granularity, reference);
}

/** The preceding calendar bucket, or the same-length window right before a custom range. */
export function previousRange(period: RevenuePeriod, range: DateRange): DateRange {
  if (period.granularity === 'custom') {
    const length = range.endDate.getTime() - range.startDate.getTime();
    const endDate = new Date(range.startDate.getTime() - 1);
    return { startDate: new Date(endDate.getTime() - length), endDate };
  }
  return bucketRange(period.granularity, shiftBucket(period.granularity, range.startDate, -1));
}

/** Multiplier that turns a window's recurring revenue into a monthly figure. */
export function mrrFactor(period: RevenuePeriod, range: DateRange): Decimal {
  switch (period.granularity) {
    case 'monthly':
      return new Decimal(1);
    case 'quarterly':
      return new Decimal(1).dividedBy(3);
    case 'yearly':
      return new Decimal(1).dividedBy(12);
    case 'daily':
    case 'weekly':
    case 'custom':
      return new Decimal(POLICY.averageMonthDays).dividedBy(rangeDays(range));
    default: {
      const unreachable: never = period;
      throw new ValidationError('period', `Unknown period: ${JSON.stringify(unreachable)}`, 'invalid_period');
    }
  }
}

export function periodKey(period: RevenuePeriod, range: DateRange): string {
  return `${period.granularity}:${range.startDate.toISOString()}:${range.endDate.toISOString()}`;
}

/** The most recent calendar quarter that ended before `asOf`. */
export function lastCompletedQuarter(asOf: Date): DateRange {
  const current = bucketStart('quarterly', asOf);
  return bucketRange('quarterly', shiftBucket('quarterly', current, -1));
}
