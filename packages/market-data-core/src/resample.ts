/**
 * Bar resampling.
 *
 * Rebuckets provider bars using standard OHLCV aggregation:
 * - Open = first bar's open
 * - High = max of all highs
 * - Low = min of all lows
 * - Close = last bar's close
 * - Volume = sum of all volumes
 *
 * Bucket boundaries are computed in the market time zone. Buckets with no
 * input bars are not emitted.
 */

import moment from 'moment-timezone';
import type { ResampleRule } from './interval.js';
import { MARKET_TIMEZONE } from './time-range.js';

/**
 * Bar keyed by epoch seconds, the shape bars have between parsing and
 * formatting.
 */
export interface OhlcvRow {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Label of the bucket that `timestamp` falls into, epoch seconds.
 */
export function bucketLabel(timestamp: number, rule: ResampleRule, timezone = MARKET_TIMEZONE): number {
  switch (rule.unit) {
    case 'minute': {
      const span = rule.size * 60;
      const local = moment.unix(timestamp).tz(timezone);
      const offset = local.utcOffset() * 60;
      return Math.floor((timestamp + offset) / span) * span - offset;
    }
    case 'week':
      return moment.unix(timestamp).tz(timezone).isoWeekday(7).startOf('day').unix();
    case 'month':
      return moment.unix(timestamp).tz(timezone).endOf('month').startOf('day').unix();
  }
}

/**
 * Aggregate bars into the buckets of `rule`.
 *
 * @param rows - Bars sorted ascending by timestamp
 * @returns One bar per non-empty bucket, ascending
 *
 * @example
 * ```typescript
 * // Five daily bars Mon 2024-01-01 .. Fri 2024-01-05
 * resampleBars(daily, { unit: 'week' });
 * // [{ timestamp: <Sun 2024-01-07 00:00 ICT>, open: mon.open, close: fri.close, ... }]
 * ```
 */
export function resampleBars(
  rows: readonly OhlcvRow[],
  rule: ResampleRule,
  timezone = MARKET_TIMEZONE
): OhlcvRow[] {
  const buckets = new Map<number, OhlcvRow>();

  for (const row of rows) {
    const label = bucketLabel(row.timestamp, rule, timezone);
    const current = buckets.get(label);
    if (current === undefined) {
      buckets.set(label, { ...row, timestamp: label });
      continue;
    }
    current.high = Math.max(current.high, row.high);
    current.low = Math.min(current.low, row.low);
    current.close = row.close;
    current.volume += row.volume;
  }

  return Array.from(buckets.values()).sort((a, b) => a.timestamp - b.timestamp);
}

/**
 * Keep the last `count` rows.
 */
export function tailRows<T>(rows: readonly T[], count: number): T[] {
  if (count <= 0) {
    return [];
  }
  return rows.slice(Math.max(rows.length - count, 0));
}
