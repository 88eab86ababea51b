/**
 * @fileoverview Interval enumeration and provider granularity buckets.
 *
 * Intervals are the fine-grained labels callers request. The VCI chart API
 * only understands three coarse granularities, so several intervals share a
 * bucket and are resampled after the fetch.
 *
 * @module @vnquote/contracts/intervals
 */

/**
 * Supported bar intervals.
 *
 * @invariant ordered from smallest to largest duration
 * @invariant string values are the labels callers pass in
 */
export enum Interval {
  /** 1-minute bars */
  M1 = '1m',
  /** 5-minute bars (resampled from 1m) */
  M5 = '5m',
  /** 15-minute bars (resampled from 1m) */
  M15 = '15m',
  /** 30-minute bars (resampled from 1m) */
  M30 = '30m',
  /** Hourly bars */
  H1 = '1H',
  /** Daily bars */
  D1 = '1D',
  /** Weekly bars (resampled from 1D) */
  W1 = '1W',
  /** Monthly bars (resampled from 1D) */
  MN1 = '1M',
}

/**
 * Provider-native granularity buckets, as sent in the `timeFrame` field.
 */
export enum Granularity {
  MINUTE = 'ONE_MINUTE',
  HOUR = 'ONE_HOUR',
  DAY = 'ONE_DAY',
}

const INTERVAL_LABELS: Record<Interval, string> = {
  [Interval.M1]: '1 Minute',
  [Interval.M5]: '5 Minutes',
  [Interval.M15]: '15 Minutes',
  [Interval.M30]: '30 Minutes',
  [Interval.H1]: '1 Hour',
  [Interval.D1]: 'Daily',
  [Interval.W1]: 'Weekly',
  [Interval.MN1]: 'Monthly',
};

/**
 * Validates whether a string is a valid Interval value.
 *
 * Matching is case-sensitive: `1m` is one minute, `1M` is one month.
 *
 * @example
 * ```typescript
 * isInterval('15m')  // true
 * isInterval('1h')   // false
 * ```
 */
export function isInterval(value: string): value is Interval {
  return getAllIntervals().some((interval) => interval === value);
}

/**
 * Returns all supported intervals in ascending order.
 */
export function getAllIntervals(): Interval[] {
  return [
    Interval.M1,
    Interval.M5,
    Interval.M15,
    Interval.M30,
    Interval.H1,
    Interval.D1,
    Interval.W1,
    Interval.MN1,
  ];
}

/**
 * Gets a human-readable label for an interval.
 */
export function getIntervalLabel(interval: Interval): string {
  return INTERVAL_LABELS[interval];
}
