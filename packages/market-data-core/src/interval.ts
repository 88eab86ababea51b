/**
 * Interval resolution.
 *
 * The VCI chart API serves three granularities. Every caller-facing interval
 * maps onto one of them; intervals coarser than their bucket carry a resample
 * rule that the bar normalizer applies after the fetch.
 */

import { Granularity, Interval, InvalidIntervalError, getAllIntervals, isInterval } from '@vnquote/contracts';

/**
 * Calendar rule used to rebucket provider bars.
 * - minute: fixed buckets of `size` minutes, labelled by their start
 * - week: Monday to Sunday, labelled by the Sunday
 * - month: calendar month, labelled by its last day
 */
export type ResampleRule =
  | { readonly unit: 'minute'; readonly size: number }
  | { readonly unit: 'week' }
  | { readonly unit: 'month' };

const GRANULARITY_BY_INTERVAL: Record<Interval, Granularity> = {
  [Interval.M1]: Granularity.MINUTE,
  [Interval.M5]: Granularity.MINUTE,
  [Interval.M15]: Granularity.MINUTE,
  [Interval.M30]: Granularity.MINUTE,
  [Interval.H1]: Granularity.HOUR,
  [Interval.D1]: Granularity.DAY,
  [Interval.W1]: Granularity.DAY,
  [Interval.MN1]: Granularity.DAY,
};

const RESAMPLE_RULES: Partial<Record<Interval, ResampleRule>> = {
  [Interval.M5]: { unit: 'minute', size: 5 },
  [Interval.M15]: { unit: 'minute', size: 15 },
  [Interval.M30]: { unit: 'minute', size: 30 },
  [Interval.W1]: { unit: 'week' },
  [Interval.MN1]: { unit: 'month' },
};

/**
 * Validate an interval label.
 *
 * @throws {InvalidIntervalError} Lists every supported label
 */
export function parseInterval(value: string): Interval {
  if (!isInterval(value)) {
    const validIntervals = getAllIntervals().map((interval) => String(interval));
    throw new InvalidIntervalError(
      `Invalid interval: ${value}. Valid values: ${validIntervals.join(', ')}`,
      { interval: value, validIntervals }
    );
  }
  return value;
}

/**
 * Map an interval label to the provider bucket it is fetched at.
 *
 * @example
 * ```typescript
 * resolveInterval('15m')  // Granularity.MINUTE
 * resolveInterval('1W')   // Granularity.DAY
 * resolveInterval('2h')   // throws InvalidIntervalError
 * ```
 */
export function resolveInterval(value: string): Granularity {
  return GRANULARITY_BY_INTERVAL[parseInterval(value)];
}

/**
 * Resample rule for an interval, or undefined when the provider returns it
 * natively (1m, 1H, 1D).
 */
export function resampleRuleFor(interval: Interval): ResampleRule | undefined {
  return RESAMPLE_RULES[interval];
}
