/**
 * Time window and lookback count.
 *
 * The chart endpoint has no start-date parameter: it takes an as-of timestamp
 * and a number of bars to count back from it. This module turns a calendar
 * range into that pair.
 */

import moment from 'moment-timezone';
import { z } from 'zod';
import { InvalidDateError, InvalidQueryError, InvalidRangeError } from '@vnquote/contracts';

/** Exchange time zone for HOSE, HNX and UPCoM */
export const MARKET_TIMEZONE = 'Asia/Ho_Chi_Minh';

export const DATE_FORMAT = 'YYYY-MM-DD';

/** Lookback used for labels with no derivation rule */
export const FALLBACK_COUNT_BACK = 30;

const MINUTES_PER_BUCKET: Record<string, number> = {
  '1m': 1,
  '5m': 5,
  '15m': 15,
  '30m': 30,
};

const dateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
  .refine((value) => moment(value, DATE_FORMAT, true).isValid(), 'not a calendar date');

const countBackSchema = z.number().int().min(1);

export interface TimeRangeInput {
  /** First day of the range, `YYYY-MM-DD` */
  start: string;
  /** Last day of the range, `YYYY-MM-DD`; defaults to the current time */
  end?: string;
  /** Interval label; derivation branches on the fine label */
  interval: string;
  /** Explicit lookback; skips derivation */
  countBack?: number;
  /** Clock override */
  now?: Date;
}

export interface TimeRange {
  /** Range start, epoch seconds */
  startTime: number;
  /** Unpadded range end, epoch seconds */
  endTime: number;
  /** As-of boundary sent to the provider: end plus one calendar day, epoch seconds */
  to: number;
  /** Bars to count back from `to`, at least 1 */
  countBack: number;
}

function parseDate(field: string, value: string): moment.Moment {
  const result = dateSchema.safeParse(value);
  if (!result.success) {
    const reason = result.error.issues.map((issue) => issue.message).join(', ');
    throw new InvalidDateError(`Invalid ${field} date "${value}": ${reason}`, { field, value });
  }
  return moment.tz(result.data, DATE_FORMAT, true, MARKET_TIMEZONE);
}

/**
 * Derive the lookback count for an interval label.
 *
 * Day, week and month counts are calendar differences between the unpadded
 * dates. Intraday counts are whole minutes or hours from `start` to the
 * padded as-of boundary (`end` plus one day), so a same-day range covers the
 * whole day. Results at or below zero are clamped to 1.
 */
export function deriveCountBack(
  start: moment.Moment,
  end: moment.Moment,
  interval: string
): number {
  const seconds = end.clone().add(1, 'day').unix() - start.unix();
  let count: number;

  switch (interval) {
    case '1D':
      count = end.diff(start, 'days');
      break;
    case '1W':
      count = Math.floor(end.diff(start, 'days') / 7);
      break;
    case '1M':
      count = (end.year() - start.year()) * 12 + (end.month() - start.month());
      break;
    case '1H':
      count = Math.floor(seconds / 3600);
      break;
    default: {
      const size = MINUTES_PER_BUCKET[interval];
      count = size === undefined ? FALLBACK_COUNT_BACK : Math.floor(Math.floor(seconds / 60) / size);
    }
  }

  return count <= 0 ? 1 : count;
}

/**
 * Compute the provider window for a calendar range.
 *
 * @throws {InvalidDateError} When `start` or `end` is not a `YYYY-MM-DD` date
 * @throws {InvalidRangeError} When `start` is after `end`
 * @throws {InvalidQueryError} When `countBack` is not a positive integer
 *
 * @example
 * ```typescript
 * computeTimeRange({ start: '2024-01-01', end: '2024-01-10', interval: '1D' });
 * // { startTime: 1704042000, endTime: 1704819600, to: 1704906000, countBack: 9 }
 * ```
 */
export function computeTimeRange(input: TimeRangeInput): TimeRange {
  const start = parseDate('start', input.start);
  const end =
    input.end === undefined
      ? moment.tz(input.now ?? new Date(), MARKET_TIMEZONE)
      : parseDate('end', input.end);

  if (input.end !== undefined && start.isAfter(end)) {
    throw new InvalidRangeError(`start cannot be after end: ${input.start} > ${input.end}`, {
      start: input.start,
      end: input.end,
    });
  }

  let countBack: number;
  if (input.countBack === undefined) {
    countBack = deriveCountBack(start, end, input.interval);
  } else if (countBackSchema.safeParse(input.countBack).success) {
    countBack = input.countBack;
  } else {
    throw new InvalidQueryError(`countBack must be a positive integer, got ${input.countBack}`, {
      field: 'countBack',
      value: input.countBack,
    });
  }

  return {
    startTime: start.unix(),
    endTime: end.unix(),
    to: end.clone().add(1, 'day').unix(),
    countBack,
  };
}
