/**
 * @vnquote/market-data-core
 *
 * Interval resolution, lookback computation and bar resampling.
 */

export { parseInterval, resolveInterval, resampleRuleFor } from './interval.js';
export type { ResampleRule } from './interval.js';

export {
  MARKET_TIMEZONE,
  DATE_FORMAT,
  FALLBACK_COUNT_BACK,
  computeTimeRange,
  deriveCountBack,
} from './time-range.js';
export type { TimeRangeInput, TimeRange } from './time-range.js';

export { bucketLabel, resampleBars, tailRows } from './resample.js';
export type { OhlcvRow } from './resample.js';

export { isInterval } from '@vnquote/contracts';
