/**
 * @fileoverview Main entry point for @vnquote/contracts.
 *
 * Exports the types, enums and error classes shared by every vnquote package.
 *
 * @module @vnquote/contracts
 */

// Intervals
export {
  Interval,
  Granularity,
  isInterval,
  getAllIntervals,
  getIntervalLabel,
} from './intervals.js';

// Market data types
export type {
  AssetType,
  DataSource,
  Bar,
  Tick,
  MatchType,
  DepthLevel,
  FrameMeta,
  Frame,
  BarFrame,
  TickFrame,
  DepthFrame,
  DataStatus,
  MarketSessionStatus,
  SessionClock,
} from './market.js';

// Error classes and guards
export {
  QuoteError,
  InvalidSymbolError,
  InvalidIntervalError,
  InvalidRangeError,
  InvalidDateError,
  InvalidQueryError,
  SessionNotReadyError,
  EmptyResultError,
  MissingColumnsError,
  TransportError,
  isQuoteError,
  isInvalidSymbolError,
  isInvalidIntervalError,
  isInvalidRangeError,
  isInvalidDateError,
  isInvalidQueryError,
  isSessionNotReadyError,
  isEmptyResultError,
  isMissingColumnsError,
  isTransportError,
} from './errors.js';
