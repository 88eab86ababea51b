/**
 * @fileoverview Market data rows, frames and session status.
 *
 * Pure data shapes shared by the provider, the normalizers and the CLI.
 * Frames are the tabular output of one call: ordered rows plus the metadata
 * every row is tagged with.
 *
 * @module @vnquote/contracts/market
 */

import type { Interval } from './intervals.js';

/**
 * Instrument classification used to tag output and pick price scaling.
 */
export type AssetType = 'index' | 'stock' | 'derivative' | 'covered_warrant' | 'etf' | 'unknown';

/**
 * Data source identifier.
 */
export type DataSource = 'VCI';

/**
 * One OHLCV bar.
 *
 * @invariant high >= low
 * @invariant volume is a non-negative integer
 *
 * @example
 * ```typescript
 * const bar: Bar = {
 *   time: '2024-01-02T00:00:00+07:00',
 *   open: 87.5,
 *   high: 88.1,
 *   low: 87.2,
 *   close: 87.9,
 *   volume: 1520300
 * };
 * ```
 */
export interface Bar {
  /** ISO 8601 bucket start, market time (+07:00) */
  time: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Side of a matched trade. The provider reports `b`, `s` or `unknown`
 * (opening and closing auctions); unmapped codes pass through.
 */
export type MatchType = 'Buy' | 'Sell' | 'ATO/ATC' | (string & {});

/**
 * One matched trade.
 */
export interface Tick {
  /** ISO 8601 match time, market time (+07:00) */
  time: string;
  price: number;
  volume: number;
  matchType: MatchType;
  id: number;
}

/**
 * Accumulated volume at one price step of the order book.
 */
export interface DepthLevel {
  price: number;
  volume: number;
  buyVolume: number;
  sellVolume: number;
  undefinedVolume: number;
}

/**
 * Metadata every row in a frame is tagged with.
 */
export interface FrameMeta {
  symbol: string;
  assetType: AssetType;
  source: DataSource;
  /** Present on bar frames only */
  interval?: Interval;
}

/**
 * Tabular output of a single call.
 *
 * @invariant every row has exactly the keys listed in `columns`
 */
export interface Frame<Row> {
  readonly columns: readonly (keyof Row & string)[];
  readonly rows: readonly Readonly<Row>[];
  readonly meta: Readonly<FrameMeta>;
}

export type BarFrame = Frame<Bar>;
export type TickFrame = Frame<Tick>;
export type DepthFrame = Frame<DepthLevel>;

/**
 * Data availability during the trading day.
 * - 'preparing': the exchange is resetting for a new session; intraday data is unavailable
 * - 'realtime': the current session's data is live
 * - 'historical': only completed sessions are available
 */
export type DataStatus = 'preparing' | 'realtime' | 'historical';

/**
 * Read-only snapshot of the exchange session clock.
 */
export interface MarketSessionStatus {
  isTradingHour: boolean;
  /** Session name (e.g. 'preparing', 'continuous', 'lunch_break') */
  tradingSession: string;
  dataStatus: DataStatus;
  /** Clock reading, formatted `YYYY-MM-DD HH:mm:ss` in market time */
  time: string;
}

/**
 * Source of session status snapshots.
 */
export type SessionClock = () => MarketSessionStatus;
