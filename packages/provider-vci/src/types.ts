/**
 * @fileoverview Type definitions for the VCI provider.
 *
 * @module @vnquote/provider-vci/types
 */

import type { Granularity, Interval, SessionClock } from '@vnquote/contracts';
import type { Logger } from '@vnquote/logger';

/**
 * Endpoint families of the VCI trading API.
 */
export type RequestKind = 'bars' | 'ticks' | 'depth';

/**
 * Body of a chart request.
 */
export interface BarRequest {
  timeFrame: Granularity;
  symbols: [string];
  /** As-of boundary, epoch seconds */
  to: number;
  countBack: number;
}

/**
 * Body of a matched-trades request.
 */
export interface TickRequest {
  symbol: string;
  limit: number;
  /** Cursor from a previous page, or null for the latest page */
  truncTime: string | null;
}

/**
 * Body of a price-step request.
 */
export interface DepthRequest {
  symbol: string;
}

export interface TransportRequest {
  url: string;
  method: 'GET' | 'POST';
  headers: Readonly<Record<string, string>>;
  payload?: BarRequest | TickRequest | DepthRequest;
}

/**
 * Sends one request and resolves with the decoded JSON body.
 *
 * Implementations reject with `TransportError` on any failure.
 */
export type Transport = (request: TransportRequest) => Promise<unknown>;

/**
 * How a proxy is picked from `proxyList`.
 * - try: each proxy in order until one succeeds
 * - rotate: round robin across calls
 * - random: uniform pick per call
 * - single: always the first
 */
export type ProxyMode = 'try' | 'rotate' | 'random' | 'single';

/**
 * - direct: no proxy
 * - proxy: through an HTTP proxy from `proxyList`
 * - forward: POST the request description to `forwardProxyUrl`, which relays it
 */
export type RequestMode = 'direct' | 'proxy' | 'forward';

export interface ProxyConfig {
  proxyList?: readonly string[];
  proxyMode?: ProxyMode;
  requestMode?: RequestMode;
  forwardProxyUrl?: string;
}

/**
 * Options for building headers.
 */
export interface HeaderOptions {
  /** Pick a User-Agent from a small list instead of the fixed one */
  randomAgent?: boolean;
  /** Random source in [0, 1) */
  random?: () => number;
}

/**
 * Bar history query.
 *
 * @example
 * ```typescript
 * const query: HistoryQuery = { start: '2024-01-01', end: '2024-03-31', interval: '1W' };
 * ```
 */
export interface HistoryQuery {
  /** `YYYY-MM-DD` */
  start: string;
  /** `YYYY-MM-DD`; defaults to now */
  end?: string;
  /** @default '1D' */
  interval?: Interval | `${Interval}`;
  countBack?: number;
  /** Decimal digits prices are rounded to. @default 2 */
  floating?: number;
}

export interface IntradayQuery {
  /** @default 100 */
  pageSize?: number;
  /** Cursor returned in a previous page's `time` */
  lastTime?: string;
}

/**
 * Which public call a hook is observing.
 */
export type QuoteMethod = 'history' | 'intraday' | 'priceDepth';

export interface QuoteCallContext {
  readonly method: QuoteMethod;
  readonly symbol: string;
  readonly params: Readonly<Record<string, unknown>>;
}

/**
 * Observer invoked around every public quote call.
 * Hooks see results and errors but cannot replace them.
 */
export interface QuoteHook {
  before?(context: QuoteCallContext): void | Promise<void>;
  after?(context: QuoteCallContext, result: unknown): void | Promise<void>;
  onError?(context: QuoteCallContext, error: unknown): void | Promise<void>;
}

/**
 * Construction options for `VciQuote`.
 */
export interface VciQuoteOptions {
  /** Replaces the axios transport (tests, custom HTTP stacks) */
  transport?: Transport;
  /** Session clock for the intraday gate; defaults to the HOSE calendar */
  sessionClock?: SessionClock;
  proxy?: ProxyConfig;
  randomAgent?: boolean;
  /**
   * Whether this quote writes log entries.
   * @default true
   */
  showLog?: boolean;
  logger?: Logger;
  hooks?: readonly QuoteHook[];
  /** Clock for open-ended history ranges */
  now?: () => Date;
  /** Request timeout for the default transport */
  timeoutMs?: number;
}
