/**
 * @fileoverview VCI (Vietcap) market data provider.
 *
 * Fetches price bars, matched trades and price-step depth from the VCI
 * trading API and normalizes them into frames.
 *
 * @module @vnquote/provider-vci
 * @example
 * ```typescript
 * import { VciQuote } from '@vnquote/provider-vci';
 *
 * const quote = new VciQuote('VNINDEX');
 * const daily = await quote.history({ start: '2024-01-01', end: '2024-01-31' });
 * console.log(daily.rows.at(-1));
 * ```
 */

export { VciQuote } from './quote.js';

export { createAxiosTransport, toAxiosProxy } from './client.js';
export type { AxiosTransportOptions } from './client.js';
export { mapTransportError } from './errors.js';

export { buildHeaders, DEFAULT_USER_AGENT, USER_AGENTS } from './headers.js';
export { buildBarRequest, buildTickRequest, buildDepthRequest, endpointFor } from './request.js';

export {
  normalizeBars,
  normalizeTicks,
  normalizeDepth,
  mapMatchType,
  castNumber,
  formatMarketTime,
} from './parser.js';
export type { NormalizeOptions, BarNormalizeOptions } from './parser.js';

export { createFrame, toJsonRecords } from './frame.js';
export { runWithHooks, createTimingHook } from './hooks.js';

export {
  BASE_URL,
  CHART_PATH,
  INTRADAY_PATH,
  TICK_PATH,
  DEPTH_PATH,
  DATA_SOURCE,
  OHLC_COLUMN_MAP,
  OHLC_DTYPE_MAP,
  INTRADAY_COLUMN_MAP,
  INTRADAY_DTYPE_MAP,
  MATCH_TYPE_MAP,
  PRICE_DEPTH_COLUMN_MAP,
  PAGE_SIZE_WARNING_THRESHOLD,
  DEFAULT_PAGE_SIZE,
  DEFAULT_FLOATING,
  PRICE_SCALE,
} from './constants.js';
export type { ColumnType } from './constants.js';

export type {
  RequestKind,
  BarRequest,
  TickRequest,
  DepthRequest,
  TransportRequest,
  Transport,
  ProxyMode,
  RequestMode,
  ProxyConfig,
  HeaderOptions,
  HistoryQuery,
  IntradayQuery,
  QuoteMethod,
  QuoteCallContext,
  QuoteHook,
  VciQuoteOptions,
} from './types.js';
