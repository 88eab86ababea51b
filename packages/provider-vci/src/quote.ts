/**
 * @fileoverview VCI quote: price history, matched trades and price depth for
 * one instrument.
 *
 * @module @vnquote/provider-vci/quote
 */

import { EmptyResultError, InvalidQueryError } from '@vnquote/contracts';
import type { AssetType, BarFrame, DepthFrame, SessionClock, TickFrame } from '@vnquote/contracts';
import { createChildLogger, createLogger, createSilentLogger } from '@vnquote/logger';
import type { Logger } from '@vnquote/logger';
import { computeTimeRange, parseInterval, resolveInterval } from '@vnquote/market-data-core';
import { checkSession, createSessionClock } from '@vnquote/sessions-calendar';
import { getAssetType, normalizeSymbol, resolveSymbol } from '@vnquote/symbol-registry';
import { createAxiosTransport } from './client.js';
import { DATA_SOURCE, DEFAULT_PAGE_SIZE, PAGE_SIZE_WARNING_THRESHOLD } from './constants.js';
import { toJsonRecords } from './frame.js';
import { buildHeaders } from './headers.js';
import { runWithHooks } from './hooks.js';
import { normalizeBars, normalizeDepth, normalizeTicks } from './parser.js';
import { buildBarRequest, buildDepthRequest, buildTickRequest, endpointFor } from './request.js';
import type {
  BarRequest,
  DepthRequest,
  HistoryQuery,
  IntradayQuery,
  QuoteCallContext,
  QuoteHook,
  QuoteMethod,
  RequestKind,
  TickRequest,
  Transport,
  VciQuoteOptions,
} from './types.js';

interface QuoteConfig {
  readonly headers: Readonly<Record<string, string>>;
  readonly transport: Transport;
  readonly sessionClock: SessionClock;
  readonly logger: Logger;
  readonly hooks: readonly QuoteHook[];
  readonly now: () => Date;
}

/** Output selector: frames by default, JSON records with `toFrame: false` */
interface AsFrame {
  toFrame?: true;
}
interface AsJson {
  toFrame: false;
}
interface AsEither {
  toFrame?: boolean;
}

/**
 * Market data for one VCI instrument.
 *
 * Symbol, asset type, headers and transport are resolved once at
 * construction; the quote keeps no other state between calls.
 *
 * @example
 * ```typescript
 * const quote = new VciQuote('VCB');
 * const weekly = await quote.history({ start: '2024-01-01', end: '2024-03-31', interval: '1W' });
 * const trades = await quote.intraday({ pageSize: 500 });
 * const depthJson = await quote.priceDepth({ toFrame: false });
 * ```
 */
export class VciQuote {
  /** Provider code requests are sent with */
  readonly symbol: string;
  readonly assetType: AssetType;
  readonly source = DATA_SOURCE;

  private readonly config: QuoteConfig;

  /**
   * @throws {InvalidSymbolError} For an empty symbol or an unknown index name
   */
  constructor(symbol: string, options: VciQuoteOptions = {}) {
    const normalized = normalizeSymbol(symbol);
    this.symbol = resolveSymbol(normalized);
    this.assetType = getAssetType(normalized);

    const baseLogger =
      options.showLog === false ? createSilentLogger() : options.logger ?? createLogger({ level: 'warn' });
    const logger = createChildLogger(baseLogger, {
      component: 'vci-quote',
      symbol: this.symbol,
      source: DATA_SOURCE,
    });

    this.config = Object.freeze({
      headers: buildHeaders({ randomAgent: options.randomAgent ?? false }),
      transport:
        options.transport ??
        createAxiosTransport({ proxy: options.proxy, timeoutMs: options.timeoutMs, logger }),
      sessionClock: options.sessionClock ?? createSessionClock(),
      logger,
      hooks: Object.freeze([...(options.hooks ?? [])]),
      now: options.now ?? (() => new Date()),
    });
  }

  /**
   * Price bars over a calendar range. Not session-gated.
   *
   * @throws {InvalidIntervalError} For an unsupported interval label
   * @throws {InvalidDateError} For a malformed start or end
   * @throws {InvalidRangeError} When start is after end
   * @throws {EmptyResultError} When the provider returns no bars
   * @throws {TransportError}
   */
  history(query: HistoryQuery & AsFrame): Promise<BarFrame>;
  history(query: HistoryQuery & AsJson): Promise<string>;
  history(query: HistoryQuery & AsEither): Promise<BarFrame | string>;
  async history(query: HistoryQuery & AsEither): Promise<BarFrame | string> {
    return this.call('history', { ...query }, async () => {
      const label = query.interval ?? '1D';
      const granularity = resolveInterval(label);
      const interval = parseInterval(label);
      const range = computeTimeRange({
        start: query.start,
        end: query.end,
        interval,
        countBack: query.countBack,
        now: this.config.now(),
      });

      const body = await this.send(
        'bars',
        buildBarRequest(this.symbol, granularity, range.to, range.countBack)
      );
      if (!Array.isArray(body) || body.length === 0) {
        throw new EmptyResultError(`No price history returned for ${this.symbol}`, {
          symbol: this.symbol,
          interval,
        });
      }

      const frame = normalizeBars(body[0], {
        symbol: this.symbol,
        assetType: this.assetType,
        interval,
        floating: query.floating,
        countBack: range.countBack,
        logger: this.config.logger,
      });
      this.config.logger.debug('History fetched', {
        interval,
        countBack: range.countBack,
        rows: frame.rows.length,
      });

      return query.toFrame === false ? toJsonRecords(frame) : frame;
    });
  }

  /**
   * Matched trades, newest page first, in provider order.
   *
   * @throws {SessionNotReadyError} While the exchange prepares a session
   * @throws {InvalidQueryError} When `pageSize` is not a positive integer
   * @throws {TransportError}
   */
  intraday(query?: IntradayQuery & AsFrame): Promise<TickFrame>;
  intraday(query: IntradayQuery & AsJson): Promise<string>;
  intraday(query?: IntradayQuery & AsEither): Promise<TickFrame | string>;
  async intraday(query: IntradayQuery & AsEither = {}): Promise<TickFrame | string> {
    return this.call('intraday', { ...query }, async () => {
      checkSession(this.config.sessionClock());

      const pageSize = query.pageSize ?? DEFAULT_PAGE_SIZE;
      if (!Number.isInteger(pageSize) || pageSize < 1) {
        throw new InvalidQueryError(`pageSize must be a positive integer, got ${pageSize}`, {
          field: 'pageSize',
          value: pageSize,
        });
      }
      if (pageSize > PAGE_SIZE_WARNING_THRESHOLD) {
        this.config.logger.warn('Requesting a very large page of trades; the provider may reject or throttle it', {
          pageSize,
          threshold: PAGE_SIZE_WARNING_THRESHOLD,
        });
      }

      const body = await this.send('ticks', buildTickRequest(this.symbol, pageSize, query.lastTime));
      const frame = normalizeTicks(body, { symbol: this.symbol, assetType: this.assetType });
      if (frame.rows.length === 0) {
        this.config.logger.warn('No matched trades returned', { lastTime: query.lastTime });
      }

      return query.toFrame === false ? toJsonRecords(frame) : frame;
    });
  }

  /**
   * Accumulated volume per price step for the current session.
   *
   * @throws {SessionNotReadyError} While the exchange prepares a session
   * @throws {MissingColumnsError} When the payload is empty or lacks a price-step column
   * @throws {TransportError}
   */
  priceDepth(query?: AsFrame): Promise<DepthFrame>;
  priceDepth(query: AsJson): Promise<string>;
  priceDepth(query?: AsEither): Promise<DepthFrame | string>;
  async priceDepth(query: AsEither = {}): Promise<DepthFrame | string> {
    return this.call('priceDepth', { ...query }, async () => {
      checkSession(this.config.sessionClock());

      const body = await this.send('depth', buildDepthRequest(this.symbol));
      const frame = normalizeDepth(body, { symbol: this.symbol, assetType: this.assetType });

      return query.toFrame === false ? toJsonRecords(frame) : frame;
    });
  }

  private call<T>(method: QuoteMethod, params: Record<string, unknown>, run: () => Promise<T>): Promise<T> {
    const context: QuoteCallContext = Object.freeze({ method, symbol: this.symbol, params });
    return runWithHooks(this.config.hooks, this.config.logger, context, run);
  }

  private send(kind: RequestKind, payload: BarRequest | TickRequest | DepthRequest): Promise<unknown> {
    return this.config.transport({
      url: endpointFor(kind),
      method: 'POST',
      headers: this.config.headers,
      payload,
    });
  }
}
