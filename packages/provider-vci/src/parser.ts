/**
 * @fileoverview Normalizers for VCI chart, matched-trade and price-step payloads.
 *
 * Renames provider columns to canonical ones, casts values, and returns
 * frozen frames tagged with the symbol, asset type and source.
 *
 * @module @vnquote/provider-vci/parser
 */

import moment from 'moment-timezone';
import { EmptyResultError, InvalidQueryError, MissingColumnsError } from '@vnquote/contracts';
import type {
  AssetType,
  Bar,
  BarFrame,
  DepthFrame,
  DepthLevel,
  Interval,
  MatchType,
  Tick,
  TickFrame,
} from '@vnquote/contracts';
import { MARKET_TIMEZONE, resampleBars, resampleRuleFor, tailRows } from '@vnquote/market-data-core';
import type { OhlcvRow } from '@vnquote/market-data-core';
import type { Logger } from '@vnquote/logger';
import {
  DATA_SOURCE,
  DEFAULT_FLOATING,
  INTRADAY_COLUMN_MAP,
  INTRADAY_DTYPE_MAP,
  MATCH_TYPE_MAP,
  OHLC_COLUMN_MAP,
  OHLC_DTYPE_MAP,
  PRICE_DEPTH_COLUMN_MAP,
  PRICE_SCALE,
  UNSCALED_ASSET_TYPES,
} from './constants.js';
import { createFrame } from './frame.js';

export interface NormalizeOptions {
  /** Provider code the rows are tagged with */
  symbol: string;
  assetType: AssetType;
}

export interface BarNormalizeOptions extends NormalizeOptions {
  interval: Interval;
  /** Decimal digits for prices. @default 2 */
  floating?: number;
  /** Keep only this many most recent rows */
  countBack?: number;
  /** Receives a warning when rows with non-numeric fields are dropped */
  logger?: Logger;
}

const BAR_COLUMNS: readonly (keyof Bar)[] = ['time', 'open', 'high', 'low', 'close', 'volume'];
const TICK_COLUMNS: readonly (keyof Tick)[] = ['time', 'price', 'volume', 'matchType', 'id'];
const DEPTH_COLUMNS: readonly (keyof DepthLevel)[] = [
  'price',
  'volume',
  'buyVolume',
  'sellVolume',
  'undefinedVolume',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    return Number(value);
  }
  return Number.NaN;
}

/**
 * Cast a provider value to a numeric column type.
 */
export function castNumber(value: unknown, dtype: 'float64' | 'int64'): number {
  const number = toNumber(value);
  return dtype === 'int64' ? Math.trunc(number) : number;
}

/**
 * Epoch seconds as an ISO 8601 string in market time.
 *
 * @example
 * ```typescript
 * formatMarketTime(1704153600);  // '2024-01-02T07:00:00+07:00'
 * ```
 */
export function formatMarketTime(epochSeconds: number): string {
  return moment.unix(epochSeconds).tz(MARKET_TIMEZONE).format();
}

/**
 * Cast a provider timestamp: epoch seconds (number or numeric string), or
 * an ISO 8601 string read in market time. Unparseable strings pass through.
 */
function castTime(value: unknown): string {
  const seconds = toNumber(value);
  if (Number.isFinite(seconds)) {
    return formatMarketTime(Math.trunc(seconds));
  }
  const text = String(value);
  const parsed = moment.tz(text, moment.ISO_8601, MARKET_TIMEZONE);
  return parsed.isValid() ? parsed.format() : text;
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Provider keys absent from any record, in map order.
 */
function findMissingKeys(records: readonly unknown[], keys: readonly string[]): string[] {
  return keys.filter((key) => records.some((record) => !isRecord(record) || !(key in record)));
}

function columnValues(payload: Record<string, unknown>, key: string): readonly unknown[] {
  const values = payload[key];
  return Array.isArray(values) ? values : [];
}

/**
 * Normalize a chart payload into bars.
 *
 * The payload is columnar: one array per provider key (`t`, `o`, `h`, `l`,
 * `c`, `v`), with `t` in epoch seconds. Rows are sorted ascending with
 * duplicate timestamps collapsed (last wins), resampled when the interval is
 * coarser than the provider bucket, then cut to the last `countBack` rows.
 * Prices of asset types other than index and derivative are converted from
 * VND to thousand VND.
 *
 * @throws {EmptyResultError} When the payload is missing or holds no rows
 * @throws {MissingColumnsError} When a provider column is absent
 * @throws {InvalidQueryError} When `floating` is not a non-negative integer
 *
 * @example
 * ```typescript
 * const frame = normalizeBars(
 *   { t: [1704153600], o: [87500], h: [88100], l: [87200], c: [87900], v: [1520300] },
 *   { symbol: 'VCB', assetType: 'stock', interval: Interval.D1 }
 * );
 * // frame.rows[0] → { time: '2024-01-02T07:00:00+07:00', open: 87.5, high: 88.1, ... }
 * ```
 */
export function normalizeBars(payload: unknown, options: BarNormalizeOptions): BarFrame {
  const { symbol, assetType, interval, floating = DEFAULT_FLOATING, countBack, logger } = options;

  if (!Number.isInteger(floating) || floating < 0) {
    throw new InvalidQueryError(`floating must be a non-negative integer, got ${floating}`, {
      field: 'floating',
      value: floating,
    });
  }

  if (!isRecord(payload)) {
    throw new EmptyResultError(`No price history returned for ${symbol}`, { symbol, interval });
  }

  const sourceKeys = Object.keys(OHLC_COLUMN_MAP);
  const missing = sourceKeys.filter((key) => !Array.isArray(payload[key]));
  if (missing.length > 0) {
    throw new MissingColumnsError(`Chart payload for ${symbol} is missing columns: ${missing.join(', ')}`, {
      missing,
      symbol,
    });
  }

  const times = columnValues(payload, 't');
  if (times.length === 0) {
    throw new EmptyResultError(`No price history returned for ${symbol}`, { symbol, interval });
  }

  const opens = columnValues(payload, 'o');
  const highs = columnValues(payload, 'h');
  const lows = columnValues(payload, 'l');
  const closes = columnValues(payload, 'c');
  const volumes = columnValues(payload, 'v');
  const scale = UNSCALED_ASSET_TYPES.has(assetType) ? 1 : PRICE_SCALE;
  const price = (value: unknown): number =>
    roundTo(castNumber(value, OHLC_DTYPE_MAP.open) / scale, floating);

  const byTimestamp = new Map<number, OhlcvRow>();
  let dropped = 0;
  times.forEach((time, i) => {
    const row: OhlcvRow = {
      timestamp: castNumber(time, 'int64'),
      open: price(opens[i]),
      high: price(highs[i]),
      low: price(lows[i]),
      close: price(closes[i]),
      volume: castNumber(volumes[i], OHLC_DTYPE_MAP.volume),
    };
    if (Object.values(row).every((value) => Number.isFinite(value))) {
      byTimestamp.set(row.timestamp, row);
    } else {
      dropped += 1;
    }
  });

  if (dropped > 0) {
    logger?.warn('Dropped bars with non-numeric fields', { dropped, received: times.length });
  }

  if (byTimestamp.size === 0) {
    throw new EmptyResultError(`No valid bars returned for ${symbol}`, { symbol, interval });
  }

  let rows = Array.from(byTimestamp.values()).sort((a, b) => a.timestamp - b.timestamp);

  const rule = resampleRuleFor(interval);
  if (rule !== undefined) {
    rows = resampleBars(rows, rule);
  }

  if (countBack !== undefined) {
    rows = tailRows(rows, countBack);
  }

  const bars: Bar[] = rows.map((row) => ({
    time: formatMarketTime(row.timestamp),
    open: row.open,
    high: row.high,
    low: row.low,
    close: row.close,
    volume: row.volume,
  }));

  return createFrame(BAR_COLUMNS, bars, { symbol, assetType, source: DATA_SOURCE, interval });
}

/**
 * Map a provider match-type code to the reported side.
 */
export function mapMatchType(code: unknown): MatchType {
  const text = String(code);
  return MATCH_TYPE_MAP[text] ?? text;
}

/**
 * Normalize matched-trade records into ticks, in provider order.
 *
 * A missing or empty list gives an empty frame.
 *
 * @throws {MissingColumnsError} When a record lacks a provider key
 * @throws {EmptyResultError} When the payload is not a list
 */
export function normalizeTicks(records: unknown, options: NormalizeOptions): TickFrame {
  const { symbol, assetType } = options;
  const meta = { symbol, assetType, source: DATA_SOURCE } as const;

  if (records === null || records === undefined) {
    return createFrame<Tick>(TICK_COLUMNS, [], meta);
  }
  if (!Array.isArray(records)) {
    throw new EmptyResultError(`Unexpected intraday payload for ${symbol}`, { symbol });
  }

  const missing = findMissingKeys(records, Object.keys(INTRADAY_COLUMN_MAP));
  if (missing.length > 0) {
    throw new MissingColumnsError(`Intraday records for ${symbol} are missing columns: ${missing.join(', ')}`, {
      missing,
      symbol,
    });
  }

  const ticks: Tick[] = records.filter(isRecord).map((record) => ({
    time: castTime(record['truncTime']),
    price: castNumber(record['matchPrice'], INTRADAY_DTYPE_MAP.price),
    volume: castNumber(record['matchVol'], INTRADAY_DTYPE_MAP.volume),
    matchType: mapMatchType(record['matchType']),
    id: castNumber(record['id'], INTRADAY_DTYPE_MAP.id),
  }));

  return createFrame(TICK_COLUMNS, ticks, meta);
}

/**
 * Normalize price-step records into depth levels.
 *
 * Only mapped keys are kept; every mapped key must be present in every record.
 *
 * @throws {MissingColumnsError} When the payload is empty or a record lacks a mapped key
 */
export function normalizeDepth(
  records: unknown,
  options: NormalizeOptions,
  columnMap: Readonly<Record<string, keyof DepthLevel>> = PRICE_DEPTH_COLUMN_MAP
): DepthFrame {
  const { symbol, assetType } = options;
  const sourceKeys = Object.keys(columnMap);
  const list: readonly unknown[] = Array.isArray(records) ? records : [];

  const missing = list.length === 0 ? sourceKeys : findMissingKeys(list, sourceKeys);
  if (missing.length > 0) {
    throw new MissingColumnsError(`Price depth for ${symbol} is missing columns: ${missing.join(', ')}`, {
      missing,
      symbol,
    });
  }

  const levels: DepthLevel[] = list.filter(isRecord).map((record) => {
    const level: DepthLevel = { price: 0, volume: 0, buyVolume: 0, sellVolume: 0, undefinedVolume: 0 };
    for (const [sourceKey, column] of Object.entries(columnMap)) {
      level[column] = castNumber(record[sourceKey], 'float64');
    }
    return level;
  });

  return createFrame(DEPTH_COLUMNS, levels, { symbol, assetType, source: DATA_SOURCE });
}
