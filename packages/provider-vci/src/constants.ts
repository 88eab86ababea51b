/**
 * @fileoverview VCI endpoints, column maps and limits.
 *
 * @module @vnquote/provider-vci/constants
 */

import type { AssetType, Bar, DepthLevel, Tick } from '@vnquote/contracts';

export const BASE_URL = 'https://trading.vietcap.com.vn/api/';

export const CHART_PATH = 'chart/OHLCChart/gap-chart';
export const INTRADAY_PATH = 'market-watch';
export const TICK_PATH = `${INTRADAY_PATH}/LEData/getAll`;
export const DEPTH_PATH = `${INTRADAY_PATH}/AccumulatedPriceStepVol/getSymbolData`;

export const DATA_SOURCE = 'VCI';

/**
 * Column storage types used when casting provider values.
 */
export type ColumnType = 'datetime' | 'float64' | 'int64' | 'string';

/** Chart payload key → bar column */
export const OHLC_COLUMN_MAP = {
  t: 'time',
  o: 'open',
  h: 'high',
  l: 'low',
  c: 'close',
  v: 'volume',
} as const satisfies Record<string, keyof Bar>;

export const OHLC_DTYPE_MAP = {
  time: 'datetime',
  open: 'float64',
  high: 'float64',
  low: 'float64',
  close: 'float64',
  volume: 'int64',
} as const satisfies Record<keyof Bar, ColumnType>;

/** Matched-trade record key → tick column */
export const INTRADAY_COLUMN_MAP = {
  truncTime: 'time',
  matchPrice: 'price',
  matchVol: 'volume',
  matchType: 'matchType',
  id: 'id',
} as const satisfies Record<string, keyof Tick>;

export const INTRADAY_DTYPE_MAP = {
  time: 'datetime',
  price: 'float64',
  volume: 'int64',
  matchType: 'string',
  id: 'int64',
} as const satisfies Record<keyof Tick, ColumnType>;

/** Provider match-type code → reported side */
export const MATCH_TYPE_MAP: Readonly<Record<string, string>> = {
  b: 'Buy',
  s: 'Sell',
  unknown: 'ATO/ATC',
};

/** Price-step record key → depth column */
export const PRICE_DEPTH_COLUMN_MAP: Readonly<Record<string, keyof DepthLevel>> = {
  priceStep: 'price',
  accumulatedVolume: 'volume',
  accumulatedBuyVolume: 'buyVolume',
  accumulatedSellVolume: 'sellVolume',
  accumulatedUndefinedVolume: 'undefinedVolume',
};

/** Asset types the chart API already quotes in output units */
export const UNSCALED_ASSET_TYPES: ReadonlySet<AssetType> = new Set<AssetType>(['index', 'derivative']);

/** Chart prices for other asset types are in VND; output is thousand VND */
export const PRICE_SCALE = 1000;

export const DEFAULT_FLOATING = 2;
export const DEFAULT_PAGE_SIZE = 100;

/** Page sizes above this are allowed but logged as a warning */
export const PAGE_SIZE_WARNING_THRESHOLD = 30_000;

export const DEFAULT_TIMEOUT_MS = 30_000;
