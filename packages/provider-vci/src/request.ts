/**
 * @fileoverview Request payload builders.
 *
 * Pure functions of already-validated inputs.
 *
 * @module @vnquote/provider-vci/request
 */

import type { Granularity } from '@vnquote/contracts';
import { BASE_URL, CHART_PATH, DEPTH_PATH, TICK_PATH } from './constants.js';
import type { BarRequest, DepthRequest, RequestKind, TickRequest } from './types.js';

const PATHS: Record<RequestKind, string> = {
  bars: CHART_PATH,
  ticks: TICK_PATH,
  depth: DEPTH_PATH,
};

/**
 * Full URL of an endpoint.
 *
 * @example
 * ```typescript
 * endpointFor('bars');
 * // 'https://trading.vietcap.com.vn/api/chart/OHLCChart/gap-chart'
 * ```
 */
export function endpointFor(kind: RequestKind, baseUrl: string = BASE_URL): string {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  return `${base}${PATHS[kind]}`;
}

export function buildBarRequest(
  symbol: string,
  granularity: Granularity,
  to: number,
  countBack: number
): BarRequest {
  return { timeFrame: granularity, symbols: [symbol], to, countBack };
}

export function buildTickRequest(symbol: string, pageSize: number, lastTime?: string): TickRequest {
  return { symbol, limit: pageSize, truncTime: lastTime ?? null };
}

export function buildDepthRequest(symbol: string): DepthRequest {
  return { symbol };
}
