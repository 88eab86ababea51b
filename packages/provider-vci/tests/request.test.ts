import { describe, it, expect } from 'vitest';
import { Granularity } from '@vnquote/contracts';
import {
  buildBarRequest,
  buildDepthRequest,
  buildHeaders,
  buildTickRequest,
  endpointFor,
  DEFAULT_USER_AGENT,
  USER_AGENTS,
} from '../src/index.js';

describe('endpointFor', () => {
  it('resolves every endpoint under the trading API', () => {
    expect(endpointFor('bars')).toBe('https://trading.vietcap.com.vn/api/chart/OHLCChart/gap-chart');
    expect(endpointFor('ticks')).toBe('https://trading.vietcap.com.vn/api/market-watch/LEData/getAll');
    expect(endpointFor('depth')).toBe(
      'https://trading.vietcap.com.vn/api/market-watch/AccumulatedPriceStepVol/getSymbolData'
    );
  });

  it('accepts a base URL without a trailing slash', () => {
    expect(endpointFor('bars', 'http://relay.test/api')).toBe('http://relay.test/api/chart/OHLCChart/gap-chart');
  });
});

describe('request builders', () => {
  it('builds a chart request', () => {
    expect(buildBarRequest('VCB', Granularity.DAY, 1704906000, 9)).toEqual({
      timeFrame: 'ONE_DAY',
      symbols: ['VCB'],
      to: 1704906000,
      countBack: 9,
    });
  });

  it('builds a trades request with a null cursor by default', () => {
    expect(buildTickRequest('FPT', 100)).toEqual({ symbol: 'FPT', limit: 100, truncTime: null });
    expect(buildTickRequest('FPT', 50, '1709604000')).toEqual({
      symbol: 'FPT',
      limit: 50,
      truncTime: '1709604000',
    });
  });

  it('builds a depth request', () => {
    expect(buildDepthRequest('HPG')).toEqual({ symbol: 'HPG' });
  });
});

describe('buildHeaders', () => {
  it('identifies as a browser on the trading site', () => {
    const headers = buildHeaders();
    expect(headers['Referer']).toBe('https://trading.vietcap.com.vn/');
    expect(headers['Origin']).toBe('https://trading.vietcap.com.vn');
    expect(headers['Content-Type']).toBe('application/json');
    expect(headers['User-Agent']).toBe(DEFAULT_USER_AGENT);
  });

  it('picks a user agent from the list when asked', () => {
    expect(buildHeaders({ randomAgent: true, random: () => 0.99 })['User-Agent']).toBe(USER_AGENTS[4]);
    expect(buildHeaders({ randomAgent: true, random: () => 0 })['User-Agent']).toBe(USER_AGENTS[0]);
  });
});
