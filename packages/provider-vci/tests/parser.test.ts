import { describe, it, expect } from 'vitest';
import Transport from 'winston-transport';
import { EmptyResultError, Interval, InvalidQueryError, MissingColumnsError, isMissingColumnsError } from '@vnquote/contracts';
import { createLogger } from '@vnquote/logger';
import { normalizeBars, normalizeDepth, normalizeTicks, toJsonRecords, formatMarketTime } from '../src/index.js';

/** 2024-01-02 00:00 UTC, 07:00 in market time */
const JAN_2 = 1704153600;
const DAY = 86_400;

const stock = { symbol: 'VCB', assetType: 'stock' as const };

class CaptureTransport extends Transport {
  readonly entries: Array<Record<string, unknown>> = [];

  log(info: Record<string, unknown>, next: () => void): void {
    this.entries.push(info);
    next();
  }
}

describe('formatMarketTime', () => {
  it('renders market time with its offset', () => {
    expect(formatMarketTime(JAN_2)).toBe('2024-01-02T07:00:00+07:00');
  });
});

describe('normalizeBars', () => {
  it('converts stock prices to thousand VND', () => {
    const frame = normalizeBars(
      { t: [JAN_2], o: [87500], h: [88100], l: [87200], c: [87900], v: [1520300] },
      { ...stock, interval: Interval.D1 }
    );

    expect(frame.columns).toEqual(['time', 'open', 'high', 'low', 'close', 'volume']);
    expect(frame.rows).toEqual([
      { time: '2024-01-02T07:00:00+07:00', open: 87.5, high: 88.1, low: 87.2, close: 87.9, volume: 1520300 },
    ]);
    expect(frame.meta).toEqual({ symbol: 'VCB', assetType: 'stock', source: 'VCI', interval: '1D' });
  });

  it('leaves index points unscaled and rounds them', () => {
    const frame = normalizeBars(
      { t: [JAN_2], o: [1130.456], h: [1135.1], l: [1128], c: [1131], v: [500000] },
      { symbol: 'VNINDEX', assetType: 'index', interval: Interval.D1 }
    );
    expect(frame.rows[0]?.open).toBe(1130.46);
    expect(frame.rows[0]?.low).toBe(1128);
  });

  it('rounds to the requested digits', () => {
    const frame = normalizeBars(
      { t: [JAN_2], o: [87500], h: [88100], l: [87200], c: [87900], v: [10] },
      { ...stock, interval: Interval.D1, floating: 0 }
    );
    expect(frame.rows[0]).toMatchObject({ open: 88, high: 88, low: 87, close: 88 });
  });

  it('rejects negative rounding digits', () => {
    expect(() =>
      normalizeBars({ t: [JAN_2], o: [1], h: [1], l: [1], c: [1], v: [1] }, { ...stock, interval: Interval.D1, floating: -1 })
    ).toThrow(InvalidQueryError);
  });

  it('sorts rows and keeps the last of duplicate timestamps', () => {
    const frame = normalizeBars(
      {
        t: [JAN_2 + DAY, JAN_2, JAN_2 + DAY],
        o: [2000, 1000, 3000],
        h: [2000, 1000, 3000],
        l: [2000, 1000, 3000],
        c: [2000, 1000, 3000],
        v: [1, 2, 3],
      },
      { ...stock, interval: Interval.D1 }
    );
    expect(frame.rows.map((row) => [row.time, row.open, row.volume])).toEqual([
      ['2024-01-02T07:00:00+07:00', 1, 2],
      ['2024-01-03T07:00:00+07:00', 3, 3],
    ]);
  });

  it('accepts numeric strings and drops rows with missing values', () => {
    const frame = normalizeBars(
      { t: ['1704153600', JAN_2 + DAY], o: ['1500', null], h: ['1600', 1], l: ['1400', 1], c: ['1550', 1], v: ['99', 1] },
      { ...stock, interval: Interval.D1 }
    );
    expect(frame.rows).toEqual([
      { time: '2024-01-02T07:00:00+07:00', open: 1.5, high: 1.6, low: 1.4, close: 1.55, volume: 99 },
    ]);
  });

  it('warns with the number of dropped rows', async () => {
    const logger = createLogger({ level: 'debug', json: true, console: false });
    const capture = new CaptureTransport();
    logger.add(capture);

    normalizeBars(
      { t: [JAN_2, JAN_2 + DAY, JAN_2 + 2 * DAY], o: [1000, 'n/a', 1000], h: [1000, 1000, 1000], l: [1000, 1000, 1000], c: [1000, 1000, null], v: [1, 1, 1] },
      { ...stock, interval: Interval.D1, logger }
    );
    await new Promise((resolve) => setImmediate(resolve));

    expect(capture.entries).toHaveLength(1);
    expect(capture.entries[0]?.['level']).toBe('warn');
    expect(capture.entries[0]?.['message']).toBe('Dropped bars with non-numeric fields');
    expect(capture.entries[0]?.['dropped']).toBe(2);
    expect(capture.entries[0]?.['received']).toBe(3);
  });

  it('keeps only the last countBack rows', () => {
    const t = [0, 1, 2, 3, 4].map((i) => JAN_2 + i * DAY);
    const values = [1000, 2000, 3000, 4000, 5000];
    const frame = normalizeBars(
      { t, o: values, h: values, l: values, c: values, v: [1, 1, 1, 1, 1] },
      { ...stock, interval: Interval.D1, countBack: 3 }
    );
    expect(frame.rows).toHaveLength(3);
    expect(frame.rows.map((row) => row.close)).toEqual([3, 4, 5]);
  });

  it('resamples daily bars into weeks labelled by the Sunday', () => {
    const t = [0, 1, 2, 3].map((i) => JAN_2 - DAY + i * DAY);
    const frame = normalizeBars(
      { t, o: [1000, 1100, 1200, 1300], h: [1500, 1400, 1600, 1350], l: [900, 1000, 1100, 1250], c: [1100, 1200, 1300, 1320], v: [10, 20, 30, 40] },
      { ...stock, interval: Interval.W1 }
    );
    expect(frame.rows).toEqual([
      { time: '2024-01-07T00:00:00+07:00', open: 1, high: 1.6, low: 0.9, close: 1.32, volume: 100 },
    ]);
    expect(frame.meta.interval).toBe('1W');
  });

  it('fails on an empty payload', () => {
    expect(() => normalizeBars({ t: [], o: [], h: [], l: [], c: [], v: [] }, { ...stock, interval: Interval.D1 })).toThrow(
      EmptyResultError
    );
    expect(() => normalizeBars(undefined, { ...stock, interval: Interval.D1 })).toThrow(EmptyResultError);
  });

  it('lists missing provider columns', () => {
    let caught: unknown;
    try {
      normalizeBars({ t: [JAN_2], o: [1], h: [1], l: [1], c: [1] }, { ...stock, interval: Interval.D1 });
    } catch (error) {
      caught = error;
    }
    expect(isMissingColumnsError(caught)).toBe(true);
    if (isMissingColumnsError(caught)) {
      expect(caught.data?.['missing']).toEqual(['v']);
    }
  });

  it('returns frozen rows', () => {
    const frame = normalizeBars(
      { t: [JAN_2], o: [1], h: [1], l: [1], c: [1], v: [1] },
      { ...stock, interval: Interval.D1 }
    );
    expect(Object.isFrozen(frame)).toBe(true);
    expect(Object.isFrozen(frame.rows)).toBe(true);
    expect(Object.isFrozen(frame.rows[0])).toBe(true);
  });
});

describe('normalizeTicks', () => {
  const trade = (matchType: string, id: number) => ({
    truncTime: '1709604000',
    matchPrice: 87500,
    matchVol: '300',
    matchType,
    id: String(id),
    extra: 'ignored',
  });

  it('renames columns and maps match types in provider order', () => {
    const frame = normalizeTicks([trade('b', 3), trade('s', 2), trade('unknown', 1), trade('x', 0)], stock);

    expect(frame.columns).toEqual(['time', 'price', 'volume', 'matchType', 'id']);
    expect(frame.rows.map((row) => row.matchType)).toEqual(['Buy', 'Sell', 'ATO/ATC', 'x']);
    expect(frame.rows[0]).toEqual({
      time: '2024-03-05T09:00:00+07:00',
      price: 87500,
      volume: 300,
      matchType: 'Buy',
      id: 3,
    });
    expect(frame.meta).toEqual({ symbol: 'VCB', assetType: 'stock', source: 'VCI' });
  });

  it('reads ISO timestamps in market time', () => {
    const frame = normalizeTicks([{ ...trade('b', 1), truncTime: '2024-03-05T09:15:00' }], stock);
    expect(frame.rows[0]?.time).toBe('2024-03-05T09:15:00+07:00');
  });

  it('returns an empty frame for no trades', () => {
    expect(normalizeTicks([], stock).rows).toEqual([]);
    expect(normalizeTicks(null, stock).rows).toEqual([]);
  });

  it('lists missing provider columns', () => {
    const { id: _id, ...withoutId } = trade('b', 1);
    expect(() => normalizeTicks([withoutId], stock)).toThrow(
      'Intraday records for VCB are missing columns: id'
    );
  });
});

describe('normalizeDepth', () => {
  const step = {
    priceStep: 87500,
    accumulatedVolume: 1200,
    accumulatedBuyVolume: 700,
    accumulatedSellVolume: 500,
    accumulatedUndefinedVolume: 0,
    symbol: 'VCB',
  };

  it('keeps and renames the mapped columns', () => {
    const frame = normalizeDepth([step], stock);
    expect(frame.rows).toEqual([
      { price: 87500, volume: 1200, buyVolume: 700, sellVolume: 500, undefinedVolume: 0 },
    ]);
    expect(toJsonRecords(frame)).toBe(
      '[{"price":87500,"volume":1200,"buyVolume":700,"sellVolume":500,"undefinedVolume":0}]'
    );
  });

  it('fails on an empty payload, listing every column', () => {
    let caught: unknown;
    try {
      normalizeDepth([], stock);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(MissingColumnsError);
    if (isMissingColumnsError(caught)) {
      expect(caught.data?.['missing']).toEqual([
        'priceStep',
        'accumulatedVolume',
        'accumulatedBuyVolume',
        'accumulatedSellVolume',
        'accumulatedUndefinedVolume',
      ]);
    }
  });

  it('fails when a record lacks a mapped key', () => {
    const { accumulatedSellVolume: _sell, ...partial } = step;
    expect(() => normalizeDepth([step, partial], stock)).toThrow(
      'Price depth for VCB is missing columns: accumulatedSellVolume'
    );
  });
});
