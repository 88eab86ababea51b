import { describe, it, expect } from 'vitest';
import { InvalidDateError, InvalidQueryError, isInvalidDateError } from '@vnquote/contracts';
import { computeTimeRange, FALLBACK_COUNT_BACK } from '../src/index.js';

describe('computeTimeRange', () => {
  it('pads the end by one day and counts whole days', () => {
    expect(computeTimeRange({ start: '2024-01-01', end: '2024-01-10', interval: '1D' })).toEqual({
      startTime: 1704042000,
      endTime: 1704819600,
      to: 1704906000,
      countBack: 9,
    });
  });

  it('clamps a same-day range to one bar', () => {
    expect(computeTimeRange({ start: '2024-01-01', end: '2024-01-01', interval: '1D' }).countBack).toBe(1);
    expect(computeTimeRange({ start: '2024-01-01', end: '2024-01-01', interval: '1W' }).countBack).toBe(1);
  });

  it('counts weeks by integer division of days', () => {
    expect(computeTimeRange({ start: '2024-01-01', end: '2024-01-20', interval: '1W' }).countBack).toBe(2);
  });

  it('counts calendar months', () => {
    expect(computeTimeRange({ start: '2024-01-15', end: '2024-03-01', interval: '1M' }).countBack).toBe(2);
    expect(computeTimeRange({ start: '2023-11-30', end: '2024-02-01', interval: '1M' }).countBack).toBe(3);
  });

  it.each([
    ['1H', 48],
    ['1m', 2880],
    ['5m', 576],
    ['15m', 192],
    ['30m', 96],
  ])('counts %s buckets up to the padded boundary', (interval, expected) => {
    expect(computeTimeRange({ start: '2024-01-01', end: '2024-01-02', interval }).countBack).toBe(expected);
  });

  it('covers the whole day for a same-day intraday range', () => {
    const range = computeTimeRange({ start: '2024-01-10', end: '2024-01-10', interval: '1m' });
    expect(range.to - range.startTime).toBe(86_400);
    expect(range.countBack).toBe(1440);
    expect(computeTimeRange({ start: '2024-01-10', end: '2024-01-10', interval: '1H' }).countBack).toBe(24);
  });

  it('measures open-ended intraday ranges from the padded clock', () => {
    const range = computeTimeRange({
      start: '2024-01-10',
      interval: '1H',
      now: new Date('2024-01-10T05:00:00Z'),
    });
    expect(range.countBack).toBe(36);
  });

  it('falls back to a fixed count for labels without a rule', () => {
    expect(computeTimeRange({ start: '2024-01-01', end: '2024-06-01', interval: '2D' }).countBack).toBe(
      FALLBACK_COUNT_BACK
    );
    expect(FALLBACK_COUNT_BACK).toBe(30);
  });

  it('uses the clock when no end is given', () => {
    const range = computeTimeRange({
      start: '2024-01-08',
      interval: '1D',
      now: new Date('2024-01-10T05:00:00Z'),
    });
    expect(range.endTime).toBe(1704862800);
    expect(range.to).toBe(1704949200);
    expect(range.countBack).toBe(2);
  });

  it('does not check ordering against the clock', () => {
    const range = computeTimeRange({
      start: '2024-02-01',
      interval: '1D',
      now: new Date('2024-01-10T05:00:00Z'),
    });
    expect(range.countBack).toBe(1);
  });

  it('keeps a supplied countBack', () => {
    expect(
      computeTimeRange({ start: '2024-01-01', end: '2024-01-10', interval: '1D', countBack: 500 }).countBack
    ).toBe(500);
  });

  it('rejects a non-positive countBack', () => {
    expect(() =>
      computeTimeRange({ start: '2024-01-01', end: '2024-01-10', interval: '1D', countBack: 0 })
    ).toThrow(InvalidQueryError);
  });

  it('rejects a start after the end', () => {
    expect(() => computeTimeRange({ start: '2024-02-01', end: '2024-01-01', interval: '1D' })).toThrow(
      'start cannot be after end: 2024-02-01 > 2024-01-01'
    );
  });

  it('rejects malformed dates', () => {
    expect(() => computeTimeRange({ start: '2024/01/01', interval: '1D' })).toThrow(InvalidDateError);
    expect(() => computeTimeRange({ start: '2024-02-30', interval: '1D' })).toThrow(InvalidDateError);

    let caught: unknown;
    try {
      computeTimeRange({ start: '2024-01-01', end: '10-01-2024', interval: '1D' });
    } catch (error) {
      caught = error;
    }
    expect(isInvalidDateError(caught)).toBe(true);
    if (isInvalidDateError(caught)) {
      expect(caught.data).toEqual({ field: 'end', value: '10-01-2024' });
    }
  });

  it('never decreases as the range grows', () => {
    const intervals = ['1m', '5m', '15m', '30m', '1H', '1D', '1W', '1M'];
    for (const interval of intervals) {
      let previous = 0;
      for (let day = 1; day <= 60; day++) {
        const end = new Date(Date.UTC(2024, 0, day)).toISOString().slice(0, 10);
        const { countBack } = computeTimeRange({ start: '2024-01-01', end, interval });
        expect(countBack).toBeGreaterThanOrEqual(previous);
        expect(countBack).toBeGreaterThanOrEqual(1);
        previous = countBack;
      }
    }
  });
});
