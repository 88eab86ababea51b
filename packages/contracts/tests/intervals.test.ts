/**
 * @fileoverview Tests for interval utilities.
 */

import { describe, it, expect } from 'vitest';
import { Interval, Granularity, isInterval, getAllIntervals, getIntervalLabel } from '../src/intervals.js';

describe('Interval', () => {
  it('should have all expected enum values', () => {
    expect(Interval.M1).toBe('1m');
    expect(Interval.M5).toBe('5m');
    expect(Interval.M15).toBe('15m');
    expect(Interval.M30).toBe('30m');
    expect(Interval.H1).toBe('1H');
    expect(Interval.D1).toBe('1D');
    expect(Interval.W1).toBe('1W');
    expect(Interval.MN1).toBe('1M');
  });

  it('should expose the three provider buckets', () => {
    expect(Object.values(Granularity)).toEqual(['ONE_MINUTE', 'ONE_HOUR', 'ONE_DAY']);
  });

  describe('isInterval', () => {
    it('should accept every supported label', () => {
      for (const label of ['1m', '5m', '15m', '30m', '1H', '1D', '1W', '1M']) {
        expect(isInterval(label)).toBe(true);
      }
    });

    it('should be case-sensitive', () => {
      expect(isInterval('1h')).toBe(false);
      expect(isInterval('1d')).toBe(false);
      expect(isInterval('1w')).toBe(false);
    });

    it('should reject unknown labels', () => {
      expect(isInterval('2m')).toBe(false);
      expect(isInterval('')).toBe(false);
    });
  });

  it('should list intervals in ascending order', () => {
    expect(getAllIntervals()).toEqual(['1m', '5m', '15m', '30m', '1H', '1D', '1W', '1M']);
  });

  it('should label intervals', () => {
    expect(getIntervalLabel(Interval.M15)).toBe('15 Minutes');
    expect(getIntervalLabel(Interval.MN1)).toBe('Monthly');
  });
});
