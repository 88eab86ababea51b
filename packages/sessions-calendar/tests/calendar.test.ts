import { describe, it, expect } from 'vitest';
import {
  HOSE_CALENDAR,
  createSessionClock,
  getMarketSessionStatus,
  isHoliday,
  parseCalendar,
} from '../src/index.js';

describe('getMarketSessionStatus', () => {
  it('reports the preparing window before the opening auction', () => {
    expect(getMarketSessionStatus(new Date('2024-03-05T01:45:00Z'))).toEqual({
      isTradingHour: false,
      tradingSession: 'preparing',
      dataStatus: 'preparing',
      time: '2024-03-05 08:45:00',
    });
  });

  it.each([
    ['2024-03-05T01:00:00Z', 'pre_market', false, 'historical'],
    ['2024-03-05T02:00:00Z', 'ato', true, 'realtime'],
    ['2024-03-05T03:00:00Z', 'continuous', true, 'realtime'],
    ['2024-03-05T05:00:00Z', 'lunch_break', false, 'realtime'],
    ['2024-03-05T06:30:00Z', 'continuous', true, 'realtime'],
    ['2024-03-05T07:35:00Z', 'atc', true, 'realtime'],
    ['2024-03-05T07:50:00Z', 'put_through', false, 'realtime'],
    ['2024-03-05T09:00:00Z', 'after_hours', false, 'historical'],
  ])('at %s reports %s', (iso, session, trading, data) => {
    const status = getMarketSessionStatus(new Date(iso));
    expect(status.tradingSession).toBe(session);
    expect(status.isTradingHour).toBe(trading);
    expect(status.dataStatus).toBe(data);
  });

  it('switches sessions at local midnight', () => {
    expect(getMarketSessionStatus(new Date('2024-03-04T16:59:59Z')).tradingSession).toBe('after_hours');
    expect(getMarketSessionStatus(new Date('2024-03-04T17:00:00Z')).tradingSession).toBe('pre_market');
  });

  it('reports weekends as closed', () => {
    expect(getMarketSessionStatus(new Date('2024-03-09T02:00:00Z'))).toEqual({
      isTradingHour: false,
      tradingSession: 'closed',
      dataStatus: 'historical',
      time: '2024-03-09 09:00:00',
    });
  });

  it('reports holidays as closed', () => {
    expect(getMarketSessionStatus(new Date('2025-04-30T03:00:00Z')).tradingSession).toBe('closed');
  });
});

describe('isHoliday', () => {
  it('uses the exchange calendar day', () => {
    // 2025-04-29 17:30 UTC is already 2025-04-30 in Ho Chi Minh City
    expect(isHoliday(new Date('2025-04-29T17:30:00Z'))).toBe(true);
    expect(isHoliday(new Date('2025-04-29T03:00:00Z'))).toBe(false);
  });
});

describe('createSessionClock', () => {
  it('reads the injected time source', () => {
    const clock = createSessionClock(HOSE_CALENDAR, () => new Date('2024-03-05T03:00:00Z'));
    expect(clock().time).toBe('2024-03-05 10:00:00');
  });
});

describe('parseCalendar', () => {
  it('accepts the bundled calendar', () => {
    expect(HOSE_CALENDAR.exchange).toBe('HOSE');
    expect(HOSE_CALENDAR.sessions).toHaveLength(9);
  });

  it('rejects a calendar without sessions', () => {
    expect(() =>
      parseCalendar({ exchange: 'HOSE', timezone: 'Asia/Ho_Chi_Minh', sessions: [], holidays: [] })
    ).toThrow(/^Invalid session calendar: sessions: /);
  });
});
