/**
 * Exchange session clock
 *
 * Reports which HOSE session a moment falls into and whether intraday data
 * is live, preparing or only historical. Calendar data is read from
 * `data/hose-calendar.json` once, at module initialization.
 */

import { readFileSync } from 'node:fs';
import moment from 'moment-timezone';
import type { MarketSessionStatus, SessionClock } from '@vnquote/contracts';
import { calendarDataSchema } from './types.js';
import type { CalendarData, SessionDef } from './types.js';

const CALENDAR_URL = new URL('./data/hose-calendar.json', import.meta.url);

/**
 * Parse and validate calendar data
 *
 * @throws Error listing every invalid path
 */
export function parseCalendar(raw: unknown): CalendarData {
  const result = calendarDataSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid session calendar: ${issues.join('; ')}`);
  }
  return result.data;
}

/**
 * Bundled HOSE calendar
 */
export const HOSE_CALENDAR: CalendarData = parseCalendar(
  JSON.parse(readFileSync(CALENDAR_URL, 'utf8'))
);

const STATUS_TIME_FORMAT = 'YYYY-MM-DD HH:mm:ss';

function toMinutes(clock: string): number {
  const [hours = 0, minutes = 0] = clock.split(':').map(Number);
  return hours * 60 + minutes;
}

/**
 * Check if a date is an exchange holiday
 *
 * @param date - Moment to check; the calendar day is taken in exchange time
 *
 * @example
 * ```typescript
 * isHoliday(new Date('2025-04-30T03:00:00Z'));  // true (Reunification Day)
 * ```
 */
export function isHoliday(date: Date, calendar: CalendarData = HOSE_CALENDAR): boolean {
  const day = moment.tz(date, calendar.timezone).format('YYYY-MM-DD');
  return calendar.holidays.some((holiday) => holiday.date === day);
}

/**
 * Find the weekday session containing a local minute of the day
 */
function findSession(calendar: CalendarData, minuteOfDay: number): SessionDef | undefined {
  return calendar.sessions.find(
    (session) => minuteOfDay >= toMinutes(session.start) && minuteOfDay < toMinutes(session.end)
  );
}

/**
 * Session status at a moment
 *
 * Weekends and holidays report the `closed` session with historical data.
 *
 * @example
 * ```typescript
 * getMarketSessionStatus(new Date('2024-03-05T01:45:00Z'));
 * // { isTradingHour: false, tradingSession: 'preparing', dataStatus: 'preparing',
 * //   time: '2024-03-05 08:45:00' }
 * ```
 */
export function getMarketSessionStatus(
  now: Date = new Date(),
  calendar: CalendarData = HOSE_CALENDAR
): MarketSessionStatus {
  const local = moment.tz(now, calendar.timezone);
  const time = local.format(STATUS_TIME_FORMAT);
  const closed: MarketSessionStatus = {
    isTradingHour: false,
    tradingSession: 'closed',
    dataStatus: 'historical',
    time,
  };

  if (local.isoWeekday() > 5 || isHoliday(now, calendar)) {
    return closed;
  }

  const session = findSession(calendar, local.hours() * 60 + local.minutes());
  if (session === undefined) {
    return closed;
  }

  return {
    isTradingHour: session.isTradingHour,
    tradingSession: session.name,
    dataStatus: session.dataStatus,
    time,
  };
}

/**
 * Session clock bound to a calendar and, optionally, a fixed time source
 */
export function createSessionClock(
  calendar: CalendarData = HOSE_CALENDAR,
  now: () => Date = () => new Date()
): SessionClock {
  return () => getMarketSessionStatus(now(), calendar);
}
