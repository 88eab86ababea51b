/**
 * @vnquote/sessions-calendar
 *
 * HOSE session clock and the gate for intraday-sensitive requests.
 */

export {
  HOSE_CALENDAR,
  parseCalendar,
  isHoliday,
  getMarketSessionStatus,
  createSessionClock,
} from './calendar.js';

export { checkSession } from './gate.js';

export { calendarDataSchema, sessionDefSchema, holidaySchema } from './types.js';
export type { CalendarData, SessionDef, Holiday } from './types.js';
