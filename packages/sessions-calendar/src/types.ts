/**
 * Type definitions for sessions-calendar package
 */

import { z } from 'zod';

const clockTime = z.string().regex(/^([01]\d|2[0-4]):[0-5]\d$/, 'expected HH:MM');

/**
 * Session window from calendar data, in local exchange time
 */
export const sessionDefSchema = z.object({
  /** Session name reported in `tradingSession` */
  name: z.string().min(1),
  /** Inclusive start, HH:MM */
  start: clockTime,
  /** Exclusive end, HH:MM */
  end: clockTime,
  isTradingHour: z.boolean(),
  dataStatus: z.enum(['preparing', 'realtime', 'historical']),
});

/**
 * Market closure from calendar data
 */
export const holidaySchema = z.object({
  /** Holiday date in YYYY-MM-DD format */
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  name: z.string(),
});

/**
 * Complete calendar file
 */
export const calendarDataSchema = z.object({
  exchange: z.string(),
  /** IANA timezone of the exchange */
  timezone: z.string(),
  /** Weekday windows, covering 00:00 to 24:00 */
  sessions: z.array(sessionDefSchema).min(1),
  holidays: z.array(holidaySchema),
});

export type SessionDef = z.infer<typeof sessionDefSchema>;
export type Holiday = z.infer<typeof holidaySchema>;
export type CalendarData = z.infer<typeof calendarDataSchema>;
