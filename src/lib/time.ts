/**
 * Time helpers
 *
 * Timestamps travel as ISO 8601 strings; interval math runs on epoch
 * milliseconds. Anything that depends on a local calendar (dates, weekdays,
 * HH:MM ranges) goes through dayjs with the utc and timezone plugins.
 */

import dayjs from 'dayjs';
import timezone from 'dayjs/plugin/timezone';
import utc from 'dayjs/plugin/utc';
import type { DateRange, TimeWindow } from '../types/entities.js';

dayjs.extend(utc);
dayjs.extend(timezone);

export const MINUTE_MS = 60 * 1000;
export const HOUR_MS = 60 * MINUTE_MS;

const MINUTES_PER_DAY = 24 * 60;

export const toMillis = (iso: string): number => Date.parse(iso);

export const toIso = (ms: number): string => new Date(ms).toISOString();

export const durationMinutes = (window: TimeWindow): number =>
  (toMillis(window.end) - toMillis(window.start)) / MINUTE_MS;

/**
 * Strict overlap: windows that only touch do not overlap
 */
export const windowsOverlap = (a: TimeWindow, b: TimeWindow): boolean =>
  toMillis(a.start) < toMillis(b.end) && toMillis(b.start) < toMillis(a.end);

/**
 * Minutes since midnight for an HH:MM string (24:00 allowed)
 */
export const minutesOfDay = (hhmm: string): number => {
  const [hours = '0', minutes = '0'] = hhmm.split(':');
  return Number(hours) * 60 + Number(minutes);
};

/**
 * Throws a RangeError for time zones the runtime does not know
 */
export const assertTimeZone = (timeZone: string): void => {
  dayjs().tz(timeZone);
};

export const localDate = (ms: number, timeZone: string): string =>
  dayjs(ms).tz(timeZone).format('YYYY-MM-DD');

/**
 * Local HH:MM of an instant
 */
export const localTime = (ms: number, timeZone: string): string =>
  dayjs(ms).tz(timeZone).format('HH:mm');

/**
 * 0 = Monday ... 6 = Sunday
 */
export const localWeekday = (ms: number, timeZone: string): number =>
  (dayjs(ms).tz(timeZone).day() + 6) % 7;

export const weekdayOfDate = (ymd: string): number => (dayjs.utc(ymd).day() + 6) % 7;

export const addDays = (ymd: string, days: number): string =>
  dayjs.utc(ymd).add(days, 'day').format('YYYY-MM-DD');

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Instant at which the zone's clocks show `minutes` past midnight of `ymd`.
 * 1440 is midnight of the following day.
 */
export const atLocalMinutes = (ymd: string, minutes: number, timeZone: string): number => {
  const day = addDays(ymd, Math.floor(minutes / MINUTES_PER_DAY));
  const rest = minutes % MINUTES_PER_DAY;
  return dayjs.tz(`${day} ${pad(Math.floor(rest / 60))}:${pad(rest % 60)}`, timeZone).valueOf();
};

/**
 * Instant of local midnight for the day containing `ms`
 */
export const startOfLocalDay = (ms: number, timeZone: string): number =>
  atLocalMinutes(localDate(ms, timeZone), 0, timeZone);

const WEEKDAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'];

export const weekdayName = (dayOfWeek: number): string => WEEKDAY_NAMES[dayOfWeek] ?? 'Unknown';

/**
 * Inclusive range of `days` local dates starting today
 */
export const upcomingDateRange = (nowMs: number, timeZone: string, days: number): DateRange => {
  const from = localDate(nowMs, timeZone);
  return { from, to: addDays(from, Math.max(days, 1) - 1) };
};
