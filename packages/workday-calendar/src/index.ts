/**
 * @workday/calendar
 *
 * Workday arithmetic over the Gregorian calendar.
 *
 * Advances (or retreats) a date by a fractional number of workdays inside a
 * daily working window, skipping weekends, one-time holidays and holidays
 * that recur on the same month and day every year.
 *
 * @example
 * ```typescript
 * import { WorkdayCalendar, parseDateTime, parseTimeOfDay } from '@workday/calendar';
 *
 * const workdays = new WorkdayCalendar();
 * workdays.setWorkdayStartAndStop(parseTimeOfDay('08:00'), parseTimeOfDay('16:00'));
 * workdays.setHoliday(parseDateTime('2024-07-04'));
 *
 * const due = workdays.getWorkdayIncrement(parseDateTime('2024-07-03 09:00'), 1);
 * console.log(due.getDateAndTime()); // 2024-07-05 09:00
 * ```
 */

export { DateTime, parseDateTime, parseTimeOfDay } from './date-time.js';
export type { Calendar } from './calendar.js';
export { GregorianCalendar } from './gregorian-calendar.js';
export {
  HOURS_IN_DAY,
  MINUTES_IN_HOUR,
  MINUTES_IN_DAY,
  WORKWEEK_DURATION,
  convertToMinutes,
  addMinutes,
  subtractMinutes,
  addTime,
  subtractTime,
} from './time-utils.js';
export { WorkdayCalendar } from './workday-calendar.js';
export type { TimeOfDay, WorkdayWindow, IncrementResult, WorkdayCalendarOptions } from './types.js';
