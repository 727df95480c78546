/**
 * Type definitions for workday-calendar package
 */

import type { WorkdayError } from '@workday/contracts';
import type { Logger } from '@workday/logger';
import type { Calendar } from './calendar.js';
import type { DateTime } from './date-time.js';

/**
 * A point in a 24-hour day, or a duration below one day
 */
export type TimeOfDay = readonly [hours: number, minutes: number];

/**
 * Workday window state. Start and stop are only ever set together.
 */
export type WorkdayWindow =
  | { configured: false }
  | {
      configured: true;

      /** Start of the working day (only the time of day is used) */
      start: DateTime;

      /** End of the working day (only the time of day is used) */
      stop: DateTime;

      /** stop - start */
      duration: TimeOfDay;
    };

/**
 * Outcome of an increment computation
 */
export type IncrementResult =
  | { ok: true; value: DateTime }
  | { ok: false; error: WorkdayError };

/**
 * Options for constructing a WorkdayCalendar
 */
export interface WorkdayCalendarOptions {
  /** Calendar system; a fresh GregorianCalendar when omitted */
  calendar?: Calendar;

  /** Log sink; a silent logger when omitted */
  logger?: Logger;
}
