/**
 * Calendar system abstraction
 *
 * The workday engine only talks to this interface, so a calendar system
 * other than the Gregorian one can be substituted at construction time.
 */

import type { DateTime } from './date-time.js';

export interface Calendar {
  /**
   * Registers a one-time holiday. Dates that fail {@link isValidDate} are ignored.
   */
  setHoliday(date: DateTime): void;

  /**
   * Registers a holiday on the date's month and day in every year.
   * Dates that fail {@link isValidDate} are ignored.
   */
  setRecurringHoliday(date: DateTime): void;

  /**
   * Moves the date one calendar day forward in place, keeping the time of day.
   * The input must already be valid.
   */
  addDay(date: DateTime): void;

  /**
   * Moves the date one calendar day back in place, keeping the time of day.
   * The input must already be valid.
   */
  removeDay(date: DateTime): void;

  /**
   * True for weekends and registered holidays.
   */
  isHoliday(date: DateTime): boolean;

  /**
   * True when every field names a real date and time of day. Never throws.
   */
  isValidDate(date: DateTime): boolean;
}
