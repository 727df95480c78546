/**
 * Calendar date and time-of-day value
 *
 * A DateTime holds year, month, day, hour and minute as plain integers.
 * It performs no validation of its own: whether a value names a real
 * calendar instant is decided by a Calendar implementation.
 */

import type { TimeOfDay } from './types.js';

/**
 * Sakamoto month offsets, indexed by month - 1
 */
const MONTH_OFFSETS = [0, 3, 2, 5, 0, 3, 5, 1, 4, 6, 2, 4] as const;

const INVALID_FIELD = -1;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

export class DateTime {
  private year: number;
  private month: number;
  private day: number;
  private hour: number;
  private minute: number;

  constructor(year = 0, month = 0, day = 0, hour = 0, minute = 0) {
    this.year = year;
    this.month = month;
    this.day = day;
    this.hour = hour;
    this.minute = minute;
  }

  /**
   * The invalid sentinel: every field is -1.
   * Returned wherever an operation cannot produce a meaningful result.
   */
  static invalid(): DateTime {
    return new DateTime(INVALID_FIELD, INVALID_FIELD, INVALID_FIELD, INVALID_FIELD, INVALID_FIELD);
  }

  isInvalid(): boolean {
    return (
      this.year === INVALID_FIELD &&
      this.month === INVALID_FIELD &&
      this.day === INVALID_FIELD &&
      this.hour === INVALID_FIELD &&
      this.minute === INVALID_FIELD
    );
  }

  /**
   * Overwrites every field in place.
   */
  setDate(year: number, month: number, day: number, hour: number, minute: number): void {
    this.year = year;
    this.month = month;
    this.day = day;
    this.hour = hour;
    this.minute = minute;
  }

  /**
   * Overwrites the time of day, keeping the calendar date.
   */
  setTime(hour: number, minute: number): void {
    this.hour = hour;
    this.minute = minute;
  }

  getYear(): number {
    return this.year;
  }

  getMonth(): number {
    return this.month;
  }

  getDay(): number {
    return this.day;
  }

  getHours(): number {
    return this.hour;
  }

  getMinutes(): number {
    return this.minute;
  }

  getTime(): TimeOfDay {
    return [this.hour, this.minute];
  }

  /**
   * @returns Date in "YYYY-MM-DD" form
   */
  getDate(): string {
    return `${pad(this.year, 4)}-${pad(this.month, 2)}-${pad(this.day, 2)}`;
  }

  /**
   * @returns Date and time in "YYYY-MM-DD HH:MM" form
   */
  getDateAndTime(): string {
    return `${this.getDate()} ${pad(this.hour, 2)}:${pad(this.minute, 2)}`;
  }

  /**
   * Day of the week, 0 = Sunday ... 6 = Saturday.
   *
   * Uses the Sakamoto method: January and February count as months of
   * the previous year so the leap day falls at the end of the cycle.
   * Returns -1 when the month is outside 1-12.
   */
  dayOfWeek(): number {
    const offset = MONTH_OFFSETS[this.month - 1];
    if (offset === undefined) {
      return INVALID_FIELD;
    }

    const y = this.month < 3 ? this.year - 1 : this.year;
    return (y + Math.trunc(y / 4) - Math.trunc(y / 100) + Math.trunc(y / 400) + offset + this.day) % 7;
  }

  clone(): DateTime {
    return new DateTime(this.year, this.month, this.day, this.hour, this.minute);
  }

  /**
   * Lexicographic comparison over (year, month, day, hour, minute).
   *
   * @returns Negative, zero or positive
   */
  compareTo(other: DateTime): number {
    return (
      this.year - other.year ||
      this.month - other.month ||
      this.day - other.day ||
      this.hour - other.hour ||
      this.minute - other.minute
    );
  }

  equals(other: DateTime): boolean {
    return this.compareTo(other) === 0;
  }

  toString(): string {
    return this.getDateAndTime();
  }
}

const DATE_TIME_PATTERN = /^(\d{1,4})-(\d{1,2})-(\d{1,2})(?:[ T](\d{1,2}):(\d{1,2}))?$/;
const TIME_OF_DAY_PATTERN = /^(\d{1,2}):(\d{1,2})$/;

/**
 * Parses "YYYY-MM-DD", "YYYY-MM-DD HH:MM" or "YYYY-MM-DDTHH:MM".
 *
 * Only the shape is checked; "2024-02-30" parses and is left for the
 * calendar to reject. Text that does not match yields the invalid sentinel.
 *
 * @example
 * ```typescript
 * parseDateTime('2004-01-01 15:07').getDateAndTime(); // '2004-01-01 15:07'
 * parseDateTime('2024-07-04').getDateAndTime();       // '2024-07-04 00:00'
 * ```
 */
export function parseDateTime(text: string): DateTime {
  const match = DATE_TIME_PATTERN.exec(text.trim());
  if (!match) {
    return DateTime.invalid();
  }

  const [, year, month, day, hour = '0', minute = '0'] = match;
  return new DateTime(Number(year), Number(month), Number(day), Number(hour), Number(minute));
}

/**
 * Parses "HH:MM" into a DateTime anchored on 0000-01-01.
 * Workday start and stop only use the time of day, but still have to pass
 * calendar validation, so the anchor is a real date.
 */
export function parseTimeOfDay(text: string): DateTime {
  const match = TIME_OF_DAY_PATTERN.exec(text.trim());
  if (!match) {
    return DateTime.invalid();
  }

  const [, hour, minute] = match;
  return new DateTime(0, 1, 1, Number(hour), Number(minute));
}
