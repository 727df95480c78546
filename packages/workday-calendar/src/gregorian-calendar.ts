/**
 * Gregorian civil calendar with weekend, one-time and recurring holidays
 */

import type { Calendar } from './calendar.js';
import type { DateTime } from './date-time.js';
import { HOURS_IN_DAY, MINUTES_IN_HOUR } from './time-utils.js';

const SUNDAY = 0;
const SATURDAY = 6;

/**
 * Days per month for a common year, indexed by month - 1
 */
const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

function recurringKey(month: number, day: number): string {
  return `${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

export class GregorianCalendar implements Calendar {
  /** One-time holidays keyed by "YYYY-MM-DD" */
  private readonly holidays = new Set<string>();

  /** Recurring holidays keyed by "MM-DD" */
  private readonly recurringHolidays = new Set<string>();

  setHoliday(date: DateTime): void {
    if (this.isValidDate(date)) {
      this.holidays.add(date.getDate());
    }
  }

  setRecurringHoliday(date: DateTime): void {
    if (this.isValidDate(date)) {
      this.recurringHolidays.add(recurringKey(date.getMonth(), date.getDay()));
    }
  }

  isHoliday(date: DateTime): boolean {
    const dayOfWeek = date.dayOfWeek();
    if (dayOfWeek === SATURDAY || dayOfWeek === SUNDAY) {
      return true;
    }

    if (this.holidays.has(date.getDate())) {
      return true;
    }

    return this.recurringHolidays.has(recurringKey(date.getMonth(), date.getDay()));
  }

  isValidDate(date: DateTime): boolean {
    const year = date.getYear();
    const month = date.getMonth();
    const day = date.getDay();
    const hour = date.getHours();
    const minute = date.getMinutes();

    if (![year, month, day, hour, minute].every(Number.isInteger)) {
      return false;
    }

    if (year < 0 || month < 1 || month > 12 || day < 1 || day > this.daysInMonth(year, month)) {
      return false;
    }

    return hour >= 0 && hour < HOURS_IN_DAY && minute >= 0 && minute < MINUTES_IN_HOUR;
  }

  isLeapYear(year: number): boolean {
    return year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
  }

  /**
   * @returns Number of days in the month, or 0 for a month outside 1-12
   */
  daysInMonth(year: number, month: number): number {
    if (month === 2 && this.isLeapYear(year)) {
      return 29;
    }
    return DAYS_IN_MONTH[month - 1] ?? 0;
  }

  addDay(date: DateTime): void {
    let year = date.getYear();
    let month = date.getMonth();
    let day = date.getDay() + 1;

    if (day > this.daysInMonth(year, month)) {
      day = 1;
      month++;
      if (month > 12) {
        month = 1;
        year++;
      }
    }

    date.setDate(year, month, day, date.getHours(), date.getMinutes());
  }

  removeDay(date: DateTime): void {
    let year = date.getYear();
    let month = date.getMonth();
    let day = date.getDay() - 1;

    if (day < 1) {
      month--;
      if (month < 1) {
        month = 12;
        year--;
      }
      day = this.daysInMonth(year, month);
    }

    date.setDate(year, month, day, date.getHours(), date.getMinutes());
  }

  /**
   * Registered one-time holidays, sorted ("YYYY-MM-DD")
   */
  getHolidays(): string[] {
    return [...this.holidays].sort();
  }

  /**
   * Registered recurring holidays, sorted ("MM-DD")
   */
  getRecurringHolidays(): string[] {
    return [...this.recurringHolidays].sort();
  }
}
