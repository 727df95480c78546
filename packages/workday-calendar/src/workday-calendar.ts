/**
 * Workday increment engine
 *
 * Converts a fractional number of workdays into whole workweeks, whole
 * workdays and remaining minutes, then walks the calendar from a start
 * date skipping weekends and holidays and keeping the time of day inside
 * the configured working window.
 *
 * Every public method is synchronous and never throws. Failures come back
 * as the invalid DateTime sentinel (or a failure result from
 * {@link WorkdayCalendar.tryWorkdayIncrement}) paired with a log entry.
 *
 * @example
 * ```typescript
 * const workdays = new WorkdayCalendar({ logger });
 * workdays.setWorkdayStartAndStop(parseTimeOfDay('08:00'), parseTimeOfDay('16:00'));
 * workdays.setRecurringHoliday(parseDateTime('2004-05-17'));
 *
 * workdays.getWorkdayIncrement(parseDateTime('2004-01-01 15:07'), 0.25).getDateAndTime();
 * // '2004-01-02 09:07'
 * ```
 */

import {
  InternalFaultError,
  InvalidDateError,
  InvalidIncrementError,
  InvalidWorkdayWindowError,
  WorkdayNotConfiguredError,
  type WorkdayError,
} from '@workday/contracts';
import { createSilentLogger, type Logger } from '@workday/logger';
import type { Calendar } from './calendar.js';
import { DateTime } from './date-time.js';
import { GregorianCalendar } from './gregorian-calendar.js';
import {
  WORKWEEK_DURATION,
  addMinutes,
  convertToMinutes,
  subtractMinutes,
  subtractTime,
} from './time-utils.js';
import type { IncrementResult, TimeOfDay, WorkdayCalendarOptions, WorkdayWindow } from './types.js';

/**
 * Upper bound on consecutive non-working days skipped in one step.
 * A calendar where every day is a holiday would otherwise never terminate.
 */
const MAX_HOLIDAY_RUN = 3660;

/**
 * Working window as minutes since midnight
 */
interface WindowBounds {
  start: number;
  stop: number;
}

function describeError(error: unknown): { message: string; stack?: string } {
  if (error instanceof Error) {
    return error.stack === undefined ? { message: error.message } : { message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}

export class WorkdayCalendar {
  private readonly calendar: Calendar;
  private readonly logger: Logger;
  private window: WorkdayWindow = { configured: false };

  constructor(options: WorkdayCalendarOptions = {}) {
    this.calendar = options.calendar ?? new GregorianCalendar();
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'workday-calendar' });
  }

  /**
   * Sets the daily working window. Only the time of day of each value is
   * used, but both must pass calendar validation. If either is invalid the
   * window is cleared, not partially updated.
   */
  setWorkdayStartAndStop(start: DateTime, stop: DateTime): void {
    try {
      if (!this.calendar.isValidDate(start)) {
        this.logger.info('Invalid workday start', { start: start.getDateAndTime() });
        this.window = { configured: false };
        return;
      }

      if (!this.calendar.isValidDate(stop)) {
        this.logger.info('Invalid workday stop', { stop: stop.getDateAndTime() });
        this.window = { configured: false };
        return;
      }

      const duration = subtractTime(stop.getTime(), start.getTime());
      this.window = { configured: true, start: start.clone(), stop: stop.clone(), duration };

      this.logger.debug('Workday configured', {
        start: start.getDateAndTime(),
        stop: stop.getDateAndTime(),
        durationMinutes: convertToMinutes(duration),
      });
    } catch (error) {
      this.logger.error('Failed to configure workday', describeError(error));
      this.window = { configured: false };
    }
  }

  /**
   * Registers a one-time holiday. Invalid dates are ignored.
   */
  setHoliday(date: DateTime): void {
    try {
      if (!this.calendar.isValidDate(date)) {
        this.logger.debug('Ignoring invalid holiday', { date: date.getDateAndTime() });
        return;
      }
      this.calendar.setHoliday(date);
    } catch (error) {
      this.logger.error('Failed to register holiday', describeError(error));
    }
  }

  /**
   * Registers a holiday on the date's month and day in every year.
   * Invalid dates are ignored.
   */
  setRecurringHoliday(date: DateTime): void {
    try {
      if (!this.calendar.isValidDate(date)) {
        this.logger.debug('Ignoring invalid recurring holiday', { date: date.getDateAndTime() });
        return;
      }
      this.calendar.setRecurringHoliday(date);
    } catch (error) {
      this.logger.error('Failed to register recurring holiday', describeError(error));
    }
  }

  isHoliday(date: DateTime): boolean {
    return this.calendar.isHoliday(date);
  }

  getWorkdayStart(): DateTime | undefined {
    return this.window.configured ? this.window.start.clone() : undefined;
  }

  getWorkdayStop(): DateTime | undefined {
    return this.window.configured ? this.window.stop.clone() : undefined;
  }

  getWorkdayDuration(): TimeOfDay | undefined {
    return this.window.configured ? this.window.duration : undefined;
  }

  /**
   * Date and time reached after `incrementInWorkdays` workdays from
   * `startDate`, or the invalid sentinel when it cannot be computed.
   * Negative increments walk backwards.
   */
  getWorkdayIncrement(startDate: DateTime, incrementInWorkdays: number): DateTime {
    const result = this.tryWorkdayIncrement(startDate, incrementInWorkdays);
    return result.ok ? result.value : DateTime.invalid();
  }

  /**
   * Same computation as {@link getWorkdayIncrement}, reporting why it failed.
   */
  tryWorkdayIncrement(startDate: DateTime, incrementInWorkdays: number): IncrementResult {
    try {
      if (!this.calendar.isValidDate(startDate)) {
        return this.fail(
          new InvalidDateError('Invalid start date', { field: 'startDate', value: startDate.getDateAndTime() })
        );
      }

      if (!this.window.configured) {
        return this.fail(new WorkdayNotConfiguredError());
      }

      if (!Number.isFinite(incrementInWorkdays)) {
        return this.fail(new InvalidIncrementError('Increment must be a finite number', { increment: incrementInWorkdays }));
      }

      const { start, stop, duration } = this.window;
      const bounds: WindowBounds = {
        start: convertToMinutes(start.getTime()),
        stop: convertToMinutes(stop.getTime()),
      };
      const workdayMinutes = convertToMinutes(duration);

      if (workdayMinutes <= 0 || bounds.start >= bounds.stop) {
        return this.fail(
          new InvalidWorkdayWindowError('Workday stop must be later than workday start on the same day', {
            start: start.getDateAndTime(),
            stop: stop.getDateAndTime(),
          })
        );
      }

      const decrement = incrementInWorkdays < 0;
      const totalMinutes = Math.trunc(Math.abs(incrementInWorkdays) * workdayMinutes);
      const wholeWorkdays = Math.trunc(totalMinutes / workdayMinutes);
      const remainingMinutes = totalMinutes % workdayMinutes;
      let workweeks = Math.trunc(wholeWorkdays / WORKWEEK_DURATION);
      let remainingWorkdays = wholeWorkdays % WORKWEEK_DURATION;

      const current = startDate.clone();

      // A non-working start day begins at the boundary of the nearest
      // workday in the direction of travel.
      const boundary = decrement ? stop : start;
      let skipped = 0;
      while (this.calendar.isHoliday(current)) {
        this.stepDay(current, decrement);
        current.setTime(boundary.getHours(), boundary.getMinutes());
        if (++skipped > MAX_HOLIDAY_RUN) {
          throw new Error(`No workday found within ${MAX_HOLIDAY_RUN} days of ${startDate.getDate()}`);
        }
      }

      while (workweeks-- > 0) {
        this.incrementWorkWeek(current, decrement);
      }

      while (remainingWorkdays-- > 0) {
        this.incrementWorkDay(current, decrement);
      }

      if (decrement) {
        this.removeRemainingMinutes(remainingMinutes, current, bounds);
      } else {
        this.addRemainingMinutes(remainingMinutes, current, bounds);
      }

      return { ok: true, value: current };
    } catch (error) {
      const details = describeError(error);
      this.logger.error('Workday increment failed', {
        startDate: startDate.getDateAndTime(),
        increment: incrementInWorkdays,
        ...details,
      });
      return {
        ok: false,
        error: new InternalFaultError(`Workday increment failed: ${details.message}`, error, {
          startDate: startDate.getDateAndTime(),
          increment: incrementInWorkdays,
        }),
      };
    }
  }

  private fail(error: WorkdayError): IncrementResult {
    this.logger.info(error.message, { code: error.code, ...error.data });
    return { ok: false, error };
  }

  private stepDay(date: DateTime, decrement: boolean): void {
    if (decrement) {
      this.calendar.removeDay(date);
    } else {
      this.calendar.addDay(date);
    }
  }

  private incrementWorkWeek(date: DateTime, decrement: boolean): void {
    for (let i = 0; i < WORKWEEK_DURATION; i++) {
      this.incrementWorkDay(date, decrement);
    }
  }

  /**
   * Moves to the next (or previous) day that is not a holiday.
   */
  private incrementWorkDay(date: DateTime, decrement = false): void {
    this.stepDay(date, decrement);

    let skipped = 0;
    while (this.calendar.isHoliday(date)) {
      this.stepDay(date, decrement);
      if (++skipped > MAX_HOLIDAY_RUN) {
        throw new Error(`No workday found within ${MAX_HOLIDAY_RUN} days of ${date.getDate()}`);
      }
    }
  }

  /**
   * Places the remaining minutes forward inside the working window.
   * `minutes` is below one workday, so at most one carry into the next
   * workday is needed.
   */
  private addRemainingMinutes(minutes: number, current: DateTime, bounds: WindowBounds): void {
    let currentMinutes = convertToMinutes(current.getTime());

    if (currentMinutes >= bounds.stop) {
      this.incrementWorkDay(current);
      currentMinutes = bounds.start;
    } else if (currentMinutes < bounds.start) {
      currentMinutes = bounds.start;
    }

    if (currentMinutes + minutes <= bounds.stop) {
      const [hours, mins] = addMinutes(currentMinutes, minutes);
      current.setTime(hours, mins);
      return;
    }

    this.incrementWorkDay(current);
    const [hours, mins] = addMinutes(bounds.start, currentMinutes + minutes - bounds.stop);
    current.setTime(hours, mins);
  }

  /**
   * Places the remaining minutes backward inside the working window.
   */
  private removeRemainingMinutes(minutes: number, current: DateTime, bounds: WindowBounds): void {
    let currentMinutes = convertToMinutes(current.getTime());

    if (currentMinutes >= bounds.stop) {
      currentMinutes = bounds.stop;
    } else if (currentMinutes < bounds.start) {
      this.incrementWorkDay(current, true);
      currentMinutes = bounds.stop;
    }

    if (currentMinutes - minutes >= bounds.start) {
      const [hours, mins] = subtractMinutes(currentMinutes, minutes);
      current.setTime(hours, mins);
      return;
    }

    this.incrementWorkDay(current, true);
    const [hours, mins] = subtractMinutes(bounds.stop, bounds.start - (currentMinutes - minutes));
    current.setTime(hours, mins);
  }
}
