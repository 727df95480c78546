/**
 * Command implementations behind the `workday` CLI
 *
 * Each command returns a result object; printing and exit codes are left
 * to the caller.
 */

import {
  GregorianCalendar,
  WorkdayCalendar,
  parseDateTime,
  parseTimeOfDay,
} from '@workday/calendar';
import { createChildLogger, type Logger } from '@workday/logger';
import type { Config } from './config/index.js';

// Recurring holidays are registered on a leap year so 02-29 is accepted
const RECURRING_ANCHOR_YEAR = 2000;

/**
 * Command execution result
 */
export interface CommandResult<TCommand extends string, TData> {
  success: boolean;
  command: TCommand;
  data: TData | null;
  errors?: string[];
}

export interface IncrementData {
  start: string;
  workdays: number;
  result: string;
}

export interface IsHolidayData {
  date: string;
  holiday: boolean;
}

export interface HolidaysData {
  holidays: string[];
  recurringHolidays: string[];
}

export type WorkdayCommandResult =
  | CommandResult<'increment', IncrementData>
  | CommandResult<'is-holiday', IsHolidayData>
  | CommandResult<'holidays', HolidaysData>;

export class WorkdayCommands {
  private readonly calendar = new GregorianCalendar();
  private readonly workdays: WorkdayCalendar;
  private readonly logger: Logger;

  constructor(config: Config, logger: Logger) {
    this.logger = createChildLogger(logger, { component: 'cli' });
    this.workdays = new WorkdayCalendar({ calendar: this.calendar, logger });

    this.workdays.setWorkdayStartAndStop(parseTimeOfDay(config.workday.start), parseTimeOfDay(config.workday.stop));
    for (const holiday of config.holidays) {
      this.workdays.setHoliday(parseDateTime(holiday));
    }
    for (const holiday of config.recurringHolidays) {
      this.workdays.setRecurringHoliday(parseDateTime(`${RECURRING_ANCHOR_YEAR}-${holiday}`));
    }
  }

  /**
   * workday increment <start> <workdays>
   */
  increment(start: string, workdays: string): CommandResult<'increment', IncrementData> {
    this.logger.debug('Executing increment command', { operation: 'increment', start, workdays });

    const increment = workdays.trim() === '' ? Number.NaN : Number(workdays);
    const result = this.workdays.tryWorkdayIncrement(parseDateTime(start), increment);

    if (!result.ok) {
      return {
        success: false,
        command: 'increment',
        data: null,
        errors: [`${result.error.code}: ${result.error.message}`],
      };
    }

    return {
      success: true,
      command: 'increment',
      data: { start, workdays: increment, result: result.value.getDateAndTime() },
    };
  }

  /**
   * workday is-holiday <date>
   */
  isHoliday(date: string): CommandResult<'is-holiday', IsHolidayData> {
    this.logger.debug('Executing is-holiday command', { operation: 'is-holiday', date });

    const parsed = parseDateTime(date);
    if (!this.calendar.isValidDate(parsed)) {
      return {
        success: false,
        command: 'is-holiday',
        data: null,
        errors: [`INVALID_DATE: Invalid date "${date}"`],
      };
    }

    return {
      success: true,
      command: 'is-holiday',
      data: { date: parsed.getDate(), holiday: this.workdays.isHoliday(parsed) },
    };
  }

  /**
   * workday holidays
   */
  holidays(): CommandResult<'holidays', HolidaysData> {
    this.logger.debug('Executing holidays command', { operation: 'holidays' });

    return {
      success: true,
      command: 'holidays',
      data: {
        holidays: this.calendar.getHolidays(),
        recurringHolidays: this.calendar.getRecurringHolidays(),
      },
    };
  }
}
