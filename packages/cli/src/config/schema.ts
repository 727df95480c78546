/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { GregorianCalendar, parseDateTime } from '@workday/calendar';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const MONTH_DAY = /^\d{2}-\d{2}$/;

// Month-day pairs are checked against a leap year so 02-29 passes
const MONTH_DAY_YEAR = 2000;

const gregorian = new GregorianCalendar();

function isCalendarDate(text: string): boolean {
  return gregorian.isValidDate(parseDateTime(text));
}

const timeOfDay = z.string().regex(/^([01]?\d|2[0-3]):[0-5]\d$/, 'Expected HH:MM');

// Shape errors come from the regex alone
const isoDate = z
  .string()
  .regex(ISO_DATE, 'Expected YYYY-MM-DD')
  .refine((text) => !ISO_DATE.test(text) || isCalendarDate(text), 'No such calendar date');

const monthDay = z
  .string()
  .regex(MONTH_DAY, 'Expected MM-DD')
  .refine((text) => !MONTH_DAY.test(text) || isCalendarDate(`${MONTH_DAY_YEAR}-${text}`), 'No such calendar date');

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('warn'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().optional(),
    })
    .default({}),

  workday: z
    .object({
      start: timeOfDay.default('08:00'),
      stop: timeOfDay.default('16:00'),
    })
    .default({}),

  holidays: z.array(isoDate).default([]),
  recurringHolidays: z.array(monthDay).default([]),

  // Resolved against the directory of the config file
  holidayFiles: z.array(z.string()).default([]),
});

/**
 * Contents of a file listed under `holidayFiles`
 */
export const holidayFileSchema = z.object({
  holidays: z.array(isoDate).default([]),
  recurringHolidays: z.array(monthDay).default([]),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

export type HolidayFile = z.infer<typeof holidayFileSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  WORKDAY_START: 'workday.start',
  WORKDAY_STOP: 'workday.stop',
};
