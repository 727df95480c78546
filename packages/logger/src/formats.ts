/**
 * @fileoverview Custom Winston formats for the workday logger
 */

import { format } from 'winston';

/**
 * Fields printed ahead of the remaining metadata in pretty output.
 */
const LEADING_FIELDS: readonly string[] = ['component', 'operation'];

/**
 * Winston fields that never appear in the key=value context.
 */
const INTERNAL_FIELDS = ['level', 'message', 'timestamp', 'stack', 'splat'];

/**
 * Adds an ISO 8601 timestamp and expands Error objects into message + stack.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

/**
 * Renders the context portion of a pretty-printed line.
 *
 * @example
 * ```typescript
 * renderContext({ component: 'cli', start: '2004-01-01 15:07' });
 * // ' component=cli start="2004-01-01 15:07"'
 * ```
 */
export function renderContext(fields: Record<string, unknown>): string {
  const context: string[] = [];

  for (const key of LEADING_FIELDS) {
    const value = fields[key];
    if (typeof value === 'string' && value.length > 0) {
      context.push(`${key}=${value}`);
    }
  }

  for (const [key, value] of Object.entries(fields)) {
    if (INTERNAL_FIELDS.includes(key) || LEADING_FIELDS.includes(key)) {
      continue;
    }
    context.push(`${key}=${JSON.stringify(value)}`);
  }

  return context.length > 0 ? ` ${context.join(' ')}` : '';
}

/**
 * Winston format for human-readable output.
 *
 * @example
 * ```typescript
 * // [2025-01-02T08:00:00.000Z] info: Invalid workday start component=workday-calendar
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, ...rest } = info;
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${renderContext(rest)}`;

    if (typeof info['stack'] === 'string') {
      return `${baseMsg}\n${info['stack']}`;
    }

    return baseMsg;
  })
);
