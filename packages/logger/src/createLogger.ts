/**
 * @fileoverview Main logger factory for the workday calendar suite
 * Creates configured Winston logger instances with structured logging
 * and flexible transport options.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger, ChildLoggerContext } from './types.js';
import { standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * - Structured logging with standard fields (timestamp, level, message)
 * - Console and file transports
 * - JSON in production, pretty-print elsewhere
 * - `silent` for library defaults and tests
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Workday configured', { start: '08:00', stop: '16:00' });
 * ```
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   level: 'debug',
 *   json: false,
 *   filePath: './logs/workday.log',
 * });
 *
 * const engineLogger = logger.child({ component: 'workday-calendar' });
 * engineLogger.debug('Holiday registered', { date: '2024-07-04' });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    silent = false,
  } = config;

  // Timestamps and error expansion happen once on the logger; each transport
  // then renders the entry in its own output format.
  const consoleFormat = json ? format.json() : prettyPrint;

  const transports: winston.transport[] = [];

  if (enableConsole && !silent) {
    transports.push(
      new winston.transports.Console({
        level,
        format: consoleFormat,
        // Keep stdout free for command output
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        // Colour codes would corrupt file output
        format: format.json(),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  return winston.createLogger({
    level,
    format: standardFields,
    transports,
    silent,
    // Process exit is handled explicitly in errorHandler.ts
    exitOnError: false,
  });
}

/**
 * Creates a child logger with additional context fields.
 * Child loggers inherit all configuration from the parent logger
 * and include the context fields in every log entry.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * const cliLogger = createChildLogger(logger, { component: 'cli', operation: 'increment' });
 * cliLogger.info('Computing increment');
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}

/**
 * Logger that discards everything. Used wherever a caller does not inject one.
 */
export function createSilentLogger(): Logger {
  return createLogger({ level: 'debug', console: false, silent: true });
}
