/**
 * @fileoverview Process-level handlers for the `workday` CLI
 * Failures that escape a command are logged before the process exits.
 */

import { isWorkdayError } from '@workday/contracts';
import type { Logger } from './types.js';

/**
 * Timeout in milliseconds to wait for logger flush before forceful exit.
 */
const FLUSH_TIMEOUT_MS = 3000;

/**
 * Detaches the handlers installed by {@link attachGlobalHandlers}.
 */
export type DetachHandlers = () => void;

type FatalEvent = 'uncaughtException' | 'unhandledRejection';

let attached: DetachHandlers | undefined;

/**
 * Log-ready form of anything thrown or rejected. Workday errors keep their
 * code and data through `toJSON()`.
 *
 * @example
 * ```typescript
 * describeFailure(new ConfigurationError('Bad config', { path: 'workday.json' }));
 * // { name: 'ConfigurationError', code: 'CONFIGURATION_ERROR', data: { path: ... }, ... }
 * ```
 */
export function describeFailure(reason: unknown): Record<string, unknown> {
  if (isWorkdayError(reason)) {
    return reason.toJSON();
  }
  if (reason instanceof Error) {
    return { name: reason.name, message: reason.message, stack: reason.stack };
  }
  return { message: String(reason) };
}

/**
 * Logs uncaught exceptions and unhandled rejections at error level, then
 * exits with code 1 once the logger has flushed. Process warnings are
 * logged at warn level.
 *
 * Attaching twice logs a warning and returns the existing detach function.
 */
export function attachGlobalHandlers(logger: Logger): DetachHandlers {
  if (attached) {
    logger.warn('Global error handlers already attached, skipping');
    return attached;
  }

  const onFatal =
    (event: FatalEvent) =>
    (reason: unknown): void => {
      logger.error(`Process terminating after ${event}`, { event, error: describeFailure(reason) });
      exitAfterFlush(logger, 1);
    };
  const onUncaughtException = onFatal('uncaughtException');
  const onUnhandledRejection = onFatal('unhandledRejection');
  const onWarning = (warning: Error): void => {
    logger.warn(warning.message, { event: 'warning', name: warning.name });
  };

  process.on('uncaughtException', onUncaughtException);
  process.on('unhandledRejection', onUnhandledRejection);
  process.on('warning', onWarning);

  const detach: DetachHandlers = () => {
    process.off('uncaughtException', onUncaughtException);
    process.off('unhandledRejection', onUnhandledRejection);
    process.off('warning', onWarning);
    if (attached === detach) {
      attached = undefined;
    }
  };
  attached = detach;

  return detach;
}

function exitAfterFlush(logger: Logger, exitCode: number): void {
  const timer = setTimeout(() => process.exit(exitCode), FLUSH_TIMEOUT_MS);
  logger.once('finish', () => {
    clearTimeout(timer);
    process.exit(exitCode);
  });
  logger.end();
}
