/**
 * @fileoverview Error taxonomy for the workday calendar suite.
 *
 * Every failure the engine can report is a WorkdayError carrying:
 * - Unique error code (string constant)
 * - Structured data payload
 * - ISO timestamp
 *
 * The engine never throws these to its callers. They travel inside
 * failure results and log entries; only the CLI turns them into exit codes.
 *
 * @module @workday/contracts/errors
 */

/**
 * Base error class for all workday calendar errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * const err = new WorkdayError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class WorkdayError extends Error {
  /**
   * Machine-readable error code (e.g., 'INVALID_DATE').
   */
  readonly code: string;

  /**
   * Structured error data for debugging.
   */
  readonly data?: Record<string, unknown>;

  /**
   * ISO 8601 timestamp when error was created.
   */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    if (data !== undefined) {
      this.data = data;
    }
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes error to JSON-safe object.
   *
   * @example
   * ```typescript
   * JSON.stringify(new WorkdayError('TEST', 'Test error'));
   * ```
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * A date or time of day failed calendar validation.
 *
 * @example
 * ```typescript
 * new InvalidDateError('Invalid start date', { field: 'startDate', value: '2024-02-30 09:00' });
 * ```
 */
export class InvalidDateError extends WorkdayError {
  constructor(
    message: string,
    data: {
      field: string;
      value: string;
      [key: string]: unknown;
    }
  ) {
    super('INVALID_DATE', message, data);
  }
}

/**
 * The workday increment is not a finite number.
 */
export class InvalidIncrementError extends WorkdayError {
  constructor(message: string, data: { increment: number; [key: string]: unknown }) {
    super('INVALID_INCREMENT', message, data);
  }
}

/**
 * An increment was requested before workday start and stop were configured.
 */
export class WorkdayNotConfiguredError extends WorkdayError {
  constructor(message = 'Workday start and stop are not configured') {
    super('WORKDAY_NOT_CONFIGURED', message);
  }
}

/**
 * The configured window cannot be used for minute placement:
 * zero length, or a stop time earlier than the start time.
 */
export class InvalidWorkdayWindowError extends WorkdayError {
  constructor(message: string, data: { start: string; stop: string; [key: string]: unknown }) {
    super('INVALID_WORKDAY_WINDOW', message, data);
  }
}

/**
 * Unexpected exception raised while computing an increment.
 * The original error is kept as `cause`.
 */
export class InternalFaultError extends WorkdayError {
  constructor(message: string, cause: unknown, data?: Record<string, unknown>) {
    super('INTERNAL_FAULT', message, data);
    this.cause = cause;
  }
}

/**
 * Configuration could not be loaded or failed validation.
 *
 * @example
 * ```typescript
 * new ConfigurationError('Configuration validation failed', {
 *   issues: ['workday.start: Expected HH:MM'],
 * });
 * ```
 */
export class ConfigurationError extends WorkdayError {
  constructor(message: string, data?: { issues?: string[]; path?: string; [key: string]: unknown }) {
    super('CONFIGURATION_ERROR', message, data);
  }
}

/**
 * Type guard to check if an error is a WorkdayError.
 *
 * @example
 * ```typescript
 * try {
 *   loadConfig();
 * } catch (err) {
 *   if (isWorkdayError(err)) {
 *     console.error(`[${err.code}]`, err.message);
 *   }
 * }
 * ```
 */
export function isWorkdayError(error: unknown): error is WorkdayError {
  return error instanceof WorkdayError;
}

export function isInvalidDateError(error: unknown): error is InvalidDateError {
  return error instanceof InvalidDateError;
}

export function isInvalidIncrementError(error: unknown): error is InvalidIncrementError {
  return error instanceof InvalidIncrementError;
}

export function isWorkdayNotConfiguredError(error: unknown): error is WorkdayNotConfiguredError {
  return error instanceof WorkdayNotConfiguredError;
}

export function isInvalidWorkdayWindowError(error: unknown): error is InvalidWorkdayWindowError {
  return error instanceof InvalidWorkdayWindowError;
}

export function isInternalFaultError(error: unknown): error is InternalFaultError {
  return error instanceof InternalFaultError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
