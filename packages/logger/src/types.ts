/**
 * @fileoverview Type definitions for the workday logger
 * Provides strongly-typed interfaces for logger configuration and usage.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': Internal faults caught at an engine boundary
 * - 'warn': Conditions that should be reviewed
 * - 'info': Rejected input and normal operations
 * - 'debug': Detailed tracing for development
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './logs/workday.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * - true: Machine-readable JSON
   * - false: Human-readable pretty-print
   * @default true in production, false in development
   */
  json?: boolean;

  /**
   * Optional file path for file transport.
   * If provided, logs will be written to this file in addition to console.
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;

  /**
   * Suppress all output. Library code falls back to a silent logger
   * when the caller does not supply one.
   * @default false
   */
  silent?: boolean;
}

/**
 * Child logger context fields.
 * These fields are included in every entry written by the child logger.
 *
 * @example
 * ```typescript
 * const engineLogger = logger.child({ component: 'workday-calendar' });
 * engineLogger.info('Invalid workday start'); // includes component
 * ```
 */
export interface ChildLoggerContext {
  /** Component identifier (e.g., 'workday-calendar', 'cli') */
  component?: string;

  /** Operation context (e.g., 'increment') */
  operation?: string;

  /** Allow any additional context fields */
  [key: string]: unknown;
}

/**
 * Re-export Winston's Logger type for convenience.
 */
export type Logger = WinstonLogger;
