/**
 * @fileoverview Public API exports for @workday/logger
 * Structured logging and process-level error handling
 */

export { createLogger, createChildLogger, createSilentLogger } from './createLogger.js';

export { attachGlobalHandlers, describeFailure } from './errorHandler.js';
export type { DetachHandlers } from './errorHandler.js';

export { standardFields, prettyPrint, renderContext } from './formats.js';

export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
