/**
 * @fileoverview Main entry point for @workday/contracts package.
 *
 * @module @workday/contracts
 */

export {
  WorkdayError,
  InvalidDateError,
  InvalidIncrementError,
  WorkdayNotConfiguredError,
  InvalidWorkdayWindowError,
  InternalFaultError,
  ConfigurationError,
  isWorkdayError,
  isInvalidDateError,
  isWorkdayNotConfiguredError,
  isInternalFaultError,
  isConfigurationError,
} from './errors.js';
