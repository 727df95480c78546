/**
 * Configuration loading and management
 *
 * Sources, lowest to highest precedence: schema defaults, JSON config file,
 * environment variables, command-line overrides.
 */

import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import type { ZodError } from 'zod';
import { ConfigurationError } from '@workday/contracts';
import type { Logger } from '@workday/logger';
import { configSchema, envMapping, holidayFileSchema, type Config, type HolidayFile } from './schema.js';

/**
 * Values given on the command line
 */
export interface ConfigOverrides {
  start?: string;
  stop?: string;

  /** Appended to the configured one-time holidays */
  holidays?: string[];

  /** Appended to the configured recurring holidays */
  recurringHolidays?: string[];
}

export interface LoadConfigOptions {
  /** JSON config file; falls back to WORKDAY_CONFIG */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
  logger?: Logger;
}

/**
 * Load configuration from file, environment, overrides and defaults.
 * Holiday files are read and merged into `holidays` / `recurringHolidays`.
 *
 * @throws {ConfigurationError} when a file cannot be read or validation fails
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env['WORKDAY_CONFIG'];
  const rawConfig: Record<string, unknown> = configPath ? readJsonObject(configPath) : {};

  for (const [envKey, targetPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, targetPath, value);
    }
  }

  applyOverrides(rawConfig, options.overrides ?? {});

  const result = configSchema.safeParse(rawConfig);
  if (!result.success) {
    throw validationError('Configuration validation failed', result.error, configPath);
  }

  const baseDir = configPath ? dirname(resolve(configPath)) : process.cwd();
  const config: Config = {
    ...result.data,
    holidayFiles: result.data.holidayFiles.map((file) => resolve(baseDir, file)),
  };

  for (const file of config.holidayFiles) {
    const holidays = loadHolidayFile(file);
    config.holidays = [...config.holidays, ...holidays.holidays];
    config.recurringHolidays = [...config.recurringHolidays, ...holidays.recurringHolidays];
  }

  if (options.logger) {
    options.logger.debug('Configuration loaded', getConfigSummary(config, configPath));
  }

  return config;
}

/**
 * Read and validate a holiday list file
 *
 * @throws {ConfigurationError}
 */
export function loadHolidayFile(path: string): HolidayFile {
  const result = holidayFileSchema.safeParse(readJsonObject(path));
  if (!result.success) {
    throw validationError('Holiday file validation failed', result.error, path);
  }
  return result.data;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config, configPath?: string): Record<string, unknown> {
  return {
    configPath: configPath ?? null,
    workday: `${config.workday.start}-${config.workday.stop}`,
    holidays: config.holidays.length,
    recurringHolidays: config.recurringHolidays.length,
    holidayFiles: config.holidayFiles.length,
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? null,
    },
  };
}

function readJsonObject(path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to read ${path}: ${reason}`, { path });
  }

  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Expected a JSON object in ${path}`, { path });
  }
  return parsed;
}

function applyOverrides(rawConfig: Record<string, unknown>, overrides: ConfigOverrides): void {
  if (overrides.start !== undefined) {
    setNestedProperty(rawConfig, 'workday.start', overrides.start);
  }
  if (overrides.stop !== undefined) {
    setNestedProperty(rawConfig, 'workday.stop', overrides.stop);
  }
  if (overrides.holidays?.length) {
    rawConfig['holidays'] = [...asArray(rawConfig['holidays']), ...overrides.holidays];
  }
  if (overrides.recurringHolidays?.length) {
    rawConfig['recurringHolidays'] = [...asArray(rawConfig['recurringHolidays']), ...overrides.recurringHolidays];
  }
}

function validationError(message: string, error: ZodError, path: string | undefined): ConfigurationError {
  const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  return new ConfigurationError(`${message}:\n${issues.join('\n')}`, path === undefined ? { issues } : { issues, path });
}

/**
 * Set nested property in object
 */
function setNestedProperty(target: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) return;

  let current = target;
  for (const key of keys) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// A lone value counts as a one-element list
function asArray(value: unknown): unknown[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

// Re-export types
export type { Config, HolidayFile } from './schema.js';
export { configSchema, envMapping, holidayFileSchema } from './schema.js';
