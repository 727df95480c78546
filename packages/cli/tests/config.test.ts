/**
 * Configuration loading tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigurationError, isConfigurationError } from '@workday/contracts';
import { createSilentLogger } from '@workday/logger';
import { loadConfig, loadHolidayFile } from '../src/config/index.js';

const EXAMPLE_CONFIG = fileURLToPath(new URL('../config/workday.example.json', import.meta.url));
const EXAMPLE_HOLIDAYS = fileURLToPath(new URL('../config/holidays.example.json', import.meta.url));

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'workday-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeJson(name: string, content: unknown): string {
    const path = join(dir, name);
    writeFileSync(path, JSON.stringify(content));
    return path;
  }

  it('should apply schema defaults', () => {
    const config = loadConfig({ env: {} });

    expect(config).toEqual({
      logging: { level: 'warn', format: 'pretty' },
      workday: { start: '08:00', stop: '16:00' },
      holidays: [],
      recurringHolidays: [],
      holidayFiles: [],
    });
  });

  it('should read a config file', () => {
    const configPath = writeJson('workday.json', { workday: { start: '09:00' }, holidays: ['2024-07-04'] });

    const config = loadConfig({ configPath, env: {} });

    expect(config.workday).toEqual({ start: '09:00', stop: '16:00' });
    expect(config.holidays).toEqual(['2024-07-04']);
  });

  it('should find the config file through WORKDAY_CONFIG', () => {
    const configPath = writeJson('workday.json', { recurringHolidays: ['12-25'] });

    const config = loadConfig({ env: { WORKDAY_CONFIG: configPath } });

    expect(config.recurringHolidays).toEqual(['12-25']);
  });

  it('should let environment variables override the file', () => {
    const configPath = writeJson('workday.json', { workday: { start: '09:00', stop: '17:00' } });

    const config = loadConfig({
      configPath,
      env: { WORKDAY_START: '07:30', LOG_LEVEL: 'debug', LOG_FORMAT: 'json', WORKDAY_STOP: '' },
    });

    expect(config.workday).toEqual({ start: '07:30', stop: '17:00' });
    expect(config.logging).toEqual({ level: 'debug', format: 'json' });
  });

  it('should let overrides win and append holidays', () => {
    const configPath = writeJson('workday.json', { holidays: ['2024-07-04'], recurringHolidays: ['01-01'] });

    const config = loadConfig({
      configPath,
      env: { WORKDAY_START: '07:30' },
      overrides: { start: '10:00', holidays: ['2024-12-24'], recurringHolidays: ['12-25'] },
    });

    expect(config.workday.start).toBe('10:00');
    expect(config.holidays).toEqual(['2024-07-04', '2024-12-24']);
    expect(config.recurringHolidays).toEqual(['01-01', '12-25']);
  });

  it('should report every validation issue', () => {
    const error = captureError(() =>
      loadConfig({ env: { WORKDAY_START: '8am' }, overrides: { holidays: ['2024/07/04'] } })
    );

    expect(isConfigurationError(error)).toBe(true);
    if (isConfigurationError(error)) {
      expect(error.code).toBe('CONFIGURATION_ERROR');
      expect(error.data?.['issues']).toEqual(['workday.start: Expected HH:MM', 'holidays.0: Expected YYYY-MM-DD']);
      expect(error.message).toBe(
        'Configuration validation failed:\nworkday.start: Expected HH:MM\nholidays.0: Expected YYYY-MM-DD'
      );
    }
  });

  it('should reject holidays that are not calendar dates', () => {
    const error = captureError(() =>
      loadConfig({ env: {}, overrides: { holidays: ['2023-02-29'], recurringHolidays: ['02-29', '04-31'] } })
    );

    expect(isConfigurationError(error)).toBe(true);
    if (isConfigurationError(error)) {
      expect(error.data?.['issues']).toEqual([
        'holidays.0: No such calendar date',
        'recurringHolidays.1: No such calendar date',
      ]);
    }
  });

  it('should reject an hour past 23', () => {
    expect(() => loadConfig({ env: {}, overrides: { stop: '24:00' } })).toThrow(ConfigurationError);
  });

  it('should fail on a missing config file', () => {
    const configPath = join(dir, 'missing.json');

    const error = captureError(() => loadConfig({ configPath, env: {} }));

    expect(error).toBeInstanceOf(ConfigurationError);
    if (isConfigurationError(error)) {
      expect(error.data).toEqual({ path: configPath });
    }
  });

  it('should fail on a config file that is not an object', () => {
    const configPath = writeJson('workday.json', ['08:00', '16:00']);

    expect(() => loadConfig({ configPath, env: {} })).toThrow(`Expected a JSON object in ${configPath}`);
  });

  it('should merge holiday files relative to the config file', () => {
    const config = loadConfig({ configPath: EXAMPLE_CONFIG, env: {} });

    expect(config.holidayFiles).toEqual([EXAMPLE_HOLIDAYS]);
    expect(config.holidays).toEqual(['2024-05-27', '2024-03-29', '2024-04-01']);
    expect(config.recurringHolidays).toEqual(['05-17', '01-01', '12-25', '12-26']);
    expect(config.logging.level).toBe('info');
  });

  it('should log a summary at debug level', () => {
    const logger = createSilentLogger();
    const debug = vi.spyOn(logger, 'debug');

    loadConfig({ env: {}, logger });

    expect(debug).toHaveBeenCalledWith('Configuration loaded', {
      configPath: null,
      workday: '08:00-16:00',
      holidays: 0,
      recurringHolidays: 0,
      holidayFiles: 0,
      logging: { level: 'warn', format: 'pretty', file: null },
    });
  });
});

describe('loadHolidayFile', () => {
  it('should default missing lists to empty', () => {
    const dir = mkdtempSync(join(tmpdir(), 'workday-holidays-'));
    const path = join(dir, 'holidays.json');
    writeFileSync(path, JSON.stringify({ recurringHolidays: ['07-04'] }));

    try {
      expect(loadHolidayFile(path)).toEqual({ holidays: [], recurringHolidays: ['07-04'] });
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('should reject an impossible date in a holiday file', () => {
    const dir = mkdtempSync(join(tmpdir(), 'workday-holidays-'));
    const path = join(dir, 'holidays.json');
    writeFileSync(path, JSON.stringify({ holidays: ['2024-07-04', '2024-02-30'] }));

    try {
      const error = captureError(() => loadHolidayFile(path));
      expect(isConfigurationError(error)).toBe(true);
      if (isConfigurationError(error)) {
        expect(error.data).toEqual({ issues: ['holidays.1: No such calendar date'], path });
      }
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('should name the file in validation errors', () => {
    const dir = mkdtempSync(join(tmpdir(), 'workday-holidays-'));
    const path = join(dir, 'holidays.json');
    writeFileSync(path, JSON.stringify({ recurringHolidays: ['July 4'] }));

    try {
      const error = captureError(() => loadHolidayFile(path));
      expect(isConfigurationError(error)).toBe(true);
      if (isConfigurationError(error)) {
        expect(error.data).toEqual({ issues: ['recurringHolidays.0: Expected MM-DD'], path });
      }
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
