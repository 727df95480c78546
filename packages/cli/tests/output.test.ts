import { describe, it, expect } from 'vitest';
import type { WorkdayCommandResult } from '../src/commands.js';
import { exitCodeFor, formatResult } from '../src/output.js';

describe('formatResult', () => {
  const increment: WorkdayCommandResult = {
    success: true,
    command: 'increment',
    data: { start: '2004-01-01 15:07', workdays: 0.25, result: '2004-01-02 09:07' },
  };

  it('should print the bare result for increment', () => {
    expect(formatResult(increment, { json: false })).toBe('2004-01-02 09:07');
  });

  it('should print true or false for is-holiday', () => {
    const result: WorkdayCommandResult = {
      success: true,
      command: 'is-holiday',
      data: { date: '2024-07-04', holiday: false },
    };

    expect(formatResult(result, { json: false })).toBe('false');
  });

  it('should print the result object in JSON mode', () => {
    expect(JSON.parse(formatResult(increment, { json: true }))).toEqual({
      success: true,
      command: 'increment',
      data: { start: '2004-01-01 15:07', workdays: 0.25, result: '2004-01-02 09:07' },
    });
  });

  it('should list holidays one per line', () => {
    const result: WorkdayCommandResult = {
      success: true,
      command: 'holidays',
      data: { holidays: ['2024-07-04'], recurringHolidays: [] },
    };

    const lines = formatResult(result, { json: false }).split('\n');

    expect(lines).toHaveLength(4);
    expect(lines[1]).toBe('  2024-07-04');
    expect(lines[3]).toContain('(none)');
  });

  it('should print each error', () => {
    const result: WorkdayCommandResult = {
      success: false,
      command: 'increment',
      data: null,
      errors: ['WORKDAY_NOT_CONFIGURED: Workday start and stop are not configured'],
    };

    expect(formatResult(result, { json: false })).toContain(
      'WORKDAY_NOT_CONFIGURED: Workday start and stop are not configured'
    );
  });
});

describe('exitCodeFor', () => {
  it('should map failure to 2', () => {
    expect(exitCodeFor({ success: true, command: 'holidays', data: { holidays: [], recurringHolidays: [] } })).toBe(0);
    expect(exitCodeFor({ success: false, command: 'is-holiday', data: null, errors: ['INVALID_DATE'] })).toBe(2);
  });
});
