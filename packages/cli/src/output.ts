/**
 * Output formatting for CLI results
 */

import chalk from 'chalk';
import type { WorkdayCommandResult } from './commands.js';

export interface OutputOptions {
  json: boolean;
}

/**
 * Exit code for a command result: 0 on success, 2 when the command
 * could not produce a value.
 */
export function exitCodeFor(result: WorkdayCommandResult): number {
  return result.success ? 0 : 2;
}

/**
 * Render a result for stdout. JSON mode prints the result object as is.
 */
export function formatResult(result: WorkdayCommandResult, options: OutputOptions): string {
  if (options.json) {
    return JSON.stringify(result, null, 2);
  }

  if (!result.success) {
    return (result.errors ?? ['Command failed']).map((error) => chalk.red(`✖ ${error}`)).join('\n');
  }

  return formatText(result);
}

function formatText(result: WorkdayCommandResult): string {
  switch (result.command) {
    case 'increment':
      return result.data ? result.data.result : '';
    case 'is-holiday':
      return result.data ? String(result.data.holiday) : '';
    case 'holidays': {
      if (!result.data) return '';
      const lines = [chalk.bold('Holidays:')];
      lines.push(...listOrNone(result.data.holidays));
      lines.push(chalk.bold('Recurring holidays:'));
      lines.push(...listOrNone(result.data.recurringHolidays));
      return lines.join('\n');
    }
  }
}

function listOrNone(items: string[]): string[] {
  return items.length > 0 ? items.map((item) => `  ${item}`) : [chalk.gray('  (none)')];
}
