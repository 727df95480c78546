/**
 * commander program behind the `workday` binary
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { isConfigurationError } from '@workday/contracts';
import { attachGlobalHandlers, createLogger, type Logger } from '@workday/logger';
import { loadConfig, type Config } from './config/index.js';
import { WorkdayCommands, type WorkdayCommandResult } from './commands.js';
import { exitCodeFor, formatResult } from './output.js';

/** Exit code when configuration cannot be loaded */
export const CONFIG_ERROR_EXIT_CODE = 1;

/**
 * Where the program reads its environment and sends its output
 */
export interface ProgramIO {
  stdout(text: string): void;
  stderr(text: string): void;
  setExitCode(code: number): void;
  env: NodeJS.ProcessEnv;
  createLogger(config: Config): Logger;
}

interface GlobalOptions {
  config?: string;
  start?: string;
  stop?: string;
  holiday: string[];
  recurring: string[];
  json: boolean;
}

const processIO: ProgramIO = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  setExitCode: (code) => {
    process.exitCode = code;
  },
  env: process.env,
  createLogger: (config) =>
    createLogger({
      level: config.logging.level,
      json: config.logging.format === 'json',
      ...(config.logging.filePath ? { filePath: config.logging.filePath } : {}),
    }),
};

// Repeated options accumulate: --holiday 2024-07-04 --holiday 2024-12-24
function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Builds the `workday` program. Actions are synchronous, so `parse` returns
 * after the command has written its output and set the exit code.
 *
 * @example
 * ```typescript
 * buildProgram().parse(process.argv);
 * ```
 */
export function buildProgram(overrides: Partial<ProgramIO> = {}): Command {
  const io: ProgramIO = { ...processIO, ...overrides };
  const program = new Command();

  program
    .name('workday')
    .description('Add or subtract workdays, skipping weekends and holidays')
    .version('0.1.0')
    .option('-c, --config <path>', 'JSON configuration file (default: $WORKDAY_CONFIG)')
    .option('--start <HH:MM>', 'Workday start time')
    .option('--stop <HH:MM>', 'Workday stop time')
    .option('--holiday <date>', 'One-time holiday (YYYY-MM-DD), repeatable', collect, [])
    .option('--recurring <MM-DD>', 'Holiday on the same month and day every year, repeatable', collect, [])
    .option('--json', 'Print results as JSON', false)
    .addHelpText(
      'after',
      `
Examples:
  $ workday increment "2004-01-01 15:07" 0.25
  $ workday --holiday 2024-07-04 increment "2024-07-03 09:00" 1
  $ workday --recurring 12-25 --recurring 12-26 holidays
  $ workday increment -- "2004-05-24 18:05" -5.5`
    );

  const run = (execute: (commands: WorkdayCommands) => WorkdayCommandResult): void => {
    const options = program.opts<GlobalOptions>();

    let config: Config;
    try {
      config = loadConfig({
        configPath: options.config,
        env: io.env,
        overrides: {
          start: options.start,
          stop: options.stop,
          holidays: options.holiday,
          recurringHolidays: options.recurring,
        },
      });
    } catch (error) {
      if (isConfigurationError(error)) {
        io.stderr(chalk.red(`✖ ${error.message}`));
        io.setExitCode(CONFIG_ERROR_EXIT_CODE);
        return;
      }
      throw error;
    }

    const logger = io.createLogger(config);
    const detach = attachGlobalHandlers(logger);

    try {
      const result = execute(new WorkdayCommands(config, logger));
      io.stdout(formatResult(result, { json: options.json }));
      io.setExitCode(exitCodeFor(result));
    } finally {
      detach();
    }
  };

  program
    .command('increment')
    .description('Date and time reached after a number of workdays')
    .argument('<start>', 'Start date, "YYYY-MM-DD HH:MM"')
    .argument('<workdays>', 'Fractional workdays; negative values go after --')
    .action((start: string, workdays: string) => {
      run((commands) => commands.increment(start, workdays));
    });

  program
    .command('is-holiday')
    .description('Whether a date is a weekend or holiday')
    .argument('<date>', 'Date, "YYYY-MM-DD"')
    .action((date: string) => {
      run((commands) => commands.isHoliday(date));
    });

  program
    .command('holidays')
    .description('List configured holidays')
    .action(() => {
      run((commands) => commands.holidays());
    });

  return program;
}
