/**
 * @workday/cli
 *
 * Configuration loading, command implementations and output formatting
 * for the `workday` command-line tool.
 */

export {
  loadConfig,
  loadHolidayFile,
  getConfigSummary,
  configSchema,
  envMapping,
  holidayFileSchema,
  type Config,
  type HolidayFile,
  type ConfigOverrides,
  type LoadConfigOptions,
} from './config/index.js';
export {
  WorkdayCommands,
  type CommandResult,
  type WorkdayCommandResult,
  type IncrementData,
  type IsHolidayData,
  type HolidaysData,
} from './commands.js';
export { formatResult, exitCodeFor, type OutputOptions } from './output.js';
export { buildProgram, CONFIG_ERROR_EXIT_CODE, type ProgramIO } from './program.js';
