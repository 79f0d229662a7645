/**
 * @tablediff/cli
 *
 * Settings loading, logging and the comparison run behind the tablediff binary
 */

export { parseArgs, UsageError, USAGE } from './args.js';
export type { CliArgs, ParsedArgs } from './args.js';
export {
  settingsFileSchema,
  formatZodError,
  readSettingsFile,
  mergeSettings,
  loadSettings,
  toComparisonSettings,
  GLOBAL_SETTINGS_FILE,
} from './config.js';
export type { SettingsFile, LoadedSettings } from './config.js';
export { Logger } from './logger.js';
export type { LogLevel, LogFormat, LoggerOptions } from './logger.js';
export {
  runComparison,
  logFailure,
  differencesFileName,
  suspiciousFileName,
  SUSPICIOUS_LOG_LIMIT,
} from './run.js';
export type { RunOptions, RunOutcome } from './run.js';
