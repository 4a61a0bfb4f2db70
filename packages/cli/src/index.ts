/**
 * @txrecon/cli
 *
 * Command implementations behind the `txrecon` binary
 */

export { parseCommandLine, UsageError, USAGE } from './args.js';
export type { ParsedCommand } from './args.js';
export {
  configFileSchema,
  feedEntrySchema,
  loadConfig,
  parseConfig,
  resolveConfig,
  expandEnvVars,
  formatZodError,
  ConfigError,
} from './config.js';
export type { ConfigFile, FeedEntry, ResolvedConfig, EnvExpansionOptions } from './config.js';
export { createFeedConnector } from './feeds.js';
export { Logger, maskAccount, redactSecrets } from './logger.js';
export type { LogLevel, LogFormat, LoggerOptions } from './logger.js';
export { generateSampleData, toComplianceRecord, SeededRandom } from './sample-data.js';
export type { SampleData, SampleDataOptions, SampleScenario } from './sample-data.js';
export { runCommand } from './commands/run.js';
export type { RunCommandOptions, RunCommandResult } from './commands/run.js';
export { historyCommand, DEFAULT_HISTORY_LIMIT } from './commands/history.js';
export type { HistoryCommandOptions, HistoryCommandResult } from './commands/history.js';
export { generateCommand, SOURCE_SAMPLE_FILE, TARGET_SAMPLE_FILE } from './commands/generate.js';
export type { GenerateCommandOptions, GenerateCommandResult } from './commands/generate.js';
export type { CommandIO, CommandResult } from './commands/io.js';
