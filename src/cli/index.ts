/**
 * CLI Module Exports
 *
 * Re-exports all CLI commands and utilities.
 */

// Commands
export { embedCommand, resolveEmbedOptions } from './embed.js';
export { stampsCommand, resolveStampOptions } from './stamps.js';

// Utilities
export {
  color,
  configureLogging,
  formatDuration,
  formatNumber,
  loadConfig,
  fatal,
  parseList,
  parseLogLevel,
  resolvePath,
  CONFIG_FILE_NAME,
} from './utils.js';
export { formatLogHelp } from './log-help.js';

export type { CliConfig, LoggingOptions } from './utils.js';
export type { EmbedCommandOptions } from './embed.js';
export type { StampsCommandOptions } from './stamps.js';
