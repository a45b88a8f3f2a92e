/**
 * CLI Utilities
 *
 * Shared utilities for the textembed CLI commands.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { homedir } from 'node:os';
import {
  DefaultLoggerProvider,
  createLogger,
  isLogLevel,
  setLoggerProvider,
  type LogLevel,
  type LoggerConfig,
  type LoggerProvider,
} from '../lib/logger.js';
import {
  type CliConfig,
  safeValidateCliConfig,
  formatValidationError,
} from '../lib/config-schema.js';
import { ConfigurationError, getErrorCode } from '../lib/errors.js';

/** Module-level logger (uses provider for DI support) */
const getLog = () => createLogger('cli');

/** Name of the per-user / per-project configuration file */
export const CONFIG_FILE_NAME = '.textembedrc';

/** ANSI color codes */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
} as const;

/** Color output helpers */
export const color = {
  dim: (s: string) => `${colors.dim}${s}${colors.reset}`,
  green: (s: string) => `${colors.green}${s}${colors.reset}`,
  yellow: (s: string) => `${colors.yellow}${s}${colors.reset}`,
  cyan: (s: string) => `${colors.cyan}${s}${colors.reset}`,
  success: (s: string) => `${colors.green}${colors.bold}${s}${colors.reset}`,
  error: (s: string) => `${colors.red}${colors.bold}${s}${colors.reset}`,
};

/**
 * Format duration as human-readable string
 */
export function formatDuration(seconds: number): string {
  if (!isFinite(seconds) || seconds < 0) return '--:--';
  if (seconds < 60) return `${Math.round(seconds)}s`;
  if (seconds < 3600) {
    const m = Math.floor(seconds / 60);
    const s = Math.round(seconds % 60);
    return `${m}m ${s}s`;
  }
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  return `${h}h ${m}m`;
}

/**
 * Format number with commas
 */
export function formatNumber(n: number): string {
  return n.toLocaleString('en-US');
}

// Re-export CliConfig type from schema
export type { CliConfig } from '../lib/config-schema.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readConfigFile(path: string): Promise<Record<string, unknown> | null> {
  let data: string;
  try {
    data = await readFile(path, 'utf-8');
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      return null;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Invalid JSON in ${path}: ${reason}`);
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`${path} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Load configuration from .textembedrc or environment
 *
 * Configuration is loaded from (in order of precedence):
 * 1. Environment variables (highest priority)
 * 2. .textembedrc in current directory
 * 3. .textembedrc in home directory (lowest priority)
 *
 * Only the first config file found is read.
 *
 * @returns Validated CLI configuration
 * @throws {ConfigurationError} If a config file or the result is invalid
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<CliConfig> {
  const config: Record<string, unknown> = {};

  const configPaths = [join(process.cwd(), CONFIG_FILE_NAME), join(homedir(), CONFIG_FILE_NAME)];

  for (const configPath of configPaths) {
    const parsed = await readConfigFile(configPath);
    if (parsed) {
      getLog().debug('Loaded config file', { path: configPath });
      Object.assign(config, parsed);
      break;
    }
  }

  // Override with environment variables
  const envEmbeddingUrl = env['TEXTEMBED_EMBEDDING_URL'];
  if (envEmbeddingUrl) {
    config['embeddingUrl'] = envEmbeddingUrl;
  }
  const envModelName = env['TEXTEMBED_MODEL_NAME'];
  if (envModelName) {
    config['modelName'] = envModelName;
  }
  const envModelRevision = env['TEXTEMBED_MODEL_REVISION'];
  if (envModelRevision) {
    config['modelRevision'] = envModelRevision;
  }
  const envContentTypes = env['TEXTEMBED_CONTENT_TYPES'];
  if (envContentTypes) {
    config['contentTypes'] = parseList(envContentTypes);
  }
  const envMinCharLength = env['TEXTEMBED_MIN_CHAR_LENGTH'];
  if (envMinCharLength) {
    config['minCharLength'] = parseInt(envMinCharLength, 10);
  }

  const result = safeValidateCliConfig(config);
  if (!result.success) {
    const errorMessage = formatValidationError(result.error);
    throw new ConfigurationError(`Invalid configuration:\n${errorMessage}`);
  }

  return result.data;
}

/** Level names accepted by `--level` besides the logger's own */
const LEVEL_ALIASES: Record<string, LogLevel> = {
  warning: 'warn',
  critical: 'error',
};

/**
 * Parse a `--level` value (case-insensitive)
 *
 * @throws {ConfigurationError} If the level is unknown
 */
export function parseLogLevel(value: string): LogLevel {
  const lower = value.toLowerCase();
  if (isLogLevel(lower)) {
    return lower;
  }
  const alias = LEVEL_ALIASES[lower];
  if (alias) {
    return alias;
  }
  throw new ConfigurationError(
    `Unknown log level "${value}". Use one of: debug, info, warning, error, critical`
  );
}

/** Logging options shared by all commands */
export interface LoggingOptions {
  level?: string | undefined;
  logFile?: string | undefined;
}

/**
 * Route all module loggers through a provider configured from the command
 * line.
 *
 * @returns The previous provider
 */
export function configureLogging(options: LoggingOptions): LoggerProvider {
  const overrides: Partial<Omit<LoggerConfig, 'context'>> = {};
  if (options.level !== undefined) {
    overrides.level = parseLogLevel(options.level);
  }
  if (options.logFile !== undefined) {
    overrides.file = resolvePath(options.logFile);
  }
  return setLoggerProvider(new DefaultLoggerProvider(overrides));
}

/**
 * Print error message and exit
 */
export function fatal(message: string): never {
  getLog().error(message, undefined, 'fatal');
  console.error(`\n${color.error('Error:')} ${message}\n`);
  process.exit(1);
}

/**
 * Parse comma-separated list
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Resolve path relative to cwd or absolute
 */
export function resolvePath(p: string): string {
  if (p.startsWith('/') || p.startsWith('~')) {
    return p.replace('~', homedir());
  }
  return join(process.cwd(), p);
}
