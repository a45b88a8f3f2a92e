/**
 * Logging
 *
 * Every module asks {@link createLogger} for a logger named after itself
 * (`embeddings:job`, `storage:upload`, ...). Entries go to stderr, as
 * coloured text or as one JSON object per line, and can be mirrored to a
 * file. Inside {@link withRunContext} each entry carries the run ID and the
 * run's fields.
 *
 * Environment: LOG_LEVEL, LOG_FORMAT, SERVICE_NAME and NODE_ENV.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';
import { appendFileSync } from 'node:fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Lowest severity first */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export type LogFormat = 'text' | 'json';

/** Identity of one pipeline run, attached to every entry logged inside it */
export interface RunContext {
  runId: string;
  fields?: Record<string, unknown>;
}

const runContexts = new AsyncLocalStorage<RunContext>();

export function generateRunId(): string {
  return randomUUID();
}

/**
 * Run `fn` with `context` attached to everything it logs, including
 * across awaits.
 */
export async function withRunContext<T>(context: RunContext, fn: () => Promise<T>): Promise<T> {
  return runContexts.run(context, fn);
}

export function getRunContext(): RunContext | undefined {
  return runContexts.getStore();
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function severity(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

/** One written entry; also the JSON shape of the json format and the file sink */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  context: string;
  message: string;
  data?: Record<string, unknown>;
  /** Stack of an `error` passed in the data */
  stack?: string;
  operation?: string;
  runId?: string;
  service?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  format: LogFormat;
  /** Module name shown in brackets */
  context: string;
  /** Prefix text lines with the local time */
  timestamps: boolean;
  service?: string;
  /** Append every entry to this file as a JSON line */
  file?: string;
}

const DEFAULT_SERVICE = 'textembed';

function levelFromEnv(): LogLevel {
  const value = process.env['LOG_LEVEL']?.toLowerCase();
  if (value !== undefined && isLogLevel(value)) {
    return value;
  }
  return process.env['NODE_ENV'] === 'development' ? 'debug' : 'info';
}

function formatFromEnv(): LogFormat {
  if (process.env['LOG_FORMAT']?.toLowerCase() === 'json') {
    return 'json';
  }
  return process.env['NODE_ENV'] === 'production' ? 'json' : 'text';
}

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const CYAN = '\x1b[36m';

/** Colour and fixed-width label per level */
const LEVEL_STYLES: Record<LogLevel, { color: string; label: string }> = {
  debug: { color: '\x1b[90m', label: 'DEBUG' },
  info: { color: '\x1b[34m', label: 'INFO ' },
  warn: { color: '\x1b[33m', label: 'WARN ' },
  error: { color: '\x1b[31m', label: 'ERROR' },
};

const dim = (text: string): string => `${DIM}${text}${RESET}`;

function clockTime(timestamp: string): string {
  return new Date(timestamp).toLocaleTimeString('en-US', {
    hour12: false,
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  });
}

/**
 * `12:00:01 INFO  [3f2a9c1e] [embeddings:job] (run) message key=value`
 *
 * Only the first group of the run ID is shown.
 */
function toText(entry: LogEntry, timestamps: boolean): string {
  const style = LEVEL_STYLES[entry.level];
  const fields = Object.entries(entry.data ?? {}).map(
    ([key, value]) => `${key}=${JSON.stringify(value)}`
  );

  const line = [
    timestamps ? dim(clockTime(entry.timestamp)) : undefined,
    `${style.color}${style.label}${RESET}`,
    entry.runId ? dim(`[${entry.runId.split('-')[0] ?? entry.runId}]`) : undefined,
    `${CYAN}[${entry.context}]${RESET}`,
    entry.operation ? dim(`(${entry.operation})`) : undefined,
    entry.message,
    fields.length > 0 ? dim(fields.join(' ')) : undefined,
  ]
    .filter((part) => part !== undefined)
    .join(' ');

  return entry.stack ? `${line}\n${dim(entry.stack)}` : line;
}

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: config.level ?? levelFromEnv(),
      format: config.format ?? formatFromEnv(),
      context: config.context ?? 'app',
      timestamps: config.timestamps ?? true,
      service: config.service ?? process.env['SERVICE_NAME'] ?? DEFAULT_SERVICE,
      ...(config.file !== undefined ? { file: config.file } : {}),
    };
  }

  debug(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('debug', message, data, operation);
  }

  info(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('info', message, data, operation);
  }

  warn(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('warn', message, data, operation);
  }

  /** An `error` field holding an Error is logged as its message plus stack */
  error(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('error', message, data, operation);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return severity(level) >= severity(this.config.level);
  }

  getConfig(): Readonly<LoggerConfig> {
    return { ...this.config };
  }

  private log(
    level: LogLevel,
    message: string,
    data: Record<string, unknown> | undefined,
    operation: string | undefined
  ): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const run = getRunContext();
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.config.context,
      message,
      service: this.config.service ?? DEFAULT_SERVICE,
    };
    if (run) {
      entry.runId = run.runId;
    }

    const error = data?.['error'];
    const merged = {
      ...run?.fields,
      ...data,
      ...(error instanceof Error ? { error: error.message } : {}),
    };
    if (Object.keys(merged).length > 0) {
      entry.data = merged;
    }
    if (error instanceof Error && error.stack) {
      entry.stack = error.stack;
    }
    if (operation) {
      entry.operation = operation;
    }

    // stderr, so stdout stays free for command output
    console.error(
      this.config.format === 'json' ? JSON.stringify(entry) : toText(entry, this.config.timestamps)
    );
    if (this.config.file) {
      appendFileSync(this.config.file, `${JSON.stringify(entry)}\n`, 'utf-8');
    }
  }
}

/** Where {@link createLogger} gets its loggers; swapped by the CLI and by tests */
export interface LoggerProvider {
  createLogger(context: string): Logger;
}

/** Builds one logger per context with shared overrides */
export class DefaultLoggerProvider implements LoggerProvider {
  private readonly loggers = new Map<string, Logger>();

  constructor(private readonly overrides: Partial<Omit<LoggerConfig, 'context'>> = {}) {}

  createLogger(context: string): Logger {
    const cached = this.loggers.get(context);
    if (cached) {
      return cached;
    }
    const logger = new Logger({ ...this.overrides, context });
    this.loggers.set(context, logger);
    return logger;
  }
}

let provider: LoggerProvider = new DefaultLoggerProvider();

/** @returns The provider that was replaced */
export function setLoggerProvider(next: LoggerProvider): LoggerProvider {
  const previous = provider;
  provider = next;
  return previous;
}

export function resetLoggerProvider(): void {
  provider = new DefaultLoggerProvider();
}

export function createLogger(context: string): Logger {
  return provider.createLogger(context);
}
