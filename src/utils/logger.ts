/**
 * Structured logging for the turn runtime.
 */

import { appendFileSync } from 'node:fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext | undefined;
}

export interface LoggerOptions {
  /** Minimum log level to output (default: 'info') */
  level?: LogLevel | undefined;
  /** Logger name, rendered as a `[name]` prefix */
  name?: string | undefined;
  /** Fields merged into the context of every entry */
  bindings?: LogContext | undefined;
  handler?: ((entry: LogEntry) => void) | undefined;
}

export interface ConfigureLoggingOptions {
  handler?: ((entry: LogEntry) => void) | undefined;
  /** Append log lines to this file instead of the console */
  file?: string | undefined;
}

export function formatLogEntry(entry: LogEntry): string {
  const prefix = `[${entry.timestamp}] ${entry.level.toUpperCase()}`;
  return entry.context
    ? `${prefix}: ${entry.message} ${JSON.stringify(entry.context)}`
    : `${prefix}: ${entry.message}`;
}

function consoleHandler(entry: LogEntry): void {
  const line = formatLogEntry(entry);
  switch (entry.level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
}

/**
 * Loggers built with the default handler delegate here, so `configureLogging()`
 * also redirects loggers created at import time.
 */
let activeHandler: (entry: LogEntry) => void = consoleHandler;

function defaultHandler(entry: LogEntry): void {
  activeHandler(entry);
}

/**
 * Redirect every runtime logger.
 *
 * @example
 * ```typescript
 * configureLogging({ file: 'agent.log' });
 * configureLogging({ handler: (entry) => sink.write(entry) });
 * ```
 */
export function configureLogging(options: ConfigureLoggingOptions): void {
  if (options.handler) {
    activeHandler = options.handler;
  } else if (options.file) {
    const filePath = options.file;
    activeHandler = (entry: LogEntry) => {
      appendFileSync(filePath, `${formatLogEntry(entry)}\n`);
    };
  }
}

/** Restore console output. */
export function resetLogging(): void {
  activeHandler = consoleHandler;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'info':
      return 'info';
    case 'warn':
    case 'warning':
      return 'warn';
    case 'error':
      return 'error';
    default:
      return fallback;
  }
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Child logger; names nest as `parent:child`, bindings merge */
  child(options: LoggerOptions): Logger;
}

/**
 * Create a logger instance.
 *
 * @example
 * ```typescript
 * const log = createLogger({ name: 'orchestrator', level: 'debug' });
 * log.info('Turn started', { turn: 3 });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = defaultLevel(), name, bindings, handler = defaultHandler } = options;
  const minLevel = LOG_LEVELS[level];

  function log(logLevel: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVELS[logLevel] < minLevel) {
      return;
    }

    const merged = bindings || context ? { ...bindings, ...context } : undefined;
    handler({
      level: logLevel,
      message: name ? `[${name}] ${message}` : message,
      timestamp: new Date().toISOString(),
      context: merged,
    });
  }

  return {
    debug: (message, context) => {
      log('debug', message, context);
    },
    info: (message, context) => {
      log('info', message, context);
    },
    warn: (message, context) => {
      log('warn', message, context);
    },
    error: (message, context) => {
      log('error', message, context);
    },
    child: (childOptions) => {
      const childName =
        name && childOptions.name ? `${name}:${childOptions.name}` : (childOptions.name ?? name);
      return createLogger({
        level,
        handler,
        ...childOptions,
        name: childName,
        bindings:
          bindings || childOptions.bindings ? { ...bindings, ...childOptions.bindings } : undefined,
      });
    },
  };
}

/** Level from AGENT_CORE_LOG_LEVEL, 'info' when unset or unknown. */
function defaultLevel(): LogLevel {
  return parseLogLevel(process.env['AGENT_CORE_LOG_LEVEL']);
}

export const logger = createLogger({ name: 'agent-core' });
