/**
 * Logger factory.
 *
 * Library classes accept an optional logger and otherwise share the
 * default one, whose level comes from LOG_LEVEL (default: info).
 */

import { pino, destination, type Logger, type LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export interface LoggerOptions {
  /** Logger name, shown as `name` on every line (default: 'ontology-catalog') */
  name?: string;
  /** Minimum level (default: LOG_LEVEL or 'info') */
  level?: LogLevel;
  /** Write to stderr instead of stdout, e.g. when stdout carries a protocol */
  stderr?: boolean;
}

function levelFromEnv(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level: LevelWithSilent = options.level ?? levelFromEnv();
  const config = {
    name: options.name ?? 'ontology-catalog',
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (options.stderr) {
    return pino(config, destination(2));
  }
  return pino(config);
}

let defaultLogger: Logger | undefined;

/**
 * Shared logger for components that were not handed one.
 */
export function getDefaultLogger(): Logger {
  if (defaultLogger === undefined) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}

/**
 * Replace the shared logger (the stdio MCP entry point routes it to stderr).
 */
export function setDefaultLogger(logger: Logger): void {
  defaultLogger = logger;
}
