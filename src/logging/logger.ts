import { type Logger, type LoggerOptions, pino } from 'pino';

import { LOG_LEVEL_ENV } from '../specs.js';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'silent'];

export interface LoggerConfig {
  level?: LogLevel;
  name?: string;
  timestamp?: boolean;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const configured = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  return env.NODE_ENV === 'test' ? 'silent' : 'warn';
}

let globalLogger: Logger | null = null;

export function createLogger(config: LoggerConfig = {}): Logger {
  const options: LoggerOptions = {
    level: config.level ?? resolveLogLevel(),
    name: config.name,
    timestamp: config.timestamp === false ? false : pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
  return pino(options);
}

/**
 * Shared logger, as a child tagged with `component` when one is given.
 */
export function getLogger(component?: string): Logger {
  if (!globalLogger) {
    globalLogger = createLogger();
  }
  return component ? globalLogger.child({ component }) : globalLogger;
}

export function configureLogger(config: LoggerConfig): void {
  globalLogger = createLogger(config);
}

export function resetLogger(): void {
  globalLogger = null;
}
