/**
 * Logging surface for the transfer engine.
 *
 * Components take a Logger in their options instead of reaching for a global,
 * so callers decide the level (or silence it entirely in tests).
 */
import winston from 'winston';
import { parseLogLevel, type LogLevel } from './config.js';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  error(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  silent?: boolean;
}

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
  })
);

export function createLogger(options: LoggerOptions = {}): Logger {
  const instance = winston.createLogger({
    level: options.level ?? parseLogLevel(process.env.LOG_LEVEL),
    silent: options.silent ?? false,
    format: consoleFormat,
    transports: [
      new winston.transports.Console({
        stderrLevels: ['error', 'warn'],
      }),
    ],
  });

  const log = (level: LogLevel) => (message: string, meta?: LogMeta): void => {
    if (meta) {
      instance.log(level, message, meta);
    } else {
      instance.log(level, message);
    }
  };

  return {
    error: log('error'),
    warn: log('warn'),
    info: log('info'),
    debug: log('debug'),
  };
}

let defaultLogger: Logger | null = null;

/** Shared logger used when a component is constructed without one. */
export function getDefaultLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}
