import winston from 'winston';
import type { LogFormat, LogLevel } from './config.js';

/**
 * Structured JSON lines, for deployments that ship logs somewhere.
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

/**
 * Human-readable console output for local runs.
 */
const prettyFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level}: ${message}${metaStr}`;
  }),
);

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
}

export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const level = options.level ?? 'info';
  return winston.createLogger({
    level: level === 'silent' ? 'error' : level,
    silent: level === 'silent',
    defaultMeta: { service: 'inkgrid' },
    transports: [
      new winston.transports.Console({
        format: options.format === 'json' ? jsonFormat : prettyFormat,
      }),
    ],
  });
}

export const silentLogger = createLogger({ level: 'silent' });
