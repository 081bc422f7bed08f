/**
 * Environment configuration.
 *
 * Every setting the server reads comes from the environment (optionally
 * seeded from a `.env` file) and is validated here once, at startup.
 */

import dotenv from 'dotenv';
import { z } from 'zod';

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

const DEFAULT_ALLOWED_ORIGINS = 'http://localhost:3000,http://localhost:5173';

export const EnvSchema = z.object({
  /** HTTP and WebSocket port; 0 picks a free one */
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),

  /** Bind address */
  HOST: z.string().min(1).default('127.0.0.1'),

  /** Base of the socket URL handed out by POST /register */
  PUBLIC_WS_URL: z.string().url().default('ws://127.0.0.1:8000/ws'),

  LOG_LEVEL: LogLevelSchema.default('info'),

  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Comma-separated CORS origins */
  ALLOWED_ORIGINS: z.string().default(DEFAULT_ALLOWED_ORIGINS),

  /** Extra attempts after a failed send */
  SEND_RETRIES: z.coerce.number().int().min(0).max(10).default(1),

  TURNS_PER_MATCH: z.coerce.number().int().min(1).max(100).default(12),
});

export interface ServerConfig {
  port: number;
  host: string;
  publicWsUrl: string;
  logLevel: LogLevel;
  logFormat: LogFormat;
  allowedOrigins: string[];
  sendRetries: number;
  turnsPerMatch: number;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid environment configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/** Validates an environment object. Throws ConfigError listing every bad variable. */
export function parseConfig(env: Record<string, string | undefined>): ServerConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(issue => `${issue.path.join('.') || 'root'}: ${issue.message}`));
  }
  const data = result.data;
  return {
    port: data.PORT,
    host: data.HOST,
    publicWsUrl: data.PUBLIC_WS_URL.replace(/\/+$/, ''),
    logLevel: data.LOG_LEVEL,
    logFormat: data.LOG_FORMAT,
    allowedOrigins: data.ALLOWED_ORIGINS.split(',')
      .map(origin => origin.trim())
      .filter(origin => origin.length > 0),
    sendRetries: data.SEND_RETRIES,
    turnsPerMatch: data.TURNS_PER_MATCH,
  };
}

/** Reads `.env` (if present) into process.env, then validates it. */
export function loadConfig(): ServerConfig {
  dotenv.config();
  return parseConfig(process.env);
}
