import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { LOG_LEVELS, type LogLevel } from './logger';

const MINUTE = 60_000;

const envSchema = z.object({
  SYNC_API_URL: z.string().url(),
  SYNC_INTERVAL_MINUTES: z.coerce.number().int().positive().default(10),
  // Estimated token validity, kept below the lifetime the API grants
  SYNC_TOKEN_LIFETIME_MINUTES: z.coerce.number().positive().default(55),
  SYNC_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SYNC_DB_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface AppConfig {
  apiBaseUrl: string;
  syncIntervalMs: number;
  tokenLifetimeMs: number;
  httpTimeoutMs: number;
  connectTimeoutMs: number;
  logLevel: LogLevel;
}

export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => ({
        field: issue.path.join('.'),
        message: issue.message,
      })),
    );
  }

  const values = parsed.data;
  return {
    apiBaseUrl: values.SYNC_API_URL.replace(/\/+$/, ''),
    syncIntervalMs: values.SYNC_INTERVAL_MINUTES * MINUTE,
    tokenLifetimeMs: values.SYNC_TOKEN_LIFETIME_MINUTES * MINUTE,
    httpTimeoutMs: values.SYNC_HTTP_TIMEOUT_MS,
    connectTimeoutMs: values.SYNC_DB_CONNECT_TIMEOUT_MS,
    logLevel: values.LOG_LEVEL,
  };
}

/**
 * Load `.env` (when present) into the process environment and parse it
 */
export function loadConfig(path?: string): AppConfig {
  dotenv.config(path ? { path } : {});
  return parseConfig(process.env);
}
