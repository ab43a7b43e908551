/**
 * Environment configuration for the scraper
 * Loads and validates environment variables, falling back to defaults
 */

import { ConfigurationError } from '../types/errors';
import { isLogLevel, LogLevel } from '../utils/logger';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36';
export const DEFAULT_ACCEPT_LANGUAGE = 'bn,en;q=0.9,en-US;q=0.8';

export interface EnvironmentConfig {
  scraper: {
    dataDir: string;
    requestDelayMs: number;
    concurrencyLimit: number;
  };
  fetch: {
    timeoutMs: number;
    retries: number;
    userAgent: string;
    acceptLanguage: string;
  };
  logging: {
    level: LogLevel;
  };
}

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

/**
 * Load and validate environment configuration
 * @throws ConfigurationError if a numeric variable or LOG_LEVEL is invalid
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const level = env.LOG_LEVEL || 'info';
  if (!isLogLevel(level)) {
    throw new ConfigurationError(`LOG_LEVEL must be one of debug, info, warn, error, got "${level}"`);
  }

  return {
    scraper: {
      dataDir: env.SCRAPER_DATA_DIR || 'data',
      requestDelayMs: readInt(env, 'SCRAPER_REQUEST_DELAY_MS', 2000, 0),
      concurrencyLimit: readInt(env, 'SCRAPER_CONCURRENCY', 1, 1)
    },
    fetch: {
      timeoutMs: readInt(env, 'SCRAPER_FETCH_TIMEOUT_MS', 30000, 1),
      retries: readInt(env, 'SCRAPER_FETCH_RETRIES', 2, 0),
      userAgent: env.SCRAPER_USER_AGENT || DEFAULT_USER_AGENT,
      acceptLanguage: env.SCRAPER_ACCEPT_LANGUAGE || DEFAULT_ACCEPT_LANGUAGE
    },
    logging: {
      level
    }
  };
}
