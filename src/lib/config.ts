import path from 'path';
import { LOG_LEVELS, LogLevel } from './logger';

export const DEFAULT_DB_PATH = path.join('.rtm-mirror', 'mirror.db');

export interface RtmConfig {
  baseUrl: string;
  username: string | null;
  token: string;
  projectKey: string;
  projectId: number;
  dbPath: string;
  logLevel: LogLevel;
  retry: {
    maxRetries: number;
    baseDelayMs: number;
  };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

const requireNonEmpty = (env: Env, name: string): string => {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigError(`${name} is required`);
  }
  return value;
};

const optional = (env: Env, name: string): string | null => {
  const value = env[name]?.trim();
  return value ? value : null;
};

const parseNonNegativeInt = (env: Env, name: string, fallback: number): number => {
  const raw = optional(env, name);
  if (raw === null) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
};

const parseLogLevel = (env: Env): LogLevel => {
  const raw = optional(env, 'RTM_LOG_LEVEL');
  if (raw === null) {
    return 'info';
  }
  const match = LOG_LEVELS.find((level) => level === raw.toLowerCase());
  if (!match) {
    throw new ConfigError(`RTM_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`);
  }
  return match;
};

const parseBaseUrl = (env: Env): string => {
  const raw = requireNonEmpty(env, 'RTM_BASE_URL');
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigError(`RTM_BASE_URL is not a valid URL: "${raw}"`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError(`RTM_BASE_URL must use http or https, got "${url.protocol}"`);
  }
  return raw.replace(/\/+$/, '');
};

/**
 * Build the runtime configuration from an environment map.
 *
 * The CLI passes `process.env` after dotenv has loaded `.env.local` and
 * `.env`; library callers can pass any map.
 */
export function loadConfig(env: Env): RtmConfig {
  const projectIdRaw = requireNonEmpty(env, 'RTM_PROJECT_ID');
  const projectId = Number(projectIdRaw);
  if (!Number.isInteger(projectId) || projectId <= 0) {
    throw new ConfigError(`RTM_PROJECT_ID must be a positive integer, got "${projectIdRaw}"`);
  }

  return {
    baseUrl: parseBaseUrl(env),
    username: optional(env, 'RTM_USERNAME'),
    token: requireNonEmpty(env, 'RTM_TOKEN'),
    projectKey: requireNonEmpty(env, 'RTM_PROJECT_KEY'),
    projectId,
    dbPath: optional(env, 'RTM_DB_PATH') ?? DEFAULT_DB_PATH,
    logLevel: parseLogLevel(env),
    retry: {
      maxRetries: parseNonNegativeInt(env, 'RTM_MAX_RETRIES', 3),
      baseDelayMs: parseNonNegativeInt(env, 'RTM_RETRY_BASE_MS', 500),
    },
  };
}
