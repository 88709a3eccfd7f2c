import { config } from 'dotenv';

config();

export interface EngineConfig {
  PORT: number;
  NODE_ENV: string;
  INGESTION: {
    CLOCK_SKEW_TOLERANCE_MS: number;
  };
  CACHE: {
    WINDOW_TTL_MS: number;
    LATEST_TTL_MS: number;
    MAX_ENTRIES: number;
  };
  QUERY: {
    TIMEOUT_MS: number;
    CONCURRENCY: number;
    DEFAULT_PAGE_LIMIT: number;
    MAX_PAGE_LIMIT: number;
    MAX_BUCKETS: number;
  };
  ALERT: {
    DEFAULT_HYSTERESIS: number;
    SUPPRESSION_MAX_TRIGGERS: number;
    SUPPRESSION_COOLDOWN_MS: number;
  };
  PUBLISH: {
    QUEUE_CAPACITY: number;
    DEADLINE_MS: number;
    BACKOFF_BASE_MS: number;
    BACKOFF_MAX_MS: number;
  };
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

type Env = Record<string, string | undefined>;

function validateNumericEnvironmentVariable(env: Env, name: string, defaultValue: number): number {
  const value = env[name];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  const numericValue = Number(value);

  if (!Number.isFinite(numericValue)) {
    throw new ConfigurationError(`Environment variable ${name} must be a valid number, got: ${value}`);
  }

  if (numericValue < 0) {
    throw new ConfigurationError(`Environment variable ${name} must be a positive number, got: ${numericValue}`);
  }

  return numericValue;
}

function validatePositiveInteger(env: Env, name: string, defaultValue: number): number {
  const value = validateNumericEnvironmentVariable(env, name, defaultValue);
  if (!Number.isInteger(value) || value === 0) {
    throw new ConfigurationError(`Environment variable ${name} must be a positive integer, got: ${value}`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): EngineConfig {
  const num = (name: string, defaultValue: number) => validateNumericEnvironmentVariable(env, name, defaultValue);
  const int = (name: string, defaultValue: number) => validatePositiveInteger(env, name, defaultValue);

  const query = {
    TIMEOUT_MS: int('QUERY_TIMEOUT_MS', 5000),
    CONCURRENCY: int('QUERY_CONCURRENCY', 8),
    DEFAULT_PAGE_LIMIT: int('QUERY_DEFAULT_PAGE_LIMIT', 100),
    MAX_PAGE_LIMIT: int('QUERY_MAX_PAGE_LIMIT', 1000),
    MAX_BUCKETS: int('QUERY_MAX_BUCKETS', 100000),
  };

  if (query.DEFAULT_PAGE_LIMIT > query.MAX_PAGE_LIMIT) {
    throw new ConfigurationError('QUERY_DEFAULT_PAGE_LIMIT cannot exceed QUERY_MAX_PAGE_LIMIT');
  }

  return {
    PORT: int('PORT', 3000),
    NODE_ENV: env.NODE_ENV || 'development',
    INGESTION: {
      CLOCK_SKEW_TOLERANCE_MS: num('CLOCK_SKEW_TOLERANCE_MS', 5 * 60 * 1000),
    },
    CACHE: {
      WINDOW_TTL_MS: int('CACHE_WINDOW_TTL_MS', 5 * 60 * 1000),
      LATEST_TTL_MS: int('CACHE_LATEST_TTL_MS', 60 * 1000),
      MAX_ENTRIES: int('CACHE_MAX_ENTRIES', 50000),
    },
    QUERY: query,
    ALERT: {
      DEFAULT_HYSTERESIS: num('ALERT_DEFAULT_HYSTERESIS', 0),
      // 0 disables suppression for rules that do not set their own policy
      SUPPRESSION_MAX_TRIGGERS: num('ALERT_SUPPRESSION_MAX_TRIGGERS', 10),
      SUPPRESSION_COOLDOWN_MS: num('ALERT_SUPPRESSION_COOLDOWN_MS', 10 * 60 * 1000),
    },
    PUBLISH: {
      QUEUE_CAPACITY: int('PUBLISH_QUEUE_CAPACITY', 1000),
      DEADLINE_MS: int('PUBLISH_DEADLINE_MS', 30 * 1000),
      BACKOFF_BASE_MS: int('PUBLISH_BACKOFF_BASE_MS', 100),
      BACKOFF_MAX_MS: int('PUBLISH_BACKOFF_MAX_MS', 5000),
    },
  };
}

const engineConfig = loadConfig();

export default engineConfig;
