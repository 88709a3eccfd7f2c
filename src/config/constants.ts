import dotenv from 'dotenv';

dotenv.config();

export const TOPIC_SCHEME = {
  ROOT: 'weather',
  ALERTS: 'alerts',
} as const;

export const CACHE_KEY_PREFIX = {
  LATEST: 'latest',
  WINDOW: 'window',
} as const;

export const REDIS_KEY_PREFIX = {
  BUS: process.env.REDIS_BUS_PREFIX || '',
} as const;

// Station and rule ids end up as topic segments
export const IDENTIFIER_PATTERN = /^[A-Za-z0-9_.-]{1,64}$/;

// weather/alerts/<rule> would collide with a station's weather/<station>/<field>
export const RESERVED_STATION_IDS: readonly string[] = [TOPIC_SCHEME.ALERTS];

// Cron Job Configuration
export const CRON_CONFIG = {
  CACHE_SWEEP: process.env.CRON_CACHE_SWEEP || '*/1 * * * *',
} as const;

export const PROVENANCE = {
  GENERIC: 'generic',
  WEEWX: 'weewx',
  ECOWITT: 'ecowitt',
} as const;
