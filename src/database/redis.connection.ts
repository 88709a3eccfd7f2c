import Redis, { RedisOptions } from 'ioredis';
import dotenv from 'dotenv';
import { logger } from '@/utils/logger';

dotenv.config();

type Env = Record<string, string | undefined>;

export const redisOptionsFromEnv = (env: Env = process.env): RedisOptions => ({
  host: env.REDIS_HOST || 'localhost',
  port: parseInt(env.REDIS_PORT || '6379', 10),
  password: env.REDIS_PASSWORD || undefined,
  db: parseInt(env.REDIS_DB || '0', 10),
  connectionName: env.REDIS_CONNECTION_NAME || 'weather-engine',
  maxRetriesPerRequest: parseInt(env.REDIS_MAX_RETRIES || '3', 10),
  // Publishes fail immediately while disconnected; the event publisher owns retrying
  enableOfflineQueue: false,
  retryStrategy: (times: number) => Math.min(times * 50, 2000),
});

let client: Redis | undefined;

export const connectRedis = async (options: RedisOptions = redisOptionsFromEnv()): Promise<Redis> => {
  if (client) {
    return client;
  }

  const connection = new Redis(options);

  connection.on('ready', () => {
    logger.info(`Redis connected to ${options.host}:${options.port}`);
  });

  connection.on('error', (err: Error) => {
    logger.error('Redis connection error', { error: err.message });
  });

  connection.on('reconnecting', (delay: number) => {
    logger.warn(`Redis reconnecting in ${delay}ms`);
  });

  connection.on('end', () => {
    logger.info('Redis connection closed');
  });

  client = connection;
  return connection;
};

export const getRedisClient = (): Redis => {
  if (!client) {
    throw new Error('Redis client not initialized. Please call connectRedis() first.');
  }
  return client;
};

export const isRedisReady = (): boolean => client?.status === 'ready';

export const disconnectRedis = async (): Promise<void> => {
  if (client) {
    const connection = client;
    client = undefined;
    await connection.quit();
  }
};
