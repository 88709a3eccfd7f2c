import mongoose from 'mongoose';
import dotenv from 'dotenv';
import engineConfig from '@/config';
import { createApp } from './app';
import { connectDB, disconnectDB } from '@/database/connection';
import { connectRedis, disconnectRedis, isRedisReady } from '@/database/redis.connection';
import { redisClient } from '@/redis/client';
import { createWeatherEngine } from '@/services/engine';
import { startCacheSweeper } from '@/jobs/cache-sweeper.job';
import { errorMessage } from '@/utils/errors';
import { logger } from '@/utils/logger';

dotenv.config();

async function startServer(): Promise<void> {
  try {
    // Connect to MongoDB
    await connectDB();
    logger.info('✓ MongoDB connected');

    // Connect to Redis
    await connectRedis();

    const engine = createWeatherEngine(engineConfig);

    const loaded = await engine.rules.loadPersistedRules();
    logger.info(`✓ ${loaded} alert rules loaded`);

    const sweeper = startCacheSweeper(engine.cache, engine.publisher);
    logger.info('✓ Cache sweeper cron job started');

    const app = createApp(engine, async () => {
      const ping = isRedisReady() ? await redisClient.ping() : null;
      return {
        database: mongoose.connection.readyState === 1 ? 'connected' : 'disconnected',
        bus: ping?.success && ping.data ? 'connected' : 'disconnected',
      };
    });

    // Start Express server
    const server = app.listen(engineConfig.PORT, () => {
      logger.info(`✓ Server running on port ${engineConfig.PORT}`);
    });

    // Graceful shutdown
    const shutdown = (signal: string) => {
      logger.info(`${signal} received, shutting down gracefully...`);
      sweeper.stop();
      server.close(() => {
        engine.pipeline
          .drain()
          .then(() => engine.publisher.close())
          .then(() => disconnectRedis())
          .then(() => disconnectDB())
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            logger.error('Shutdown failed', { error: errorMessage(error) });
            process.exit(1);
          });
      });
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

void startServer();
