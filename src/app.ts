import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import dotenv from 'dotenv';
import { errorHandler } from '@/middleware/errorHandler';
import { WeatherEngine } from '@/services/engine';
import { createIngestRoutes } from '@/routes/ingest.routes';
import { createQueryRoutes } from '@/routes/query.routes';
import { createRuleRoutes } from '@/routes/rule.routes';

dotenv.config();

export type HealthCheck = () => Promise<Record<string, string>>;

export function createApp(engine: WeatherEngine, healthCheck?: HealthCheck): Express {
  const app = express();

  // Middleware
  app.use(express.json({ limit: '100kb' }));
  app.use(helmet());
  app.use(cors({ origin: process.env.ALLOWED_ORIGINS?.split(',') }));

  // Routes
  app.use('/api/v1/ingest', createIngestRoutes(engine.pipeline));
  app.use('/api/v1', createQueryRoutes(engine.aggregation));
  app.use('/api/v1/rules', createRuleRoutes(engine.rules));

  // Health check
  app.get('/health', async (req, res, next) => {
    try {
      const dependencies = healthCheck ? await healthCheck() : {};
      res.json({
        status: 'ok',
        ...dependencies,
        cache: engine.cache.stats(),
        publisher: engine.publisher.stats(),
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      next(error);
    }
  });

  // Error Handler
  app.use(errorHandler);

  return app;
}
