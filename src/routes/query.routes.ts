import { Router } from 'express';
import { AggregationEngine } from '@/services/aggregation.service';
import { createQueryController } from '@/controllers/query.controller';

export const createQueryRoutes = (aggregation: AggregationEngine): Router => {
  const router = Router();
  const controller = createQueryController(aggregation);

  // GET /api/v1/query?stations=a,b&fields=temperature&start=...&end=...&interval=PT1H
  router.get('/query', controller.queryWindow);
  router.get('/stations/:station_id/latest', controller.getLatest);

  return router;
};
