import express, { Router } from 'express';
import { IngestionPipeline } from '@/services/ingestion-pipeline.service';
import { createIngestController } from '@/controllers/ingest.controller';

export const createIngestRoutes = (pipeline: IngestionPipeline): Router => {
  const router = Router();
  const controller = createIngestController(pipeline);

  router.post('/', controller.ingestReport);
  router.post('/batch', controller.ingestBatch);
  router.post('/ecowitt', express.urlencoded({ extended: false, limit: '10kb' }), controller.ingestEcowitt);

  return router;
};
