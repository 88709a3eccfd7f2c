import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { IngestionPipeline } from '@/services/ingestion-pipeline.service';
import { SUPPORTED_SOURCES } from '@/services/ingestion-normalizer.service';
import { RawReport, ReportSource } from '@/types/measurement.types';
import { malformedReport } from '@/utils/errors';

const MAX_BATCH_SIZE = 500;

const sourceSchema = z.custom<ReportSource>(
  value => typeof value === 'string' && SUPPORTED_SOURCES.some(source => source === value),
  { message: `source must be one of ${SUPPORTED_SOURCES.join(', ')}` },
);

const reportSchema = z.object({
  source: sourceSchema,
  payload: z.unknown(),
});

const batchSchema = z.object({
  reports: z.array(reportSchema).min(1).max(MAX_BATCH_SIZE),
});

const toRawReport = (report: z.infer<typeof reportSchema>): RawReport => ({
  source: report.source,
  payload: report.payload,
  received_at: Date.now(),
});

export const createIngestController = (pipeline: IngestionPipeline) => {
  const ingestReport = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const parsed = reportSchema.safeParse(req.body);
      if (!parsed.success) {
        throw malformedReport('Body must be { source, payload }', { issues: parsed.error.issues });
      }

      const outcome = await pipeline.ingest(toRawReport(parsed.data));

      res.status(201).json({
        success: true,
        data: {
          station_id: outcome.measurement.station_id,
          timestamp: new Date(outcome.measurement.timestamp).toISOString(),
          fields: outcome.measurement.fields,
          provenance: outcome.measurement.provenance,
          alerts: outcome.alerts,
          published: outcome.published,
        },
      });
    } catch (error) {
      next(error);
    }
  };

  const ingestBatch = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const parsed = batchSchema.safeParse(req.body);
      if (!parsed.success) {
        throw malformedReport(`Body must be { reports: [...] } with 1 to ${MAX_BATCH_SIZE} reports`, {
          issues: parsed.error.issues,
        });
      }

      const result = await pipeline.ingestBatch(parsed.data.reports.map(toRawReport));

      res.status(200).json({ success: true, data: result });
    } catch (error) {
      next(error);
    }
  };

  // Ecowitt gateways upload form-encoded fields straight from the device
  const ingestEcowitt = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const outcome = await pipeline.ingest({ source: 'ecowitt', payload: req.body, received_at: Date.now() });
      res.status(201).json({
        success: true,
        data: { station_id: outcome.measurement.station_id, alerts: outcome.alerts.length },
      });
    } catch (error) {
      next(error);
    }
  };

  return { ingestReport, ingestBatch, ingestEcowitt };
};
