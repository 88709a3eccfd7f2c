import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { AggregationEngine } from '@/services/aggregation.service';
import { AGGREGATIONS, AggregationPage } from '@/types/aggregation.types';
import { Measurement } from '@/types/measurement.types';
import { parseIsoDuration, parseTimestamp } from '@/utils/time-window.utils';
import { EngineError, invalidQuery } from '@/utils/errors';

const list = z
  .string()
  .transform(value => value.split(',').map(item => item.trim()).filter(item => item.length > 0));

const timestamp = z.string().transform((value, ctx) => {
  const parsed = parseTimestamp(value);
  if (parsed === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${value}' is not an ISO 8601 timestamp` });
    return z.NEVER;
  }
  return parsed;
});

// ISO 8601 duration (PT1H) or plain milliseconds
const interval = z.string().transform((value, ctx) => {
  const parsed = /^\d+$/.test(value) ? Number(value) : parseIsoDuration(value);
  if (parsed === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${value}' is not a duration` });
    return z.NEVER;
  }
  return parsed;
});

const querySchema = z.object({
  stations: list,
  fields: list,
  start: timestamp,
  end: timestamp,
  interval,
  aggregation: z.enum(AGGREGATIONS).default('avg'),
  limit: z.coerce.number().int().optional(),
  cursor: z.string().optional(),
  sort: z.enum(['asc', 'desc']).optional(),
  timeout_ms: z.coerce.number().int().positive().optional(),
});

const serializePage = (page: AggregationPage) => ({
  stations: page.window.station_ids,
  fields: page.window.fields,
  start: new Date(page.window.start).toISOString(),
  end: new Date(page.window.end).toISOString(),
  interval_ms: page.window.interval_ms,
  aggregation: page.window.aggregation,
  buckets: page.window.buckets.map(bucket => ({
    bucket_start: new Date(bucket.bucket_start).toISOString(),
    bucket_end: new Date(bucket.bucket_end).toISOString(),
    values: bucket.values,
    sample_count: bucket.sample_count,
  })),
  next_cursor: page.next_cursor,
  total_buckets: page.total_buckets,
});

const serializeMeasurement = (measurement: Measurement) => ({
  station_id: measurement.station_id,
  timestamp: new Date(measurement.timestamp).toISOString(),
  fields: measurement.fields,
  provenance: measurement.provenance,
});

export const createQueryController = (aggregation: AggregationEngine) => {
  const queryWindow = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const parsed = querySchema.safeParse(req.query);
      if (!parsed.success) {
        throw invalidQuery(
          parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; '),
        );
      }
      const params = parsed.data;

      const page = await aggregation.query({
        station_ids: params.stations,
        fields: params.fields,
        start: params.start,
        end: params.end,
        interval_ms: params.interval,
        aggregation: params.aggregation,
        limit: params.limit,
        cursor: params.cursor,
        sort: params.sort,
        timeout_ms: params.timeout_ms,
      });

      res.status(200).json({ success: true, data: serializePage(page) });
    } catch (error) {
      next(error);
    }
  };

  const getLatest = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { station_id } = req.params;
      const measurement = await aggregation.latest(station_id);
      if (!measurement) {
        throw new EngineError('UNKNOWN_STATION', `No measurements recorded for station '${station_id}'`, {
          station_id,
        });
      }
      res.status(200).json({ success: true, data: serializeMeasurement(measurement) });
    } catch (error) {
      next(error);
    }
  };

  return { queryWindow, getLatest };
};
