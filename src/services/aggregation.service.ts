import pLimit from 'p-limit';
import {
  AGGREGATIONS,
  AggregateBucket,
  AggregateWindow,
  AggregationFn,
  AggregationPage,
  AggregationQuery,
  SortOrder,
} from '@/types/aggregation.types';
import { Measurement } from '@/types/measurement.types';
import { MeasurementStore } from '@/database/measurement.repository';
import { CacheCoordinator, windowCacheKey } from './cache-coordinator.service';
import { Bucket, countBuckets, getBucket } from '@/utils/time-window.utils';
import { decodeCursor, encodeCursor } from '@/utils/cursor.utils';
import { shortHash } from '@/utils/hash.utils';
import { raceWithSignal, throwIfAborted } from '@/utils/abort.utils';
import { EngineError, errorMessage, invalidQuery } from '@/utils/errors';
import { IDENTIFIER_PATTERN } from '@/config/constants';
import { logger } from '@/utils/logger';

type Reducer = (values: number[]) => number;

const sum: Reducer = values => values.reduce((total, value) => total + value, 0);
const mean: Reducer = values => sum(values) / values.length;
const min: Reducer = values => values.reduce((lowest, value) => (value < lowest ? value : lowest));
const max: Reducer = values => values.reduce((highest, value) => (value > highest ? value : highest));

// Stage one: one station's readings inside a bucket
const STATION_REDUCERS: Record<AggregationFn, Reducer> = {
  avg: mean,
  min,
  max,
  sum,
  count: values => values.length,
};

// Stage two: across the per-station results. Averages are averaged, counts are added up.
const CROSS_STATION_REDUCERS: Record<AggregationFn, Reducer> = {
  avg: mean,
  min,
  max,
  sum,
  count: sum,
};

/**
 * Two-stage reduction of one bucket: reduce each station's own readings per
 * field, then reduce those per-station results across stations. Stations
 * without a reading for a field contribute nothing to that field.
 */
export const reduceBucket = (
  perStation: Measurement[][],
  fields: string[],
  aggregation: AggregationFn,
): { values: Record<string, number | null>; sample_count: number } => {
  const values: Record<string, number | null> = {};

  for (const field of fields) {
    const stationResults: number[] = [];
    for (const measurements of perStation) {
      const readings: number[] = [];
      for (const measurement of measurements) {
        if (Object.hasOwn(measurement.fields, field)) {
          readings.push(measurement.fields[field]);
        }
      }
      if (readings.length > 0) {
        stationResults.push(STATION_REDUCERS[aggregation](readings));
      }
    }

    if (stationResults.length > 0) {
      values[field] = CROSS_STATION_REDUCERS[aggregation](stationResults);
    } else {
      values[field] = aggregation === 'count' ? 0 : null;
    }
  }

  const sample_count = perStation.reduce((total, measurements) => total + measurements.length, 0);
  return { values, sample_count };
};

export interface AggregationEngineOptions {
  windowTtlMs: number;
  latestTtlMs: number;
  timeoutMs: number;
  concurrency: number;
  defaultPageLimit: number;
  maxPageLimit: number;
  maxBuckets: number;
}

interface NormalizedQuery {
  station_ids: string[];
  fields: string[];
  start: number;
  end: number;
  interval_ms: number;
  aggregation: AggregationFn;
  limit: number;
  sort: SortOrder;
  timeout_ms: number;
}

const isAggregation = (value: string): value is AggregationFn =>
  AGGREGATIONS.some(aggregation => aggregation === value);

const uniqueSorted = (values: string[]): string[] => [...new Set(values)].sort();

/**
 * Answers time-range queries bucket by bucket, each bucket read through the
 * cache coordinator and, on a miss, scanned from the backing store.
 */
export class AggregationEngine {
  constructor(
    private readonly store: MeasurementStore,
    private readonly cache: CacheCoordinator,
    private readonly options: AggregationEngineOptions,
  ) {}

  async query(params: AggregationQuery): Promise<AggregationPage> {
    const query = this.validate(params);
    const total_buckets = countBuckets(query, query.interval_ms);
    const fingerprint = shortHash({
      station_ids: query.station_ids,
      fields: query.fields,
      start: query.start,
      end: query.end,
      interval_ms: query.interval_ms,
      aggregation: query.aggregation,
      sort: query.sort,
    });
    const offset = params.cursor ? decodeCursor(params.cursor, fingerprint) : 0;

    const pageEnd = Math.min(offset + query.limit, total_buckets);
    const buckets: Bucket[] = [];
    for (let position = offset; position < pageEnd; position++) {
      const index = query.sort === 'asc' ? position : total_buckets - 1 - position;
      buckets.push(getBucket(query, query.interval_ms, index));
    }

    const window: AggregateWindow = {
      station_ids: query.station_ids,
      fields: query.fields,
      start: query.start,
      end: query.end,
      interval_ms: query.interval_ms,
      aggregation: query.aggregation,
      buckets: [],
    };

    if (buckets.length === 0) {
      return { window, next_cursor: null, total_buckets };
    }

    window.buckets = await this.readBuckets(query, buckets);

    return {
      window,
      next_cursor: pageEnd < total_buckets ? encodeCursor(pageEnd, fingerprint) : null,
      total_buckets,
    };
  }

  // Most recent measurement of a station, served from the "latest" cache key
  async latest(station_id: string): Promise<Measurement | null> {
    if (!IDENTIFIER_PATTERN.test(station_id)) {
      throw invalidQuery(`Invalid station id '${station_id}'`);
    }
    return this.cache.getOrComputeLatest(station_id, () => this.store.latest(station_id), this.options.latestTtlMs);
  }

  private async readBuckets(query: NormalizedQuery, buckets: Bucket[]): Promise<AggregateBucket[]> {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(
        new EngineError('QUERY_TIMEOUT', `Query exceeded its ${query.timeout_ms}ms deadline`, {
          timeout_ms: query.timeout_ms,
        }),
      );
    }, query.timeout_ms);

    const limit = pLimit(this.options.concurrency);
    const signal = controller.signal;

    try {
      const reads = buckets.map(bucket =>
        limit(async () => {
          throwIfAborted(signal);
          const window = await this.cache.getOrCompute(
            windowCacheKey({ ...query, start: bucket.start, end: bucket.end }),
            () => this.computeBucket(query, bucket),
            this.options.windowTtlMs,
            { signal },
          );
          return window.buckets[0];
        }),
      );
      return await raceWithSignal(Promise.all(reads), signal);
    } catch (error) {
      logger.warn('Aggregation query failed', {
        station_ids: query.station_ids,
        start: query.start,
        end: query.end,
        error: errorMessage(error),
      });
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  // One consistent scan per station for this bucket; the result is cached as a one-bucket window
  private async computeBucket(query: NormalizedQuery, bucket: Bucket): Promise<AggregateWindow> {
    const perStation = await Promise.all(
      query.station_ids.map(station_id => this.store.scan(station_id, bucket.start, bucket.end)),
    );
    const { values, sample_count } = reduceBucket(perStation, query.fields, query.aggregation);

    return {
      station_ids: query.station_ids,
      fields: query.fields,
      start: bucket.start,
      end: bucket.end,
      interval_ms: query.interval_ms,
      aggregation: query.aggregation,
      buckets: [{ bucket_start: bucket.start, bucket_end: bucket.end, values, sample_count }],
    };
  }

  private validate(params: AggregationQuery): NormalizedQuery {
    if (!Array.isArray(params.station_ids) || params.station_ids.length === 0) {
      throw invalidQuery('At least one station must be requested');
    }
    const badStation = params.station_ids.find(id => !IDENTIFIER_PATTERN.test(id));
    if (badStation !== undefined) {
      throw invalidQuery(`Invalid station id '${badStation}'`);
    }

    if (!Array.isArray(params.fields) || params.fields.length === 0) {
      throw invalidQuery('At least one field must be requested');
    }
    const badField = params.fields.find(field => !IDENTIFIER_PATTERN.test(field));
    if (badField !== undefined) {
      throw invalidQuery(`Invalid field name '${badField}'`);
    }

    if (!Number.isFinite(params.start) || !Number.isFinite(params.end) || params.start >= params.end) {
      throw invalidQuery('Time range start must be before end', { start: params.start, end: params.end });
    }

    if (!Number.isFinite(params.interval_ms) || params.interval_ms <= 0) {
      throw invalidQuery('Interval must be greater than zero', { interval_ms: params.interval_ms });
    }

    if (!isAggregation(params.aggregation)) {
      throw invalidQuery(`Unsupported aggregation '${String(params.aggregation)}'`, {
        supported: [...AGGREGATIONS],
      });
    }

    const total = countBuckets(params, params.interval_ms);
    if (total > this.options.maxBuckets) {
      throw invalidQuery(`Query spans ${total} buckets, more than the ${this.options.maxBuckets} allowed`);
    }

    const limit = params.limit ?? this.options.defaultPageLimit;
    if (!Number.isInteger(limit) || limit < 1 || limit > this.options.maxPageLimit) {
      throw invalidQuery(`Limit must be an integer between 1 and ${this.options.maxPageLimit}`, { limit });
    }

    const sort = params.sort ?? 'asc';
    if (sort !== 'asc' && sort !== 'desc') {
      throw invalidQuery(`Unsupported sort '${String(sort)}'`);
    }

    const timeout_ms = params.timeout_ms ?? this.options.timeoutMs;
    if (!Number.isFinite(timeout_ms) || timeout_ms <= 0) {
      throw invalidQuery('Timeout must be greater than zero', { timeout_ms });
    }

    return {
      station_ids: uniqueSorted(params.station_ids),
      fields: uniqueSorted(params.fields),
      start: params.start,
      end: params.end,
      interval_ms: params.interval_ms,
      aggregation: params.aggregation,
      limit,
      sort,
      timeout_ms,
    };
  }
}
