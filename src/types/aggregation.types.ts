export const AGGREGATIONS = ['avg', 'min', 'max', 'sum', 'count'] as const;

export type AggregationFn = (typeof AGGREGATIONS)[number];

export type SortOrder = 'asc' | 'desc';

export interface TimeRange {
  start: number;                       // inclusive, epoch ms
  end: number;                         // exclusive, epoch ms
}

export interface AggregateBucket {
  bucket_start: number;
  bucket_end: number;
  values: Record<string, number | null>;
  sample_count: number;                // raw measurements that fed this bucket
}

export interface AggregateWindow {
  station_ids: string[];
  fields: string[];
  start: number;
  end: number;
  interval_ms: number;
  aggregation: AggregationFn;
  buckets: AggregateBucket[];
}

export interface AggregationQuery {
  station_ids: string[];
  fields: string[];
  start: number;
  end: number;
  interval_ms: number;
  aggregation: AggregationFn;
  limit?: number;
  cursor?: string;
  sort?: SortOrder;
  timeout_ms?: number;
}

export interface AggregationPage {
  window: AggregateWindow;
  next_cursor: string | null;
  total_buckets: number;
}
