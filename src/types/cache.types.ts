import { AggregationFn } from './aggregation.types';

export interface LatestCacheKey {
  kind: 'latest';
  id: string;
  station_id: string;
}

export interface WindowCacheKey {
  kind: 'window';
  id: string;
  station_ids: string[];
  fields: string[];
  start: number;
  end: number;
  interval_ms: number;
  aggregation: AggregationFn;
}

export type CacheKey = LatestCacheKey | WindowCacheKey;

export interface CacheEntry<T> {
  key: CacheKey;
  value: T;
  fresh_at: number;
  expires_at: number;
  stale: boolean;
  sequence: number;                    // insertion order across both keyspaces
}

export type CacheLookup<T> = { hit: true; value: T } | { hit: false };

export interface CacheStats {
  entries: number;
  in_flight: number;
  hits: number;
  misses: number;
  computations: number;
  joins: number;
  invalidations: number;
  evictions: number;
}

export interface ComputeOptions {
  signal?: AbortSignal;
}
