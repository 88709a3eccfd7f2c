import { AggregateWindow, AggregationFn } from '@/types/aggregation.types';
import {
  CacheEntry,
  CacheKey,
  CacheLookup,
  CacheStats,
  ComputeOptions,
  LatestCacheKey,
  WindowCacheKey,
} from '@/types/cache.types';
import { Measurement } from '@/types/measurement.types';
import { CACHE_KEY_PREFIX } from '@/config/constants';
import { raceWithSignal } from '@/utils/abort.utils';
import { isWithinRange } from '@/utils/time-window.utils';
import { errorMessage, toStoreError } from '@/utils/errors';
import { logger } from '@/utils/logger';

export const latestCacheKey = (station_id: string): LatestCacheKey => ({
  kind: 'latest',
  id: `${CACHE_KEY_PREFIX.LATEST}:${station_id}`,
  station_id,
});

export const windowCacheKey = (params: {
  station_ids: string[];
  fields: string[];
  start: number;
  end: number;
  interval_ms: number;
  aggregation: AggregationFn;
}): WindowCacheKey => {
  const station_ids = [...new Set(params.station_ids)].sort();
  const fields = [...new Set(params.fields)].sort();
  return {
    kind: 'window',
    id: [
      CACHE_KEY_PREFIX.WINDOW,
      station_ids.join(','),
      fields.join(','),
      params.start,
      params.end,
      params.interval_ms,
      params.aggregation,
    ].join('|'),
    station_ids,
    fields,
    start: params.start,
    end: params.end,
    interval_ms: params.interval_ms,
    aggregation: params.aggregation,
  };
};

const keyStations = (key: CacheKey): string[] => (key.kind === 'latest' ? [key.station_id] : key.station_ids);

// Does a write for (station_id, timestamp) land inside this key's scope?
const keyCovers = (key: CacheKey, station_id: string, timestamp: number): boolean =>
  key.kind === 'latest'
    ? key.station_id === station_id
    : key.station_ids.includes(station_id) && isWithinRange(timestamp, key);

interface Counters {
  hits: number;
  misses: number;
  computations: number;
  joins: number;
  invalidations: number;
  evictions: number;
}

// Entry budget shared by every region of one coordinator
interface SharedBound {
  nextSequence(): number;
  enforce(): void;
}

interface InFlight<T> {
  key: CacheKey;
  promise: Promise<T>;
  invalidated: boolean;
}

/**
 * One keyspace of the coordinator: entries, the in-flight registry and a
 * station → key index used by invalidation.
 */
class CacheRegion<T> {
  private entries = new Map<string, CacheEntry<T>>();
  private inFlight = new Map<string, InFlight<T>>();
  private byStation = new Map<string, Set<string>>();

  constructor(
    private readonly counters: Counters,
    private readonly now: () => number,
    private readonly bound: SharedBound,
  ) {}

  get size(): number {
    return this.entries.size;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  peek(id: string): CacheEntry<T> | undefined {
    return this.entries.get(id);
  }

  lookup(id: string): CacheLookup<T> {
    const entry = this.entries.get(id);
    if (entry && !entry.stale && entry.expires_at > this.now()) {
      this.counters.hits++;
      return { hit: true, value: entry.value };
    }
    this.counters.misses++;
    return { hit: false };
  }

  getOrCompute(key: CacheKey, compute: () => Promise<T>, ttlMs: number, options: ComputeOptions = {}): Promise<T> {
    const found = this.lookup(key.id);
    if (found.hit) {
      return Promise.resolve(found.value);
    }

    let flight = this.inFlight.get(key.id);
    if (flight) {
      this.counters.joins++;
    } else {
      flight = this.start(key, compute, ttlMs);
    }

    return raceWithSignal(flight.promise, options.signal);
  }

  private start(key: CacheKey, compute: () => Promise<T>, ttlMs: number): InFlight<T> {
    this.counters.computations++;

    const flight: InFlight<T> = {
      key,
      invalidated: false,
      promise: Promise.resolve()
        .then(compute)
        .then(
          value => {
            // A write landed inside the scope while computing: hand the value to
            // current waiters but do not keep it
            if (!flight.invalidated) {
              this.set(key, value, ttlMs);
            }
            return value;
          },
          (error: unknown) => {
            throw toStoreError(error);
          },
        )
        .finally(() => {
          if (this.inFlight.get(key.id) === flight) {
            this.inFlight.delete(key.id);
          }
        }),
    };

    // Waiters may all have been aborted; the failure is theirs to report
    flight.promise.catch((error: unknown) => {
      logger.debug('Cache computation failed', { key: key.id, error: errorMessage(error) });
    });

    this.inFlight.set(key.id, flight);
    return flight;
  }

  set(key: CacheKey, value: T, ttlMs: number): void {
    const now = this.now();
    // Re-insert so Map order stays oldest-first for eviction
    this.entries.delete(key.id);
    this.entries.set(key.id, {
      key,
      value,
      fresh_at: now,
      expires_at: now + ttlMs,
      stale: false,
      sequence: this.bound.nextSequence(),
    });
    for (const station_id of keyStations(key)) {
      let ids = this.byStation.get(station_id);
      if (!ids) {
        ids = new Set();
        this.byStation.set(station_id, ids);
      }
      ids.add(key.id);
    }
    this.bound.enforce();
  }

  oldestSequence(): number | null {
    const oldest = this.entries.values().next();
    return oldest.done ? null : oldest.value.sequence;
  }

  evictOldest(): boolean {
    const oldest = this.entries.keys().next();
    return !oldest.done && this.delete(oldest.value);
  }

  delete(id: string): boolean {
    const entry = this.entries.get(id);
    if (!entry) {
      return false;
    }
    this.entries.delete(id);
    for (const station_id of keyStations(entry.key)) {
      const ids = this.byStation.get(station_id);
      ids?.delete(id);
      if (ids && ids.size === 0) {
        this.byStation.delete(station_id);
      }
    }
    return true;
  }

  entriesFor(station_id: string): CacheEntry<T>[] {
    const ids = this.byStation.get(station_id);
    if (!ids) {
      return [];
    }
    const found: CacheEntry<T>[] = [];
    ids.forEach(id => {
      const entry = this.entries.get(id);
      if (entry) {
        found.push(entry);
      }
    });
    return found;
  }

  // Matching flights are detached: current waiters keep them, later callers start a fresh computation
  detachInFlight(station_id: string, timestamp: number): number {
    let detached = 0;
    for (const [id, flight] of [...this.inFlight]) {
      if (keyCovers(flight.key, station_id, timestamp)) {
        flight.invalidated = true;
        this.inFlight.delete(id);
        detached++;
      }
    }
    return detached;
  }

  sweep(now: number): number {
    let removed = 0;
    for (const [id, entry] of [...this.entries]) {
      if (entry.stale || entry.expires_at <= now) {
        this.delete(id);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
    this.byStation.clear();
  }
}

export interface CacheCoordinatorOptions {
  // Shared by aggregate and latest entries
  maxEntries: number;
  now?: () => number;
}

/**
 * Owns every cached value: recent "latest" measurements per station and
 * pre-computed aggregate buckets. Nothing else writes cache entries.
 *
 * Concurrent requests for the same key share one computation against the
 * backing store; failures reach every waiter of that computation and are
 * never cached.
 */
export class CacheCoordinator {
  private readonly counters: Counters = {
    hits: 0,
    misses: 0,
    computations: 0,
    joins: 0,
    invalidations: 0,
    evictions: 0,
  };
  private readonly now: () => number;
  private readonly windows: CacheRegion<AggregateWindow>;
  private readonly latest: CacheRegion<Measurement | null>;

  private sequence = 0;

  constructor(private readonly options: CacheCoordinatorOptions) {
    this.now = options.now ?? Date.now;
    const bound: SharedBound = {
      nextSequence: () => ++this.sequence,
      enforce: () => this.enforceBound(),
    };
    this.windows = new CacheRegion<AggregateWindow>(this.counters, this.now, bound);
    this.latest = new CacheRegion<Measurement | null>(this.counters, this.now, bound);
  }

  get(key: WindowCacheKey): CacheLookup<AggregateWindow> {
    return this.windows.lookup(key.id);
  }

  getLatest(station_id: string): CacheLookup<Measurement | null> {
    return this.latest.lookup(latestCacheKey(station_id).id);
  }

  getOrCompute(
    key: WindowCacheKey,
    computeFn: () => Promise<AggregateWindow>,
    ttlMs: number,
    options?: ComputeOptions,
  ): Promise<AggregateWindow> {
    return this.windows.getOrCompute(key, computeFn, ttlMs, options);
  }

  getOrComputeLatest(
    station_id: string,
    computeFn: () => Promise<Measurement | null>,
    ttlMs: number,
    options?: ComputeOptions,
  ): Promise<Measurement | null> {
    return this.latest.getOrCompute(latestCacheKey(station_id), computeFn, ttlMs, options);
  }

  /**
   * Called for every accepted measurement. The station's latest entry is
   * dropped right away unless it already holds something newer; aggregate
   * entries covering the timestamp are only marked stale and recomputed on
   * their next read.
   */
  invalidate(station_id: string, timestamp: number): number {
    let affected = 0;

    const latestKey = latestCacheKey(station_id);
    const cachedLatest = this.latest.peek(latestKey.id);
    if (cachedLatest && (cachedLatest.value === null || cachedLatest.value.timestamp <= timestamp)) {
      this.latest.delete(latestKey.id);
      affected++;
    }
    affected += this.latest.detachInFlight(station_id, timestamp);

    for (const entry of this.windows.entriesFor(station_id)) {
      if (!entry.stale && keyCovers(entry.key, station_id, timestamp)) {
        entry.stale = true;
        affected++;
      }
    }
    affected += this.windows.detachInFlight(station_id, timestamp);

    this.counters.invalidations += affected;
    if (affected > 0) {
      logger.debug('Cache invalidated', { station_id, timestamp, affected });
    }
    return affected;
  }

  // Write-through of a station's newest measurement; an older one never replaces a newer entry
  writeLatest(measurement: Measurement, ttlMs: number): boolean {
    const key = latestCacheKey(measurement.station_id);
    const existing = this.latest.peek(key.id);
    if (existing && !existing.stale && existing.value && existing.value.timestamp > measurement.timestamp) {
      return false;
    }
    this.latest.set(key, measurement, ttlMs);
    return true;
  }

  // TTL backstop: drops expired and stale entries even if no invalidation reached them
  sweep(now: number = this.now()): number {
    const removed = this.windows.sweep(now) + this.latest.sweep(now);
    this.counters.evictions += removed;
    return removed;
  }

  clear(): void {
    this.windows.clear();
    this.latest.clear();
  }

  // Evicts the entry inserted first, whichever keyspace holds it
  private enforceBound(): void {
    while (this.windows.size + this.latest.size > this.options.maxEntries) {
      const oldestWindow = this.windows.oldestSequence();
      const oldestLatest = this.latest.oldestSequence();
      const region =
        oldestLatest === null || (oldestWindow !== null && oldestWindow < oldestLatest) ? this.windows : this.latest;
      if (!region.evictOldest()) {
        break;
      }
      this.counters.evictions++;
    }
  }

  stats(): CacheStats {
    return {
      entries: this.windows.size + this.latest.size,
      in_flight: this.windows.inFlightCount + this.latest.inFlightCount,
      ...this.counters,
    };
  }
}
