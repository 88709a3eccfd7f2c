import cron, { ScheduledTask } from 'node-cron';
import { CacheCoordinator } from '@/services/cache-coordinator.service';
import { EventPublisher } from '@/services/event-publisher.service';
import { CacheStats } from '@/types/cache.types';
import { PublisherStats } from '@/types/publisher.types';
import { logger } from '@/utils/logger';
import { CRON_CONFIG } from '@/config/constants';

export interface CacheSweepResult {
  removed_count: number;
  cache: CacheStats;
  publisher: PublisherStats;
  processing_time_ms: number;
}

/**
 * Drop expired and stale cache entries, then report cache and outbound
 * queue counters. Called by the cron job every minute by default.
 */
export function sweepCache(cache: CacheCoordinator, publisher: EventPublisher): CacheSweepResult {
  const startTime = Date.now();
  const removed_count = cache.sweep();

  const result: CacheSweepResult = {
    removed_count,
    cache: cache.stats(),
    publisher: publisher.stats(),
    processing_time_ms: Date.now() - startTime,
  };

  logger.info('Cache sweep completed', {
    removed: removed_count,
    entries: result.cache.entries,
    in_flight: result.cache.in_flight,
    queued: result.publisher.queued,
    time_ms: result.processing_time_ms,
  });
  logger.debug('[CACHE_SWEEPER] Counters', {
    service: 'cache-sweeper',
    cache: result.cache,
    publisher: result.publisher,
  });

  return result;
}

/**
 * Start the cache sweeper cron job
 * Schedule is configurable via CRON_CACHE_SWEEP env variable
 */
export function startCacheSweeper(cache: CacheCoordinator, publisher: EventPublisher): ScheduledTask {
  const schedule = CRON_CONFIG.CACHE_SWEEP;

  const task = cron.schedule(schedule, () => {
    try {
      sweepCache(cache, publisher);
    } catch (error) {
      logger.error('Cache sweeper cron job failed', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  });

  logger.info(`Cache sweeper cron job scheduled: ${schedule}`);
  return task;
}
