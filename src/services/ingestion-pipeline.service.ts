import { IngestionBatchResult, IngestionOutcome, Measurement, RawReport } from '@/types/measurement.types';
import { AlertEvent } from '@/types/alert.types';
import { MeasurementStore } from '@/database/measurement.repository';
import { IngestionNormalizer } from './ingestion-normalizer.service';
import { StationRegistry } from './station-registry.service';
import { CacheCoordinator } from './cache-coordinator.service';
import { AlertEvaluator } from './alert-evaluator.service';
import { EventPublisher } from './event-publisher.service';
import { KeyedSerialQueue } from '@/utils/keyed-queue.utils';
import { EngineError, errorMessage, isEngineError, toStoreError } from '@/utils/errors';
import { logger } from '@/utils/logger';

export interface IngestionPipelineDeps {
  normalizer: IngestionNormalizer;
  registry: StationRegistry;
  store: MeasurementStore;
  cache: CacheCoordinator;
  evaluator: AlertEvaluator;
  publisher: EventPublisher;
  latestTtlMs: number;
}

/**
 * Station report → normalize → store → cache invalidation → alert evaluation
 * → outbound events. All reports of one station go through one sequential
 * path; different stations run in parallel.
 */
export class IngestionPipeline {
  private readonly lanes = new KeyedSerialQueue();

  constructor(private readonly deps: IngestionPipelineDeps) {}

  async ingest(raw: RawReport): Promise<IngestionOutcome> {
    const station_id = this.deps.normalizer.extractStationId(raw);
    if (station_id === null) {
      // Not routable, so it cannot be valid either: normalization reports why
      return this.process(raw);
    }
    return this.lanes.run(station_id, () => this.process(raw));
  }

  /**
   * Ingests independent reports; one report failing never affects the
   * others.
   */
  async ingestBatch(reports: RawReport[]): Promise<IngestionBatchResult> {
    const startTime = Date.now();
    const results = await Promise.allSettled(reports.map(report => this.ingest(report)));

    const result: IngestionBatchResult = {
      accepted_count: 0,
      dropped_count: 0,
      failed_count: 0,
      errors: [],
      processing_time_ms: 0,
    };

    results.forEach((settled, index) => {
      if (settled.status === 'fulfilled') {
        result.accepted_count++;
        return;
      }
      const error = settled.reason;
      const code = isEngineError(error) ? error.code : 'INTERNAL_ERROR';
      if (code === 'UNKNOWN_STATION') {
        result.dropped_count++;
      } else {
        result.failed_count++;
      }
      result.errors.push({
        index,
        station_id: this.deps.normalizer.extractStationId(reports[index]) ?? undefined,
        code,
        message: errorMessage(error),
      });
    });

    result.processing_time_ms = Date.now() - startTime;
    logger.info('Batch ingestion completed', {
      accepted: result.accepted_count,
      dropped: result.dropped_count,
      failed: result.failed_count,
      time_ms: result.processing_time_ms,
    });
    return result;
  }

  // Waits for every station lane to go idle
  async drain(): Promise<void> {
    await this.lanes.drain();
  }

  private async process(raw: RawReport): Promise<IngestionOutcome> {
    const { normalizer, registry, store, cache, latestTtlMs } = this.deps;

    let measurement: Measurement;
    try {
      measurement = normalizer.normalize(raw);
    } catch (error) {
      this.logRejection(raw, error);
      throw error;
    }

    const previous = registry.lastAcceptedAt(measurement.station_id);

    try {
      await store.upsert(measurement);
    } catch (error) {
      logger.error('Failed to store measurement', {
        station_id: measurement.station_id,
        timestamp: measurement.timestamp,
        error: errorMessage(error),
      });
      throw toStoreError(error);
    }

    registry.markAccepted(measurement.station_id, measurement.timestamp);
    cache.invalidate(measurement.station_id, measurement.timestamp);
    if (previous === undefined || measurement.timestamp >= previous) {
      cache.writeLatest(measurement, latestTtlMs);
    }

    logger.debug('Measurement accepted', {
      station_id: measurement.station_id,
      timestamp: measurement.timestamp,
      fields: Object.keys(measurement.fields),
    });

    const alerts = this.evaluate(measurement);
    const published = this.deps.publisher.publishMeasurement(measurement);
    await this.forwardAlerts(alerts);

    return { measurement, alerts, published };
  }

  private evaluate(measurement: Measurement): AlertEvent[] {
    try {
      return this.deps.evaluator.evaluate(measurement);
    } catch (error) {
      logger.error('Alert evaluation failed', {
        station_id: measurement.station_id,
        error: errorMessage(error),
      });
      return [];
    }
  }

  // Alerting problems are reported, never handed back to the ingesting caller
  private async forwardAlerts(alerts: AlertEvent[]): Promise<void> {
    for (const event of alerts) {
      try {
        await this.deps.publisher.publishAlert(event);
      } catch (error) {
        logger.error('Failed to queue alert event', {
          event_id: event.event_id,
          rule_id: event.rule_id,
          error: errorMessage(error),
        });
      }
    }
  }

  private logRejection(raw: RawReport, error: unknown): void {
    if (error instanceof EngineError && error.code === 'UNKNOWN_STATION') {
      logger.warn('Dropping report from unknown station', {
        source: raw.source,
        station_id: error.details?.station_id,
      });
      return;
    }
    logger.warn('Rejected malformed report', { source: raw.source, error: errorMessage(error) });
  }
}
