import { EngineConfig } from '@/config';
import { BusTransport } from '@/types/publisher.types';
import { MeasurementStore, MongoMeasurementRepository } from '@/database/measurement.repository';
import { AlertRuleStore, MongoAlertRuleRepository } from '@/database/alert-rule.repository';
import { RedisBusTransport } from '@/redis/bus.transport';
import { StationRegistry, createStationRegistry } from './station-registry.service';
import { IngestionNormalizer } from './ingestion-normalizer.service';
import { CacheCoordinator } from './cache-coordinator.service';
import { AggregationEngine } from './aggregation.service';
import { AlertEvaluator } from './alert-evaluator.service';
import { AlertRuleService } from './alert-rule.service';
import { EventPublisher } from './event-publisher.service';
import { IngestionPipeline } from './ingestion-pipeline.service';

export interface WeatherEngine {
  registry: StationRegistry;
  cache: CacheCoordinator;
  aggregation: AggregationEngine;
  evaluator: AlertEvaluator;
  rules: AlertRuleService;
  publisher: EventPublisher;
  pipeline: IngestionPipeline;
}

// Collaborators a caller may swap out; tests hand in in-process stand-ins
export interface WeatherEngineDeps {
  measurementStore?: MeasurementStore;
  ruleStore?: AlertRuleStore;
  transport?: BusTransport;
  registry?: StationRegistry;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  idGenerator?: () => string;
}

export function createWeatherEngine(config: EngineConfig, deps: WeatherEngineDeps = {}): WeatherEngine {
  const store = deps.measurementStore ?? new MongoMeasurementRepository();
  const ruleStore = deps.ruleStore ?? new MongoAlertRuleRepository();
  const transport = deps.transport ?? new RedisBusTransport();
  const registry = deps.registry ?? createStationRegistry();

  const cache = new CacheCoordinator({ maxEntries: config.CACHE.MAX_ENTRIES, now: deps.now });

  const aggregation = new AggregationEngine(store, cache, {
    windowTtlMs: config.CACHE.WINDOW_TTL_MS,
    latestTtlMs: config.CACHE.LATEST_TTL_MS,
    timeoutMs: config.QUERY.TIMEOUT_MS,
    concurrency: config.QUERY.CONCURRENCY,
    defaultPageLimit: config.QUERY.DEFAULT_PAGE_LIMIT,
    maxPageLimit: config.QUERY.MAX_PAGE_LIMIT,
    maxBuckets: config.QUERY.MAX_BUCKETS,
  });

  const evaluator = new AlertEvaluator({
    defaults: {
      hysteresis: config.ALERT.DEFAULT_HYSTERESIS,
      suppression:
        config.ALERT.SUPPRESSION_MAX_TRIGGERS > 0
          ? {
              max_triggers: config.ALERT.SUPPRESSION_MAX_TRIGGERS,
              cooldown_ms: config.ALERT.SUPPRESSION_COOLDOWN_MS,
            }
          : null,
    },
    now: deps.now,
    idGenerator: deps.idGenerator,
  });

  const publisher = new EventPublisher(transport, {
    queueCapacity: config.PUBLISH.QUEUE_CAPACITY,
    deadlineMs: config.PUBLISH.DEADLINE_MS,
    backoffBaseMs: config.PUBLISH.BACKOFF_BASE_MS,
    backoffMaxMs: config.PUBLISH.BACKOFF_MAX_MS,
    now: deps.now,
    sleep: deps.sleep,
  });

  const normalizer = new IngestionNormalizer(registry, {
    clockSkewToleranceMs: config.INGESTION.CLOCK_SKEW_TOLERANCE_MS,
    now: deps.now,
  });

  const pipeline = new IngestionPipeline({
    normalizer,
    registry,
    store,
    cache,
    evaluator,
    publisher,
    latestTtlMs: config.CACHE.LATEST_TTL_MS,
  });

  return {
    registry,
    cache,
    aggregation,
    evaluator,
    rules: new AlertRuleService(evaluator, ruleStore),
    publisher,
    pipeline,
  };
}
