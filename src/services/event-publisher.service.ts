import { setTimeout as delay } from 'node:timers/promises';
import { AlertEvent } from '@/types/alert.types';
import { Measurement } from '@/types/measurement.types';
import { BusTransport, OutboundItem, PublisherStats } from '@/types/publisher.types';
import { TOPIC_SCHEME } from '@/config/constants';
import { EngineError, errorMessage } from '@/utils/errors';
import { logger } from '@/utils/logger';

export const measurementTopic = (station_id: string, field: string): string =>
  `${TOPIC_SCHEME.ROOT}/${station_id}/${field}`;

export const measurementPayload = (measurement: Measurement, field: string): string =>
  JSON.stringify({
    station_id: measurement.station_id,
    field,
    value: measurement.fields[field],
    timestamp: new Date(measurement.timestamp).toISOString(),
    provenance: measurement.provenance,
  });

export const alertPayload = (event: AlertEvent): string =>
  JSON.stringify({
    ...event,
    observed_at: new Date(event.timestamp).toISOString(),
  });

export interface EventPublisherOptions {
  queueCapacity: number;
  deadlineMs: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Hands live measurements and alert events to the bus without blocking
 * ingestion. One lane per station keeps that station's events in order;
 * lanes drain independently.
 *
 * The outbound queue is bounded. Live measurements are lossy under overload
 * (the oldest pending one is dropped); alert events are never dropped for
 * lack of room and wait for capacity instead.
 */
export class EventPublisher {
  private lanes = new Map<string, OutboundItem[]>();
  private draining = new Map<string, Promise<void>>();
  private capacityWaiters: Array<() => void> = [];
  private queued = 0;
  private closed = false;
  private counters = {
    published: 0,
    coalesced: 0,
    delivery_failures: 0,
    retries: 0,
  };
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly transport: BusTransport,
    private readonly options: EventPublisherOptions,
  ) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? (ms => delay(ms));
  }

  /**
   * Publishes one message, retrying with exponential backoff until the
   * delivery deadline would be exceeded.
   */
  async publish(topic: string, payload: string): Promise<void> {
    const startedAt = this.now();
    let attempt = 0;

    for (;;) {
      try {
        await this.transport.publish(topic, payload);
        this.counters.published++;
        return;
      } catch (error) {
        attempt++;
        const backoff = Math.min(this.options.backoffBaseMs * 2 ** (attempt - 1), this.options.backoffMaxMs);
        if (this.now() - startedAt + backoff > this.options.deadlineMs) {
          throw new EngineError('PUBLISH_FAILURE', `Could not publish to ${topic} within ${this.options.deadlineMs}ms`, {
            topic,
            attempts: attempt,
            last_error: errorMessage(error),
          });
        }
        this.counters.retries++;
        logger.warn(`Publish to ${topic} failed, retrying in ${backoff}ms`, {
          attempt,
          error: errorMessage(error),
        });
        await this.sleep(backoff);
      }
    }
  }

  // Returns false when the measurement was not queued
  publishMeasurement(measurement: Measurement): boolean {
    if (this.closed) {
      logger.warn('Publisher closed, dropping live measurement', { station_id: measurement.station_id });
      return false;
    }

    if (this.queued >= this.options.queueCapacity && !this.dropOldestMeasurement(measurement.station_id)) {
      this.counters.coalesced++;
      logger.warn('Outbound queue full of alerts, dropping live measurement', {
        station_id: measurement.station_id,
        timestamp: measurement.timestamp,
      });
      return false;
    }

    this.enqueue({
      kind: 'measurement',
      station_id: measurement.station_id,
      measurement,
      enqueued_at: this.now(),
    });
    return true;
  }

  // Resolves once the event is queued, which may wait for room (backpressure)
  async publishAlert(event: AlertEvent): Promise<void> {
    if (this.closed) {
      throw new EngineError('PUBLISH_FAILURE', 'Publisher is closed', { rule_id: event.rule_id });
    }

    while (this.queued >= this.options.queueCapacity) {
      if (this.dropOldestMeasurement(event.station_id)) {
        break;
      }
      await new Promise<void>(resolve => this.capacityWaiters.push(resolve));
    }

    this.enqueue({ kind: 'alert', station_id: event.station_id, event, enqueued_at: this.now() });
  }

  async flush(): Promise<void> {
    while (this.draining.size > 0) {
      await Promise.all([...this.draining.values()]);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.flush();
  }

  stats(): PublisherStats {
    return { queued: this.queued, ...this.counters };
  }

  private enqueue(item: OutboundItem): void {
    let lane = this.lanes.get(item.station_id);
    if (!lane) {
      lane = [];
      this.lanes.set(item.station_id, lane);
    }
    lane.push(item);
    this.queued++;
    this.startDraining(item.station_id);
  }

  // Coalesce: the oldest pending live measurement gives way, preferring the same station's
  private dropOldestMeasurement(preferredStation: string): boolean {
    const candidates = [this.lanes.get(preferredStation), ...this.lanes.values()];
    for (const lane of candidates) {
      if (!lane) {
        continue;
      }
      const index = lane.findIndex(item => item.kind === 'measurement');
      if (index >= 0) {
        const [dropped] = lane.splice(index, 1);
        this.queued--;
        this.counters.coalesced++;
        logger.warn('Outbound queue full, dropped oldest live measurement', {
          station_id: dropped.station_id,
          enqueued_at: dropped.enqueued_at,
        });
        return true;
      }
    }
    return false;
  }

  private startDraining(station_id: string): void {
    if (this.draining.has(station_id)) {
      return;
    }

    const run = this.drainLane(station_id)
      .catch((error: unknown) => {
        logger.error('Publisher lane failed', { station_id, error: errorMessage(error) });
      })
      .finally(() => {
        this.draining.delete(station_id);
        const lane = this.lanes.get(station_id);
        if (lane && lane.length > 0) {
          this.startDraining(station_id);
        }
      });

    this.draining.set(station_id, run);
  }

  private async drainLane(station_id: string): Promise<void> {
    // Start on a later tick so the caller that enqueued is never held up
    await Promise.resolve();

    const lane = this.lanes.get(station_id);
    while (lane && lane.length > 0) {
      const item = lane.shift();
      if (!item) {
        break;
      }
      this.queued--;
      this.releaseCapacity();
      await this.deliver(item);
    }

    if (lane && lane.length === 0 && this.lanes.get(station_id) === lane) {
      this.lanes.delete(station_id);
    }
  }

  private releaseCapacity(): void {
    const waiter = this.capacityWaiters.shift();
    if (waiter) {
      waiter();
    }
  }

  private async deliver(item: OutboundItem): Promise<void> {
    const messages =
      item.kind === 'measurement'
        ? Object.keys(item.measurement.fields).map(field => ({
            topic: measurementTopic(item.station_id, field),
            payload: measurementPayload(item.measurement, field),
          }))
        : [{ topic: item.event.topic, payload: alertPayload(item.event) }];

    for (const message of messages) {
      try {
        await this.publish(message.topic, message.payload);
      } catch (error) {
        this.counters.delivery_failures++;
        logger.notify(`Delivery failed, event dropped: ${message.topic}`, {
          kind: item.kind,
          station_id: item.station_id,
          topic: message.topic,
          error: errorMessage(error),
          details: error instanceof EngineError ? error.details : undefined,
        });
      }
    }
  }
}
