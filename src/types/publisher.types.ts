import { AlertEvent } from './alert.types';
import { Measurement } from './measurement.types';

// Outbound pub/sub transport (Redis, MQTT bridge, ...)
export interface BusTransport {
  publish(topic: string, payload: string): Promise<void>;
}

export type OutboundItem =
  | { kind: 'measurement'; station_id: string; measurement: Measurement; enqueued_at: number }
  | { kind: 'alert'; station_id: string; event: AlertEvent; enqueued_at: number };

export interface PublisherStats {
  queued: number;
  published: number;
  coalesced: number;
  delivery_failures: number;
  retries: number;
}
