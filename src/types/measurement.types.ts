import { AlertEvent } from './alert.types';

// Canonical measurement shapes shared by ingestion, caching, querying and alerting.

export type FieldValues = Readonly<Record<string, number>>;

export interface Measurement {
  readonly station_id: string;
  readonly timestamp: number;          // epoch ms, UTC
  readonly fields: FieldValues;        // e.g. { temperature: 21.4, humidity: 55 }
  readonly provenance: string;         // station software that produced the report
}

export type ReportSource = 'generic' | 'weewx' | 'ecowitt';

// Station-software payload handed over by a protocol adapter
export interface RawReport {
  source: ReportSource;
  payload: unknown;
  received_at?: number;
}

export interface StationInfo {
  station_id: string;
  station_name: string;
  passkey?: string;                    // ecowitt uploads identify themselves by PASSKEY
  coordinates?: {
    latitude: number;
    longitude: number;
  };
  fields: string[];
}

export interface StationsConfig {
  version: string;
  last_updated: string;
  stations: StationInfo[];
}

export interface IngestionOutcome {
  measurement: Measurement;
  alerts: AlertEvent[];
  published: boolean;                  // live broadcast queued (false when coalesced away)
}

// Batch ingestion result, one entry per failed or dropped report
export interface IngestionBatchResult {
  accepted_count: number;
  dropped_count: number;
  failed_count: number;
  errors: Array<{ index: number; station_id?: string; code: string; message: string }>;
  processing_time_ms: number;
}
