import { StationInfo, StationsConfig } from '@/types/measurement.types';
import { ConfigurationError } from '@/config';
import { IDENTIFIER_PATTERN, RESERVED_STATION_IDS } from '@/config/constants';
import stationPresetConfig from '../../data/stations.json';

/**
 * Known stations and their ingestion watermark (latest accepted timestamp).
 * Seeded from data/stations.json; further stations can be registered at runtime.
 */
export interface StationRegistry {
  isKnown(station_id: string): boolean;
  getStation(station_id: string): StationInfo | null;
  resolvePasskey(passkey: string): string | null;
  listStations(): StationInfo[];
  registerStation(station: StationInfo): void;
  lastAcceptedAt(station_id: string): number | undefined;
  markAccepted(station_id: string, timestamp: number): void;
}

export class InMemoryStationRegistry implements StationRegistry {
  private stations = new Map<string, StationInfo>();
  private passkeys = new Map<string, string>();
  private watermarks = new Map<string, number>();

  constructor(stations: StationInfo[] = []) {
    stations.forEach(station => this.registerStation(station));
  }

  isKnown(station_id: string): boolean {
    return this.stations.has(station_id);
  }

  getStation(station_id: string): StationInfo | null {
    return this.stations.get(station_id) ?? null;
  }

  resolvePasskey(passkey: string): string | null {
    return this.passkeys.get(passkey) ?? null;
  }

  listStations(): StationInfo[] {
    return [...this.stations.values()];
  }

  registerStation(station: StationInfo): void {
    if (!IDENTIFIER_PATTERN.test(station.station_id)) {
      throw new ConfigurationError(`Invalid station id '${station.station_id}'`);
    }
    if (RESERVED_STATION_IDS.includes(station.station_id)) {
      throw new ConfigurationError(`Station id '${station.station_id}' is reserved for alert topics`);
    }
    this.stations.set(station.station_id, station);
    if (station.passkey) {
      this.passkeys.set(station.passkey, station.station_id);
    }
  }

  lastAcceptedAt(station_id: string): number | undefined {
    return this.watermarks.get(station_id);
  }

  // Watermark only moves forward; late-but-tolerated reports leave it untouched
  markAccepted(station_id: string, timestamp: number): void {
    const current = this.watermarks.get(station_id);
    if (current === undefined || timestamp > current) {
      this.watermarks.set(station_id, timestamp);
    }
  }
}

export const loadStationsConfig = (): StationsConfig => stationPresetConfig;

export const createStationRegistry = (config: StationsConfig = loadStationsConfig()): StationRegistry =>
  new InMemoryStationRegistry(config.stations);
