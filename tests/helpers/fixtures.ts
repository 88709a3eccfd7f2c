import { loadConfig, EngineConfig } from '@/config';
import { InMemoryStationRegistry } from '@/services/station-registry.service';
import { createWeatherEngine, WeatherEngine } from '@/services/engine';
import { Measurement, RawReport } from '@/types/measurement.types';
import { EngineError } from '@/utils/errors';
import { InMemoryAlertRuleStore, InMemoryMeasurementStore } from './in-memory-stores';
import { FakeBusTransport } from './fake-bus';

export const NOW = Date.parse('2026-03-01T12:00:00.000Z');

export const TEST_STATIONS = [
  { station_id: 'alpha', station_name: 'Alpha Test Site', fields: ['temperature', 'humidity'] },
  { station_id: 'bravo', station_name: 'Bravo Test Site', passkey: 'test-passkey', fields: ['temperature'] },
];

export const createTestRegistry = (): InMemoryStationRegistry => new InMemoryStationRegistry(TEST_STATIONS);

export const measurement = (
  station_id: string,
  timestamp: number,
  fields: Record<string, number>,
  provenance = 'generic',
): Measurement => ({ station_id, timestamp, fields, provenance });

export const genericReport = (
  station_id: string,
  timestamp: number | string,
  fields: Record<string, unknown>,
): RawReport => ({
  source: 'generic',
  payload: { station_id, timestamp, fields },
});

export const captureError = (fn: () => unknown): EngineError => {
  try {
    fn();
  } catch (error) {
    if (error instanceof EngineError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected an EngineError to be thrown');
};

export const captureRejection = async (promise: Promise<unknown>): Promise<EngineError> => {
  try {
    await promise;
  } catch (error) {
    if (error instanceof EngineError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected an EngineError rejection');
};

export interface TestEngine {
  engine: WeatherEngine;
  store: InMemoryMeasurementStore;
  ruleStore: InMemoryAlertRuleStore;
  bus: FakeBusTransport;
  config: EngineConfig;
  clock: { now: number };
}

// A fully wired engine over in-process stand-ins; `clock` is every component's notion of now
export const createTestEngine = (): TestEngine => {
  const config = loadConfig({});
  const store = new InMemoryMeasurementStore();
  const ruleStore = new InMemoryAlertRuleStore();
  const bus = new FakeBusTransport();
  const clock = { now: NOW };

  let id = 0;
  const engine = createWeatherEngine(config, {
    measurementStore: store,
    ruleStore,
    transport: bus,
    registry: createTestRegistry(),
    now: () => clock.now,
    sleep: async ms => {
      clock.now += ms;
    },
    idGenerator: () => `evt-${++id}`,
  });

  return { engine, store, ruleStore, bus, config, clock };
};
