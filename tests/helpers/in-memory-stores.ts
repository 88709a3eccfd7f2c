import { MeasurementStore } from '@/database/measurement.repository';
import { AlertRuleStore } from '@/database/alert-rule.repository';
import { Measurement } from '@/types/measurement.types';
import { AlertRuleDefinition } from '@/types/alert.types';

export class InMemoryMeasurementStore implements MeasurementStore {
  private rows = new Map<string, Map<number, Measurement>>();
  // Every accepted write, in the order it reached the store
  readonly writes: Measurement[] = [];
  scanCalls = 0;
  latestCalls = 0;
  failWith: Error | null = null;
  // While set, scans wait on it
  scanGate: Promise<void> | null = null;

  async upsert(measurement: Measurement): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    let station = this.rows.get(measurement.station_id);
    if (!station) {
      station = new Map();
      this.rows.set(measurement.station_id, station);
    }
    station.set(measurement.timestamp, measurement);
    this.writes.push(measurement);
  }

  async scan(station_id: string, start: number, end: number): Promise<Measurement[]> {
    this.scanCalls++;
    if (this.scanGate) {
      await this.scanGate;
    }
    if (this.failWith) {
      throw this.failWith;
    }
    return [...(this.rows.get(station_id)?.values() ?? [])]
      .filter(measurement => measurement.timestamp >= start && measurement.timestamp < end)
      .sort((a, b) => a.timestamp - b.timestamp);
  }

  async latest(station_id: string): Promise<Measurement | null> {
    this.latestCalls++;
    if (this.failWith) {
      throw this.failWith;
    }
    const all = [...(this.rows.get(station_id)?.values() ?? [])];
    return all.reduce<Measurement | null>(
      (newest, measurement) => (newest === null || measurement.timestamp > newest.timestamp ? measurement : newest),
      null,
    );
  }
}

export class InMemoryAlertRuleStore implements AlertRuleStore {
  readonly rules = new Map<string, AlertRuleDefinition>();

  constructor(seed: AlertRuleDefinition[] = []) {
    seed.forEach(rule => this.rules.set(rule.id, rule));
  }

  async save(rule: AlertRuleDefinition): Promise<void> {
    this.rules.set(rule.id, rule);
  }

  async remove(id: string): Promise<boolean> {
    return this.rules.delete(id);
  }

  async findAll(): Promise<AlertRuleDefinition[]> {
    return [...this.rules.values()];
  }
}
