import MeasurementModel, { IMeasurementRecord } from '@/models/Measurement';
import { Measurement } from '@/types/measurement.types';
import { toStoreError } from '@/utils/errors';

/**
 * Backing time-series store. Append-mostly: only accepted measurements are
 * written, and a write for an existing (station, timestamp) overwrites it.
 */
export interface MeasurementStore {
  upsert(measurement: Measurement): Promise<void>;
  // Measurements with start <= timestamp < end, oldest first
  scan(station_id: string, start: number, end: number): Promise<Measurement[]>;
  latest(station_id: string): Promise<Measurement | null>;
}

const toMeasurement = (record: IMeasurementRecord): Measurement =>
  Object.freeze({
    station_id: record.station_id,
    timestamp: record.timestamp.getTime(),
    fields: Object.freeze({ ...record.fields }),
    provenance: record.provenance,
  });

export class MongoMeasurementRepository implements MeasurementStore {
  async upsert(measurement: Measurement): Promise<void> {
    try {
      await MeasurementModel.updateOne(
        { station_id: measurement.station_id, timestamp: new Date(measurement.timestamp) },
        { $set: { fields: { ...measurement.fields }, provenance: measurement.provenance } },
        { upsert: true }
      );
    } catch (error) {
      throw toStoreError(error);
    }
  }

  async scan(station_id: string, start: number, end: number): Promise<Measurement[]> {
    try {
      const records = await MeasurementModel.find({
        station_id,
        timestamp: { $gte: new Date(start), $lt: new Date(end) }
      })
        .sort({ timestamp: 1 })
        .lean<IMeasurementRecord[]>();
      return records.map(toMeasurement);
    } catch (error) {
      throw toStoreError(error);
    }
  }

  async latest(station_id: string): Promise<Measurement | null> {
    try {
      const record = await MeasurementModel.findOne({ station_id })
        .sort({ timestamp: -1 })
        .lean<IMeasurementRecord>();
      return record ? toMeasurement(record) : null;
    } catch (error) {
      throw toStoreError(error);
    }
  }
}
