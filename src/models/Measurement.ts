import { Schema, model } from 'mongoose';

export interface IMeasurementRecord {
  station_id: string;
  timestamp: Date;
  fields: Record<string, number>;
  provenance: string;
  created_at?: Date;
  updated_at?: Date;
}

const measurementSchema = new Schema<IMeasurementRecord>({
  station_id: {
    type: String,
    required: true,
    index: true
  },
  timestamp: {
    type: Date,
    required: true
  },
  fields: {
    type: Schema.Types.Mixed,
    required: true
  },
  provenance: {
    type: String,
    required: true
  }
}, {
  timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' },
  collection: 'measurements',
  minimize: false
});

// One document per station and instant: re-reports overwrite instead of duplicating
measurementSchema.index({ station_id: 1, timestamp: 1 }, { unique: true });

const MeasurementModel = model<IMeasurementRecord>('Measurement', measurementSchema);

export default MeasurementModel;
