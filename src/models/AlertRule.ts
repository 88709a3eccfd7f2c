import { Schema, model } from 'mongoose';
import { AlertRuleDefinition } from '@/types/alert.types';

export interface IAlertRuleRecord extends AlertRuleDefinition {
  created_at?: Date;
  updated_at?: Date;
}

const suppressionSchema = new Schema({
  max_triggers: { type: Number, required: true, min: 1 },
  cooldown_ms: { type: Number, required: true, min: 0 }
}, { _id: false });

const alertRuleSchema = new Schema<IAlertRuleRecord>({
  id: {
    type: String,
    required: true,
    unique: true,
    index: true
  },
  station_id: {
    type: String,
    required: true
  },
  condition: {
    type: String,
    required: true
  },
  topic: { type: String },
  hysteresis: { type: Number, min: 0 },
  suppression: { type: suppressionSchema, default: undefined }
}, {
  timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' },
  collection: 'alert_rules'
});

const AlertRuleModel = model<IAlertRuleRecord>('AlertRule', alertRuleSchema);

export default AlertRuleModel;
