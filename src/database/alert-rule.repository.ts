import { UpdateQuery } from 'mongoose';
import AlertRuleModel, { IAlertRuleRecord } from '@/models/AlertRule';
import { AlertRuleDefinition } from '@/types/alert.types';
import { toStoreError } from '@/utils/errors';

// Metadata store for alert rule definitions; evaluation state is not persisted
export interface AlertRuleStore {
  save(rule: AlertRuleDefinition): Promise<void>;
  remove(id: string): Promise<boolean>;
  findAll(): Promise<AlertRuleDefinition[]>;
}

const toDefinition = (record: IAlertRuleRecord): AlertRuleDefinition => ({
  id: record.id,
  station_id: record.station_id,
  condition: record.condition,
  topic: record.topic ?? undefined,
  hysteresis: record.hysteresis ?? undefined,
  // Absent means "use the defaults", null means "suppression off"
  suppression:
    record.suppression === undefined
      ? undefined
      : record.suppression && {
          max_triggers: record.suppression.max_triggers,
          cooldown_ms: record.suppression.cooldown_ms,
        },
});

// Settings a new version leaves out fall back to defaults, so they are unset rather than kept
export const toRuleUpdate = (rule: AlertRuleDefinition): UpdateQuery<IAlertRuleRecord> => {
  const $set: Partial<AlertRuleDefinition> = { id: rule.id, station_id: rule.station_id, condition: rule.condition };
  const $unset: Record<string, 1> = {};

  if (rule.topic === undefined) {
    $unset.topic = 1;
  } else {
    $set.topic = rule.topic;
  }
  if (rule.hysteresis === undefined) {
    $unset.hysteresis = 1;
  } else {
    $set.hysteresis = rule.hysteresis;
  }
  if (rule.suppression === undefined) {
    $unset.suppression = 1;
  } else {
    $set.suppression = rule.suppression;
  }

  return Object.keys($unset).length > 0 ? { $set, $unset } : { $set };
};

export class MongoAlertRuleRepository implements AlertRuleStore {
  async save(rule: AlertRuleDefinition): Promise<void> {
    try {
      await AlertRuleModel.findOneAndUpdate(
        { id: rule.id },
        toRuleUpdate(rule),
        { upsert: true, new: true }
      );
    } catch (error) {
      throw toStoreError(error);
    }
  }

  async remove(id: string): Promise<boolean> {
    try {
      const result = await AlertRuleModel.deleteOne({ id });
      return result.deletedCount > 0;
    } catch (error) {
      throw toStoreError(error);
    }
  }

  async findAll(): Promise<AlertRuleDefinition[]> {
    try {
      const records = await AlertRuleModel.find({}).sort({ created_at: 1 }).lean<IAlertRuleRecord[]>();
      return records.map(toDefinition);
    } catch (error) {
      throw toStoreError(error);
    }
  }
}
