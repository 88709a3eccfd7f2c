import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { AlertRuleService } from '@/services/alert-rule.service';
import { AlertRule } from '@/types/alert.types';
import { invalidRule } from '@/utils/errors';

const ruleSchema = z.object({
  id: z.string(),
  station_id: z.string(),
  condition: z.string(),
  topic: z.string().optional(),
  hysteresis: z.number().optional(),
  suppression: z
    .object({
      max_triggers: z.number(),
      cooldown_ms: z.number(),
    })
    .nullable()
    .optional(),
});

const serializeRule = (rule: AlertRule) => ({
  id: rule.id,
  station_id: rule.station_id,
  condition: rule.expression,
  topic: rule.topic,
  hysteresis: rule.hysteresis,
  suppression: rule.suppression,
});

export const createRuleController = (rules: AlertRuleService) => {
  const createRule = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const parsed = ruleSchema.safeParse(req.body);
      if (!parsed.success) {
        throw invalidRule(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; '));
      }

      const rule = await rules.registerRule(parsed.data);
      res.status(201).json({ success: true, data: serializeRule(rule) });
    } catch (error) {
      next(error);
    }
  };

  const listRules = (req: Request, res: Response): void => {
    const active = rules.listRules().map(serializeRule);
    res.status(200).json({ success: true, data: { rules: active, count: active.length } });
  };

  const getRuleState = (req: Request, res: Response, next: NextFunction): void => {
    try {
      const snapshot = rules.getRuleState(req.params.rule_id);
      res.status(200).json({
        success: true,
        data: { rule: serializeRule(snapshot.rule), stations: snapshot.stations },
      });
    } catch (error) {
      next(error);
    }
  };

  const deleteRule = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      await rules.removeRule(req.params.rule_id);
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  };

  return { createRule, listRules, getRuleState, deleteRule };
};
