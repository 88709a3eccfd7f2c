import { Router } from 'express';
import { AlertRuleService } from '@/services/alert-rule.service';
import { createRuleController } from '@/controllers/rule.controller';

export const createRuleRoutes = (rules: AlertRuleService): Router => {
  const router = Router();
  const controller = createRuleController(rules);

  router.route('/').get(controller.listRules).post(controller.createRule);
  router.delete('/:rule_id', controller.deleteRule);
  router.get('/:rule_id/state', controller.getRuleState);

  return router;
};
