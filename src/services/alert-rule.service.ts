import { AlertRule, AlertRuleDefinition, RuleStateSnapshot } from '@/types/alert.types';
import { AlertRuleStore } from '@/database/alert-rule.repository';
import { AlertEvaluator } from './alert-evaluator.service';
import { EngineError, errorMessage } from '@/utils/errors';
import { logger } from '@/utils/logger';

/**
 * Rule management on top of the evaluator: definitions are validated, then
 * persisted, and only then take effect.
 */
export class AlertRuleService {
  constructor(
    private readonly evaluator: AlertEvaluator,
    private readonly store: AlertRuleStore,
  ) {}

  async registerRule(definition: AlertRuleDefinition): Promise<AlertRule> {
    // Rejected definitions never reach the store
    this.evaluator.validateRule(definition);
    await this.store.save(definition);
    return this.evaluator.registerRule(definition);
  }

  async removeRule(id: string): Promise<void> {
    const persisted = await this.store.remove(id);
    const active = this.evaluator.removeRule(id);
    if (!persisted && !active) {
      throw new EngineError('RULE_NOT_FOUND', `Alert rule ${id} not found`, { rule_id: id });
    }
  }

  listRules(): AlertRule[] {
    return this.evaluator.listRules();
  }

  getRuleState(id: string): RuleStateSnapshot {
    const snapshot = this.evaluator.getRuleState(id);
    if (!snapshot) {
      throw new EngineError('RULE_NOT_FOUND', `Alert rule ${id} not found`, { rule_id: id });
    }
    return snapshot;
  }

  /**
   * Registers every stored definition at startup. A definition that no
   * longer validates is skipped and reported.
   */
  async loadPersistedRules(): Promise<number> {
    const definitions = await this.store.findAll();
    let loaded = 0;

    for (const definition of definitions) {
      try {
        this.evaluator.registerRule(definition);
        loaded++;
      } catch (error) {
        logger.error(`Skipping stored alert rule ${definition.id}`, { error: errorMessage(error) });
      }
    }

    logger.info(`Loaded ${loaded} of ${definitions.length} persisted alert rules`);
    return loaded;
  }
}
