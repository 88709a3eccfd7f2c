import { v4 as uuidv4 } from 'uuid';
import {
  ANY_STATION,
  AlertEvent,
  AlertRule,
  AlertRuleDefinition,
  AlertTransition,
  COMPARISON_OPERATORS,
  ComparisonOperator,
  ParsedCondition,
  RuleMachineState,
  RuleStateSnapshot,
  SuppressionPolicy,
} from '@/types/alert.types';
import { Measurement } from '@/types/measurement.types';
import { IDENTIFIER_PATTERN, TOPIC_SCHEME } from '@/config/constants';
import { errorMessage, invalidRule } from '@/utils/errors';
import { logger } from '@/utils/logger';

const CONDITION_PATTERN = /^\s*([A-Za-z0-9_.-]+)\s*(<=|>=|<|>)\s*([+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?)\s*$/;
const TOPIC_PATTERN = /^[A-Za-z0-9_.-]+(?:\/[A-Za-z0-9_.-]+)*$/;

const isOperator = (value: string): value is ComparisonOperator =>
  COMPARISON_OPERATORS.some(operator => operator === value);

export const parseCondition = (expression: string): ParsedCondition => {
  const match = CONDITION_PATTERN.exec(expression);
  if (!match) {
    throw invalidRule(`Condition '${expression}' must look like "<field> <op> <number>" with op one of < <= > >=`);
  }
  const [, field, operator, threshold] = match;
  if (!isOperator(operator)) {
    throw invalidRule(`Unsupported operator '${operator}'`);
  }
  return { field, operator, threshold: Number(threshold) };
};

export const alertTopic = (rule_id: string): string => `${TOPIC_SCHEME.ROOT}/${TOPIC_SCHEME.ALERTS}/${rule_id}`;

export interface RuleDefaults {
  hysteresis: number;
  suppression: SuppressionPolicy | null;
}

/**
 * Validates a rule definition and fills in defaults. Every problem with a
 * rule surfaces here, so evaluation itself never fails on a bad definition.
 */
export const buildRule = (definition: AlertRuleDefinition, defaults: RuleDefaults): AlertRule => {
  if (typeof definition.id !== 'string' || !IDENTIFIER_PATTERN.test(definition.id)) {
    throw invalidRule(`Invalid rule id '${String(definition.id)}'`);
  }
  if (
    typeof definition.station_id !== 'string' ||
    (definition.station_id !== ANY_STATION && !IDENTIFIER_PATTERN.test(definition.station_id))
  ) {
    throw invalidRule(`Invalid target station '${String(definition.station_id)}'`, { rule_id: definition.id });
  }
  if (typeof definition.condition !== 'string') {
    throw invalidRule('Condition must be a string', { rule_id: definition.id });
  }

  const condition = parseCondition(definition.condition);

  const hysteresis = definition.hysteresis ?? defaults.hysteresis;
  if (!Number.isFinite(hysteresis) || hysteresis < 0) {
    throw invalidRule('Hysteresis must be a non-negative number', { rule_id: definition.id, hysteresis });
  }

  const suppression = definition.suppression === undefined ? defaults.suppression : definition.suppression;
  if (suppression !== null) {
    if (!Number.isInteger(suppression.max_triggers) || suppression.max_triggers < 1) {
      throw invalidRule('Suppression max_triggers must be a positive integer', { rule_id: definition.id });
    }
    if (!Number.isFinite(suppression.cooldown_ms) || suppression.cooldown_ms < 0) {
      throw invalidRule('Suppression cooldown_ms must be a non-negative number', { rule_id: definition.id });
    }
  }

  const topic = definition.topic ?? alertTopic(definition.id);
  if (!TOPIC_PATTERN.test(topic)) {
    throw invalidRule(`Invalid topic '${topic}'`, { rule_id: definition.id });
  }

  return {
    id: definition.id,
    station_id: definition.station_id,
    condition,
    expression: definition.condition.trim(),
    topic,
    hysteresis,
    suppression: suppression === null ? null : { ...suppression },
  };
};

const conditionHolds = ({ operator, threshold }: ParsedCondition, value: number): boolean => {
  switch (operator) {
    case '<':
      return value < threshold;
    case '<=':
      return value <= threshold;
    case '>':
      return value > threshold;
    case '>=':
      return value >= threshold;
  }
};

const initialState = (station_id: string): RuleMachineState => ({
  station_id,
  current_status: 'Normal',
  last_value: null,
  last_transition_time: null,
  last_evaluated_at: null,
  window_started_at: null,
  window_triggers: 0,
  suppressed_until: null,
});

/**
 * One rule and the state machines it owns, one per station it has seen.
 * Only this unit mutates its states.
 *
 * Suppression counts entries into the alert (Normal → Triggered) inside a
 * cooldown window opened by the first of them. The count survives clears, so
 * a flapping sensor runs out of triggers; once `max_triggers` is spent the
 * next entry lands in Suppressed without an event until the window closes.
 */
class RuleUnit {
  private machines = new Map<string, RuleMachineState>();

  constructor(
    readonly rule: AlertRule,
    private readonly now: () => number,
    private readonly newId: () => string,
  ) {}

  applies(measurement: Measurement): boolean {
    return (
      (this.rule.station_id === ANY_STATION || this.rule.station_id === measurement.station_id) &&
      Object.hasOwn(measurement.fields, this.rule.condition.field)
    );
  }

  apply(measurement: Measurement): AlertEvent | null {
    const { condition, hysteresis, suppression } = this.rule;
    if (!Object.hasOwn(measurement.fields, condition.field)) {
      return null;
    }
    const value = measurement.fields[condition.field];
    const timestamp = measurement.timestamp;

    let state = this.machines.get(measurement.station_id);
    if (!state) {
      state = initialState(measurement.station_id);
      this.machines.set(measurement.station_id, state);
    }

    // Superseded or repeated data never re-drives the machine
    if (state.last_evaluated_at !== null && timestamp <= state.last_evaluated_at) {
      logger.debug('Ignoring late or duplicate measurement for rule', {
        rule_id: this.rule.id,
        station_id: measurement.station_id,
        timestamp,
        last_evaluated_at: state.last_evaluated_at,
      });
      return null;
    }

    state.last_value = value;
    state.last_evaluated_at = timestamp;

    const holds = conditionHolds(condition, value);
    const distance = Math.abs(value - condition.threshold);
    const entering = holds && distance >= hysteresis;
    const leaving = !holds && distance >= hysteresis;

    switch (state.current_status) {
      case 'Normal':
        if (!entering) {
          return null;
        }
        if (!suppression || this.admitTrigger(state, timestamp, suppression)) {
          return this.transition(state, 'Triggered', 'triggered', measurement, value);
        }
        this.suppress(state, measurement, suppression);
        return null;

      case 'Triggered':
        return leaving ? this.transition(state, 'Normal', 'cleared', measurement, value) : null;

      case 'Suppressed':
        if (leaving) {
          // Its triggered event was held back, so there is nothing to clear
          state.current_status = 'Normal';
          state.last_transition_time = timestamp;
          state.suppressed_until = null;
          return null;
        }
        if (holds && state.suppressed_until !== null && timestamp >= state.suppressed_until) {
          this.openWindow(state, timestamp);
          return this.transition(state, 'Triggered', 'triggered', measurement, value);
        }
        return null;
    }
  }

  snapshot(): RuleStateSnapshot {
    return {
      rule: this.rule,
      stations: [...this.machines.values()].map(state => ({ ...state })),
    };
  }

  // Counts this entry against the window; false once the window's budget is spent
  private admitTrigger(state: RuleMachineState, timestamp: number, suppression: SuppressionPolicy): boolean {
    if (state.window_started_at === null || timestamp >= state.window_started_at + suppression.cooldown_ms) {
      this.openWindow(state, timestamp);
      return true;
    }
    state.window_triggers++;
    return state.window_triggers <= suppression.max_triggers;
  }

  private openWindow(state: RuleMachineState, timestamp: number): void {
    state.window_started_at = timestamp;
    state.window_triggers = 1;
  }

  private suppress(state: RuleMachineState, measurement: Measurement, suppression: SuppressionPolicy): void {
    state.current_status = 'Suppressed';
    state.last_transition_time = measurement.timestamp;
    state.suppressed_until = (state.window_started_at ?? measurement.timestamp) + suppression.cooldown_ms;

    const meta = {
      rule_id: this.rule.id,
      station_id: measurement.station_id,
      window_triggers: state.window_triggers,
      suppressed_until: state.suppressed_until,
    };
    if (state.window_triggers === suppression.max_triggers + 1) {
      logger.notify(`Alert rule ${this.rule.id} suppressed for station ${measurement.station_id}`, meta);
    } else {
      logger.debug(`Alert rule ${this.rule.id} still suppressed`, meta);
    }
  }

  private transition(
    state: RuleMachineState,
    status: 'Normal' | 'Triggered',
    kind: AlertTransition,
    measurement: Measurement,
    value: number,
  ): AlertEvent {
    state.current_status = status;
    state.last_transition_time = measurement.timestamp;
    state.suppressed_until = null;

    return Object.freeze({
      event_id: this.newId(),
      rule_id: this.rule.id,
      station_id: measurement.station_id,
      field: this.rule.condition.field,
      observed_value: value,
      threshold: this.rule.condition.threshold,
      operator: this.rule.condition.operator,
      transition: kind,
      timestamp: measurement.timestamp,
      emitted_at: this.now(),
      topic: this.rule.topic,
    });
  }
}

export interface AlertEvaluatorOptions {
  defaults: RuleDefaults;
  now?: () => number;
  idGenerator?: () => string;
}

/**
 * Arena of rule units indexed by rule id. Rules are independent: a failure
 * while evaluating one rule is logged and does not affect the others.
 */
export class AlertEvaluator {
  private units = new Map<string, RuleUnit>();
  private readonly now: () => number;
  private readonly newId: () => string;

  constructor(private readonly options: AlertEvaluatorOptions) {
    this.now = options.now ?? Date.now;
    this.newId = options.idGenerator ?? uuidv4;
  }

  validateRule(definition: AlertRuleDefinition): AlertRule {
    return buildRule(definition, this.options.defaults);
  }

  // Re-registering an id replaces the definition and starts from fresh state
  registerRule(definition: AlertRuleDefinition): AlertRule {
    const rule = this.validateRule(definition);
    const replaced = this.units.has(rule.id);
    this.units.set(rule.id, new RuleUnit(rule, this.now, this.newId));
    logger.info(`Alert rule ${replaced ? 'replaced' : 'registered'}: ${rule.id}`, {
      rule_id: rule.id,
      station_id: rule.station_id,
      condition: rule.expression,
    });
    return rule;
  }

  removeRule(id: string): boolean {
    const removed = this.units.delete(id);
    if (removed) {
      logger.info(`Alert rule removed: ${id}`);
    }
    return removed;
  }

  getRule(id: string): AlertRule | null {
    return this.units.get(id)?.rule ?? null;
  }

  listRules(): AlertRule[] {
    return [...this.units.values()].map(unit => unit.rule);
  }

  getRuleState(id: string): RuleStateSnapshot | null {
    return this.units.get(id)?.snapshot() ?? null;
  }

  evaluate(measurement: Measurement): AlertEvent[] {
    const events: AlertEvent[] = [];

    this.units.forEach(unit => {
      if (!unit.applies(measurement)) {
        return;
      }
      try {
        const event = unit.apply(measurement);
        if (event) {
          events.push(event);
          logger.info(`Alert ${event.transition}: ${event.rule_id}`, {
            rule_id: event.rule_id,
            station_id: event.station_id,
            field: event.field,
            observed_value: event.observed_value,
            threshold: event.threshold,
          });
        }
      } catch (error) {
        logger.error('Alert rule evaluation failed', {
          rule_id: unit.rule.id,
          station_id: measurement.station_id,
          error: errorMessage(error),
        });
      }
    });

    return events;
  }
}
