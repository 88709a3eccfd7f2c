export const COMPARISON_OPERATORS = ['<', '<=', '>', '>='] as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export type AlertStatus = 'Normal' | 'Triggered' | 'Suppressed';

export type AlertTransition = 'triggered' | 'cleared';

export const ANY_STATION = '*';

export interface SuppressionPolicy {
  max_triggers: number;
  cooldown_ms: number;
}

// Rule as submitted by the admin API and persisted in the metadata store
export interface AlertRuleDefinition {
  id: string;
  station_id: string;                  // station id or '*'
  condition: string;                   // e.g. "temperature < 0"
  topic?: string;
  hysteresis?: number;
  suppression?: SuppressionPolicy | null;
}

export interface ParsedCondition {
  field: string;
  operator: ComparisonOperator;
  threshold: number;
}

export interface AlertRule {
  id: string;
  station_id: string;
  condition: ParsedCondition;
  expression: string;
  topic: string;
  hysteresis: number;
  suppression: SuppressionPolicy | null;
}

export interface RuleMachineState {
  station_id: string;
  current_status: AlertStatus;
  last_value: number | null;
  last_transition_time: number | null;
  last_evaluated_at: number | null;
  window_started_at: number | null;    // first trigger of the current suppression window
  window_triggers: number;             // Normal → Triggered entries inside that window, kept across clears
  suppressed_until: number | null;
}

export interface RuleStateSnapshot {
  rule: AlertRule;
  stations: RuleMachineState[];
}

export interface AlertEvent {
  readonly event_id: string;
  readonly rule_id: string;
  readonly station_id: string;
  readonly field: string;
  readonly observed_value: number;
  readonly threshold: number;
  readonly operator: ComparisonOperator;
  readonly transition: AlertTransition;
  readonly timestamp: number;
  readonly emitted_at: number;
  readonly topic: string;
}
