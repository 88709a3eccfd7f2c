import { AlertEvaluator, buildRule, parseCondition } from '@/services/alert-evaluator.service';
import { AlertRuleDefinition } from '@/types/alert.types';
import { captureError, measurement } from '../helpers/fixtures';

const EMITTED_AT = 999;

describe('parseCondition', () => {
  it('should split field, operator and threshold', () => {
    expect(parseCondition('temperature < 0')).toEqual({ field: 'temperature', operator: '<', threshold: 0 });
    expect(parseCondition('wind_speed>=12.5')).toEqual({ field: 'wind_speed', operator: '>=', threshold: 12.5 });
    expect(parseCondition(' pressure <= -1e2 ')).toEqual({ field: 'pressure', operator: '<=', threshold: -100 });
  });

  it.each(['temperature == 3', 'temperature <', '< 3', 'temperature < warm', ''])(
    'should reject "%s"',
    expression => {
      expect(captureError(() => parseCondition(expression)).code).toBe('INVALID_RULE_DEFINITION');
    },
  );
});

describe('buildRule', () => {
  const defaults = { hysteresis: 0, suppression: { max_triggers: 10, cooldown_ms: 600_000 } };

  it('should fill in defaults and the alert topic', () => {
    expect(buildRule({ id: 'frost', station_id: 'alpha', condition: 'temperature < 0' }, defaults)).toEqual({
      id: 'frost',
      station_id: 'alpha',
      condition: { field: 'temperature', operator: '<', threshold: 0 },
      expression: 'temperature < 0',
      topic: 'weather/alerts/frost',
      hysteresis: 0,
      suppression: { max_triggers: 10, cooldown_ms: 600_000 },
    });
  });

  it('should let a rule turn suppression off', () => {
    const rule = buildRule({ id: 'frost', station_id: '*', condition: 'temperature < 0', suppression: null }, defaults);
    expect(rule.suppression).toBeNull();
  });

  it.each<[string, Partial<AlertRuleDefinition>]>([
    ['a malformed id', { id: 'has space' }],
    ['a malformed station', { station_id: 'alpha/beta' }],
    ['a negative hysteresis', { hysteresis: -1 }],
    ['a zero max_triggers', { suppression: { max_triggers: 0, cooldown_ms: 1000 } }],
    ['a negative cooldown', { suppression: { max_triggers: 2, cooldown_ms: -5 } }],
    ['an invalid topic', { topic: 'alerts//frost' }],
  ])('should reject %s', (_label, overrides) => {
    const definition = { id: 'frost', station_id: 'alpha', condition: 'temperature < 0', ...overrides };
    expect(captureError(() => buildRule(definition, defaults)).code).toBe('INVALID_RULE_DEFINITION');
  });
});

describe('AlertEvaluator', () => {
  let evaluator: AlertEvaluator;

  beforeEach(() => {
    let id = 0;
    evaluator = new AlertEvaluator({
      defaults: { hysteresis: 0, suppression: null },
      now: () => EMITTED_AT,
      idGenerator: () => `evt-${++id}`,
    });
  });

  const feed = (station_id: string, field: string, values: Array<[number, number]>) =>
    values.flatMap(([timestamp, value]) => evaluator.evaluate(measurement(station_id, timestamp, { [field]: value })));

  describe('hysteresis', () => {
    it('should trigger and clear only outside the hysteresis band', () => {
      evaluator.registerRule({ id: 'frost', station_id: 'alpha', condition: 'temperature < 0', hysteresis: 1 });

      const events = feed('alpha', 'temperature', [
        [1000, 1],
        [2000, -0.5],
        [3000, -1],
        [4000, 0.3],
        [5000, 0.9],
        [6000, 1.5],
      ]);

      expect(events).toEqual([
        {
          event_id: 'evt-1',
          rule_id: 'frost',
          station_id: 'alpha',
          field: 'temperature',
          observed_value: -1,
          threshold: 0,
          operator: '<',
          transition: 'triggered',
          timestamp: 3000,
          emitted_at: EMITTED_AT,
          topic: 'weather/alerts/frost',
        },
        {
          event_id: 'evt-2',
          rule_id: 'frost',
          station_id: 'alpha',
          field: 'temperature',
          observed_value: 1.5,
          threshold: 0,
          operator: '<',
          transition: 'cleared',
          timestamp: 6000,
          emitted_at: EMITTED_AT,
          topic: 'weather/alerts/frost',
        },
      ]);
      expect(evaluator.getRuleState('frost')?.stations[0].current_status).toBe('Normal');
    });

    it('should emit nothing while the value stays on one side', () => {
      evaluator.registerRule({ id: 'heat', station_id: 'alpha', condition: 'temperature > 30' });

      const events = feed('alpha', 'temperature', [
        [1000, 31],
        [2000, 32],
        [3000, 33],
      ]);
      expect(events.map(event => event.transition)).toEqual(['triggered']);
    });
  });

  describe('suppression', () => {
    beforeEach(() => {
      evaluator.registerRule({
        id: 'gale',
        station_id: 'alpha',
        condition: 'wind_speed > 20',
        suppression: { max_triggers: 2, cooldown_ms: 60_000 },
      });
    });

    const flap = (from: number, count: number): Array<[number, number]> =>
      Array.from({ length: count }, (_, i): [number, number] => [from + i * 1000, i % 2 === 0 ? 25 : 10]);

    it('should hold back triggers from a flapping sensor once the window budget is spent', () => {
      const events = feed('alpha', 'wind_speed', flap(0, 10));

      expect(events.map(event => [event.transition, event.timestamp])).toEqual([
        ['triggered', 0],
        ['cleared', 1000],
        ['triggered', 2000],
        ['cleared', 3000],
      ]);
      expect(evaluator.getRuleState('gale')?.stations[0]).toMatchObject({
        current_status: 'Normal',
        window_started_at: 0,
        window_triggers: 5,
        suppressed_until: null,
      });
    });

    it('should fire again once the cooldown window has passed', () => {
      feed('alpha', 'wind_speed', flap(0, 10));

      const events = feed('alpha', 'wind_speed', [[60_000, 25]]);

      expect(events.map(event => [event.transition, event.timestamp])).toEqual([['triggered', 60_000]]);
      expect(evaluator.getRuleState('gale')?.stations[0]).toMatchObject({
        current_status: 'Triggered',
        window_started_at: 60_000,
        window_triggers: 1,
      });
    });

    it('should stay suppressed until the window closes, then trigger if the condition still holds', () => {
      feed('alpha', 'wind_speed', flap(0, 5));

      const state = evaluator.getRuleState('gale')?.stations[0];
      expect(state?.current_status).toBe('Suppressed');
      expect(state?.suppressed_until).toBe(60_000);

      expect(feed('alpha', 'wind_speed', [[30_000, 26]])).toEqual([]);

      const events = feed('alpha', 'wind_speed', [[60_000, 27]]);
      expect(events.map(event => [event.transition, event.timestamp])).toEqual([['triggered', 60_000]]);
      expect(evaluator.getRuleState('gale')?.stations[0].current_status).toBe('Triggered');
    });

    it('should leave suppression without a cleared event', () => {
      feed('alpha', 'wind_speed', flap(0, 5));

      expect(feed('alpha', 'wind_speed', [[5000, 10]])).toEqual([]);
      expect(evaluator.getRuleState('gale')?.stations[0]).toMatchObject({
        current_status: 'Normal',
        last_transition_time: 5000,
      });
    });

    it('should never suppress a condition that simply keeps holding', () => {
      const events = feed('alpha', 'wind_speed', [
        [0, 25],
        [10_000, 26],
        [20_000, 27],
        [30_000, 28],
      ]);

      expect(events.map(event => event.transition)).toEqual(['triggered']);
      expect(evaluator.getRuleState('gale')?.stations[0]).toMatchObject({
        current_status: 'Triggered',
        window_triggers: 1,
      });
    });
  });

  it('should ignore a repeated measurement at the timestamp already evaluated', () => {
    evaluator.registerRule({
      id: 'gale',
      station_id: 'alpha',
      condition: 'wind_speed > 20',
      suppression: { max_triggers: 1, cooldown_ms: 60_000 },
    });

    expect(feed('alpha', 'wind_speed', [[1000, 25]]).map(event => event.transition)).toEqual(['triggered']);
    expect(feed('alpha', 'wind_speed', [[1000, 10]])).toEqual([]);
    expect(evaluator.getRuleState('gale')?.stations[0]).toMatchObject({
      current_status: 'Triggered',
      last_value: 25,
      last_evaluated_at: 1000,
    });
  });

  it('should not treat inherited object members as fields', () => {
    evaluator.registerRule({ id: 'odd', station_id: '*', condition: 'toString > 0' });

    expect(evaluator.evaluate(measurement('alpha', 1000, { temperature: 5 }))).toEqual([]);
    expect(evaluator.getRuleState('odd')?.stations).toEqual([]);
  });

  it('should ignore measurements older than the last one evaluated', () => {
    evaluator.registerRule({ id: 'heat', station_id: 'alpha', condition: 'temperature > 30' });

    expect(feed('alpha', 'temperature', [[2000, 35]]).map(event => event.transition)).toEqual(['triggered']);
    expect(feed('alpha', 'temperature', [[1000, 20]])).toEqual([]);
    expect(evaluator.getRuleState('heat')?.stations[0]).toMatchObject({
      current_status: 'Triggered',
      last_evaluated_at: 2000,
      last_value: 35,
    });
  });

  it('should keep one state machine per station for wildcard rules', () => {
    evaluator.registerRule({ id: 'heat', station_id: '*', condition: 'temperature > 30' });

    const events = [...feed('alpha', 'temperature', [[1000, 35]]), ...feed('bravo', 'temperature', [[1000, 36]])];

    expect(events.map(event => [event.station_id, event.transition])).toEqual([
      ['alpha', 'triggered'],
      ['bravo', 'triggered'],
    ]);
    expect(evaluator.getRuleState('heat')?.stations.map(state => state.station_id)).toEqual(['alpha', 'bravo']);
  });

  it('should skip measurements of other stations or without the field', () => {
    evaluator.registerRule({ id: 'heat', station_id: 'alpha', condition: 'temperature > 30' });

    expect(evaluator.evaluate(measurement('bravo', 1000, { temperature: 40 }))).toEqual([]);
    expect(evaluator.evaluate(measurement('alpha', 1000, { humidity: 40 }))).toEqual([]);
    expect(evaluator.getRuleState('heat')?.stations).toEqual([]);
  });

  it('should start from a fresh state when a rule is replaced', () => {
    evaluator.registerRule({ id: 'heat', station_id: 'alpha', condition: 'temperature > 30' });
    feed('alpha', 'temperature', [[1000, 35]]);

    evaluator.registerRule({ id: 'heat', station_id: 'alpha', condition: 'temperature > 40' });

    expect(evaluator.listRules()).toHaveLength(1);
    expect(evaluator.getRuleState('heat')?.stations).toEqual([]);
  });

  it('should stop evaluating removed rules', () => {
    evaluator.registerRule({ id: 'heat', station_id: 'alpha', condition: 'temperature > 30' });

    expect(evaluator.removeRule('heat')).toBe(true);
    expect(evaluator.removeRule('heat')).toBe(false);
    expect(evaluator.evaluate(measurement('alpha', 1000, { temperature: 50 }))).toEqual([]);
    expect(evaluator.getRule('heat')).toBeNull();
  });
});
