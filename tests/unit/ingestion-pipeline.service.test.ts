import { NOW, TestEngine, captureRejection, createTestEngine, genericReport } from '../helpers/fixtures';

const HOUR = 60 * 60 * 1000;

describe('IngestionPipeline', () => {
  let t: TestEngine;

  beforeEach(() => {
    t = createTestEngine();
  });

  it('should store, cache and broadcast an accepted report', async () => {
    const outcome = await t.engine.pipeline.ingest(genericReport('alpha', NOW - 1000, { temperature: 12 }));

    expect(outcome).toEqual({
      measurement: { station_id: 'alpha', timestamp: NOW - 1000, fields: { temperature: 12 }, provenance: 'generic' },
      alerts: [],
      published: true,
    });
    expect(t.store.writes).toHaveLength(1);
    expect(t.engine.registry.lastAcceptedAt('alpha')).toBe(NOW - 1000);
    expect(t.engine.cache.getLatest('alpha')).toEqual({ hit: true, value: outcome.measurement });

    await t.engine.publisher.flush();
    expect(t.bus.topics()).toEqual(['weather/alpha/temperature']);
  });

  it('should keep per-station order when stations arrive interleaved', async () => {
    const reports = [
      genericReport('alpha', NOW - 3000, { temperature: 1 }),
      genericReport('bravo', NOW - 3000, { temperature: 10 }),
      genericReport('alpha', NOW - 2000, { temperature: 2 }),
      genericReport('bravo', NOW - 2000, { temperature: 20 }),
      genericReport('alpha', NOW - 1000, { temperature: 3 }),
    ];

    await Promise.all(reports.map(report => t.engine.pipeline.ingest(report)));
    await t.engine.publisher.flush();

    const writesFor = (station_id: string) =>
      t.store.writes.filter(write => write.station_id === station_id).map(write => write.fields.temperature);
    expect(writesFor('alpha')).toEqual([1, 2, 3]);
    expect(writesFor('bravo')).toEqual([10, 20]);
    expect(t.bus.valuesFor('weather/alpha/')).toEqual([1, 2, 3]);
    expect(t.bus.valuesFor('weather/bravo/')).toEqual([10, 20]);
  });

  it('should not let a bad report affect other reports in a batch', async () => {
    const result = await t.engine.pipeline.ingestBatch([
      genericReport('alpha', NOW - 1000, { temperature: 1 }),
      genericReport('ghost', NOW - 1000, { temperature: 2 }),
      genericReport('bravo', NOW - 1000, { temperature: 3 }),
      genericReport('alpha', NOW - 500, { temperature: 'hot' }),
    ]);

    expect(result).toMatchObject({ accepted_count: 2, dropped_count: 1, failed_count: 1 });
    expect(result.errors).toEqual([
      { index: 1, station_id: 'ghost', code: 'UNKNOWN_STATION', message: "Station 'ghost' is not registered" },
      { index: 3, station_id: 'alpha', code: 'MALFORMED_REPORT', message: "Field 'temperature' must be a finite number" },
    ]);
    expect(t.store.writes.map(write => write.station_id)).toEqual(['alpha', 'bravo']);
  });

  it('should never serve a stale aggregate after a write', async () => {
    const query = {
      station_ids: ['alpha'],
      fields: ['temperature'],
      start: NOW - HOUR,
      end: NOW,
      interval_ms: HOUR,
      aggregation: 'avg' as const,
    };

    await t.engine.pipeline.ingest(genericReport('alpha', NOW - 120_000, { temperature: 10 }));
    expect((await t.engine.aggregation.query(query)).window.buckets[0].values.temperature).toBe(10);

    await t.engine.pipeline.ingest(genericReport('alpha', NOW - 60_000, { temperature: 20 }));
    expect((await t.engine.aggregation.query(query)).window.buckets[0].values.temperature).toBe(15);
  });

  it('should keep the newest measurement as latest when a tolerated late report arrives', async () => {
    await t.engine.pipeline.ingest(genericReport('alpha', NOW - 1000, { temperature: 5 }));
    await t.engine.pipeline.ingest(genericReport('alpha', NOW - 10_000, { temperature: 4 }));

    const latest = await t.engine.aggregation.latest('alpha');
    expect(latest?.timestamp).toBe(NOW - 1000);
    expect(t.store.latestCalls).toBe(0);
    expect(t.store.writes).toHaveLength(2);
  });

  it('should evaluate alert rules and publish their events', async () => {
    await t.engine.rules.registerRule({ id: 'heat', station_id: 'alpha', condition: 'temperature > 30' });

    const outcome = await t.engine.pipeline.ingest(genericReport('alpha', NOW - 1000, { temperature: 35 }));
    await t.engine.publisher.flush();

    expect(outcome.alerts).toHaveLength(1);
    expect(outcome.alerts[0]).toMatchObject({ event_id: 'evt-1', transition: 'triggered', observed_value: 35 });
    expect(t.bus.topics()).toEqual(['weather/alpha/temperature', 'weather/alerts/heat']);
  });

  it('should leave data and alert state unchanged when the same report is ingested again', async () => {
    await t.engine.rules.registerRule({
      id: 'heat',
      station_id: 'alpha',
      condition: 'temperature > 30',
      suppression: { max_triggers: 1, cooldown_ms: 60_000 },
    });
    const report = genericReport('alpha', NOW - 1000, { temperature: 35 });

    const first = await t.engine.pipeline.ingest(report);
    const before = t.engine.rules.getRuleState('heat').stations;
    const second = await t.engine.pipeline.ingest(report);

    expect(first.alerts.map(event => event.transition)).toEqual(['triggered']);
    expect(second.alerts).toEqual([]);
    expect(t.engine.rules.getRuleState('heat').stations).toEqual(before);
    expect(before[0]).toMatchObject({ current_status: 'Triggered', window_triggers: 1 });
    expect(await t.store.scan('alpha', NOW - HOUR, NOW)).toEqual([second.measurement]);
  });

  it('should surface store failures to the caller and recover afterwards', async () => {
    t.store.failWith = new Error('connection refused');

    const error = await captureRejection(t.engine.pipeline.ingest(genericReport('alpha', NOW - 1000, { temperature: 1 })));
    expect(error.code).toBe('BACKING_STORE_UNAVAILABLE');
    expect(t.engine.registry.lastAcceptedAt('alpha')).toBeUndefined();

    t.store.failWith = null;
    const outcome = await t.engine.pipeline.ingest(genericReport('alpha', NOW - 500, { temperature: 2 }));
    expect(outcome.measurement.fields.temperature).toBe(2);
  });

  it('should accept reports even when the bus is down', async () => {
    t.bus.failAlways = true;

    const outcome = await t.engine.pipeline.ingest(genericReport('alpha', NOW - 1000, { temperature: 1 }));
    await t.engine.publisher.flush();

    expect(outcome.published).toBe(true);
    expect(t.engine.publisher.stats().delivery_failures).toBe(1);
  });
});
