import { IngestionNormalizer } from '@/services/ingestion-normalizer.service';
import { InMemoryStationRegistry } from '@/services/station-registry.service';
import { NOW, captureError, createTestRegistry, genericReport } from '../helpers/fixtures';

const SKEW = 5 * 60 * 1000;

describe('IngestionNormalizer', () => {
  let registry: InMemoryStationRegistry;
  let normalizer: IngestionNormalizer;

  beforeEach(() => {
    registry = createTestRegistry();
    normalizer = new IngestionNormalizer(registry, { clockSkewToleranceMs: SKEW, now: () => NOW });
  });

  describe('generic reports', () => {
    it('should produce a canonical measurement', () => {
      const result = normalizer.normalize(
        genericReport('alpha', '2026-03-01T11:59:00Z', { temperature: 21.5, humidity: 40 }),
      );

      expect(result).toEqual({
        station_id: 'alpha',
        timestamp: NOW - 60_000,
        fields: { temperature: 21.5, humidity: 40 },
        provenance: 'generic',
      });
      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.fields)).toBe(true);
    });

    it('should return equal measurements for the same report', () => {
      const report = genericReport('alpha', NOW - 1000, { temperature: 3.25 });

      expect(normalizer.normalize(report)).toEqual(normalizer.normalize(report));
    });

    it('should accept epoch milliseconds given as a string', () => {
      const result = normalizer.normalize(genericReport('alpha', String(NOW - 5000), { temperature: 1 }));
      expect(result.timestamp).toBe(NOW - 5000);
    });

    it('should reject non-numeric field values', () => {
      const error = captureError(() => normalizer.normalize(genericReport('alpha', NOW, { temperature: 'warm' })));
      expect(error.code).toBe('MALFORMED_REPORT');
      expect(error.details).toEqual({ field: 'temperature' });
    });

    it('should reject field names that cannot be used as topic segments', () => {
      const error = captureError(() => normalizer.normalize(genericReport('alpha', NOW, { 'air temp': 4 })));
      expect(error.code).toBe('MALFORMED_REPORT');
    });

    it('should reject reports without fields', () => {
      const error = captureError(() => normalizer.normalize(genericReport('alpha', NOW, {})));
      expect(error.code).toBe('MALFORMED_REPORT');
      expect(error.message).toBe('Report carries no numeric fields');
    });

    it('should reject payloads missing the station id', () => {
      const error = captureError(() =>
        normalizer.normalize({ source: 'generic', payload: { timestamp: NOW, fields: { temperature: 1 } } }),
      );
      expect(error.code).toBe('MALFORMED_REPORT');
    });

    it('should reject malformed station ids before consulting the registry', () => {
      const error = captureError(() => normalizer.normalize(genericReport('bad id', NOW, { temperature: 1 })));
      expect(error.code).toBe('MALFORMED_REPORT');
    });

    it('should report unknown stations', () => {
      const error = captureError(() => normalizer.normalize(genericReport('ghost', NOW, { temperature: 1 })));
      expect(error.code).toBe('UNKNOWN_STATION');
      expect(error.details).toEqual({ station_id: 'ghost' });
    });

    it('should reject unparseable timestamps', () => {
      const error = captureError(() => normalizer.normalize(genericReport('alpha', 'yesterday', { temperature: 1 })));
      expect(error.code).toBe('MALFORMED_REPORT');
    });
  });

  describe('clock skew', () => {
    it('should accept timestamps up to the tolerance ahead of now', () => {
      expect(normalizer.normalize(genericReport('alpha', NOW + SKEW, { temperature: 1 })).timestamp).toBe(NOW + SKEW);
    });

    it('should reject timestamps beyond the tolerance ahead of now', () => {
      const error = captureError(() => normalizer.normalize(genericReport('alpha', NOW + SKEW + 1, { temperature: 1 })));
      expect(error.code).toBe('MALFORMED_REPORT');
      expect(error.details?.reason).toBe('future');
    });

    it('should reject timestamps too far behind the latest accepted one', () => {
      registry.markAccepted('alpha', NOW);

      const error = captureError(() => normalizer.normalize(genericReport('alpha', NOW - SKEW - 1, { temperature: 1 })));
      expect(error.code).toBe('MALFORMED_REPORT');
      expect(error.details?.reason).toBe('stale');

      expect(normalizer.normalize(genericReport('alpha', NOW - SKEW, { temperature: 1 })).timestamp).toBe(NOW - SKEW);
    });
  });

  describe('weewx records', () => {
    it('should convert US units to metric', () => {
      const result = normalizer.normalize({
        source: 'weewx',
        payload: {
          station: 'alpha',
          dateTime: NOW / 1000 - 60,
          usUnits: 1,
          outTemp: 50,
          barometer: 30,
          windSpeed: 10,
          rain: 0.1,
          outHumidity: 62,
          software_version: '5.1.0',
        },
      });

      expect(result.station_id).toBe('alpha');
      expect(result.timestamp).toBe(NOW - 60_000);
      expect(result.provenance).toBe('weewx/5.1.0');
      expect(result.fields.temperature).toBeCloseTo(10, 10);
      expect(result.fields.pressure).toBeCloseTo(1015.917, 6);
      expect(result.fields.wind_speed).toBeCloseTo(4.4704, 10);
      expect(result.fields.rainfall).toBeCloseTo(2.54, 10);
      expect(result.fields.humidity).toBe(62);
    });

    it('should convert the METRIC unit system to m/s and mm', () => {
      const result = normalizer.normalize({
        source: 'weewx',
        payload: { station: 'alpha', dateTime: NOW / 1000, usUnits: 16, outTemp: 12.5, windSpeed: 36, rain: 1.2 },
      });

      expect(result.fields).toEqual({ temperature: 12.5, wind_speed: 10, rainfall: 12 });
      expect(result.provenance).toBe('weewx');
    });

    it('should leave METRICWX values untouched', () => {
      const result = normalizer.normalize({
        source: 'weewx',
        payload: { station: 'alpha', dateTime: NOW / 1000, usUnits: 17, windSpeed: 3.5 },
      });
      expect(result.fields).toEqual({ wind_speed: 3.5 });
    });
  });

  describe('ecowitt uploads', () => {
    it('should resolve the station from the passkey', () => {
      const result = normalizer.normalize({
        source: 'ecowitt',
        payload: {
          PASSKEY: 'test-passkey',
          stationtype: 'GW1000',
          dateutc: '2026-03-01 11:58:00',
          tempf: '68',
          humidity: '55',
        },
      });

      expect(result).toEqual({
        station_id: 'bravo',
        timestamp: NOW - 120_000,
        fields: { temperature: 20, humidity: 55 },
        provenance: 'ecowitt/GW1000',
      });
    });

    it('should use the receive time when the gateway sends dateutc=now', () => {
      const result = normalizer.normalize({
        source: 'ecowitt',
        payload: { PASSKEY: 'test-passkey', dateutc: 'now', tempf: '32' },
        received_at: NOW - 1000,
      });

      expect(result.timestamp).toBe(NOW - 1000);
      expect(result.fields).toEqual({ temperature: 0 });
    });

    it('should report an unregistered passkey as an unknown station', () => {
      const error = captureError(() =>
        normalizer.normalize({ source: 'ecowitt', payload: { PASSKEY: 'other-passkey', dateutc: 'now', tempf: '50' } }),
      );
      expect(error.code).toBe('UNKNOWN_STATION');
    });
  });

  describe('extractStationId', () => {
    it('should read the station id of each source', () => {
      expect(normalizer.extractStationId(genericReport('alpha', NOW, {}))).toBe('alpha');
      expect(normalizer.extractStationId({ source: 'weewx', payload: { station: 'alpha' } })).toBe('alpha');
      expect(normalizer.extractStationId({ source: 'ecowitt', payload: { PASSKEY: 'test-passkey' } })).toBe('bravo');
    });

    it('should return null when no station can be read', () => {
      expect(normalizer.extractStationId({ source: 'generic', payload: null })).toBeNull();
      expect(normalizer.extractStationId({ source: 'generic', payload: { station_id: 7 } })).toBeNull();
    });
  });
});
