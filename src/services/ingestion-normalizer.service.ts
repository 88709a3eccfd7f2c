import { z } from 'zod';
import { Measurement, RawReport, ReportSource } from '@/types/measurement.types';
import { StationRegistry } from './station-registry.service';
import { EngineError, malformedReport } from '@/utils/errors';
import { parseTimestamp } from '@/utils/time-window.utils';
import { IDENTIFIER_PATTERN, PROVENANCE } from '@/config/constants';

type UnitKind = 'temperature' | 'pressure' | 'speed' | 'length' | 'none';

interface FieldMapping {
  field: string;
  unit: UnitKind;
}

// weewx archive record keys → canonical field names
const WEEWX_FIELDS: Record<string, FieldMapping> = {
  outTemp: { field: 'temperature', unit: 'temperature' },
  outHumidity: { field: 'humidity', unit: 'none' },
  barometer: { field: 'pressure', unit: 'pressure' },
  windSpeed: { field: 'wind_speed', unit: 'speed' },
  windGust: { field: 'wind_gust', unit: 'speed' },
  windDir: { field: 'wind_direction', unit: 'none' },
  rain: { field: 'rainfall', unit: 'length' },
  rainRate: { field: 'rain_rate', unit: 'length' },
  dewpoint: { field: 'dewpoint', unit: 'temperature' },
  UV: { field: 'uv_index', unit: 'none' },
  radiation: { field: 'solar_radiation', unit: 'none' },
};

// Ecowitt custom-server upload keys (always imperial) → canonical field names
const ECOWITT_FIELDS: Record<string, FieldMapping> = {
  tempf: { field: 'temperature', unit: 'temperature' },
  humidity: { field: 'humidity', unit: 'none' },
  baromrelin: { field: 'pressure', unit: 'pressure' },
  windspeedmph: { field: 'wind_speed', unit: 'speed' },
  windgustmph: { field: 'wind_gust', unit: 'speed' },
  winddir: { field: 'wind_direction', unit: 'none' },
  rainratein: { field: 'rain_rate', unit: 'length' },
  dailyrainin: { field: 'rainfall', unit: 'length' },
  solarradiation: { field: 'solar_radiation', unit: 'none' },
  uv: { field: 'uv_index', unit: 'none' },
};

// weewx unit systems: 1 = US, 16 = METRIC, 17 = METRICWX (already canonical)
const WEEWX_US = 1;
const WEEWX_METRIC = 16;

type UnitConverter = (value: number) => number;

const IMPERIAL_TO_METRIC: Record<UnitKind, UnitConverter> = {
  temperature: value => ((value - 32) * 5) / 9,
  pressure: value => value * 33.8639,
  speed: value => value * 0.44704,
  length: value => value * 25.4,
  none: value => value,
};

const METRIC_TO_METRICWX: Record<UnitKind, UnitConverter> = {
  temperature: value => value,
  pressure: value => value,
  speed: value => value / 3.6,
  length: value => value * 10,
  none: value => value,
};

const IDENTITY: Record<UnitKind, UnitConverter> = {
  temperature: value => value,
  pressure: value => value,
  speed: value => value,
  length: value => value,
  none: value => value,
};

const genericSchema = z.object({
  station_id: z.string(),
  timestamp: z.union([z.string(), z.number()]),
  fields: z.record(z.unknown()),
  software: z.string().optional(),
});

const weewxSchema = z
  .object({
    station: z.string(),
    dateTime: z.number(),
    usUnits: z.number().optional(),
    software_version: z.string().optional(),
  })
  .passthrough();

const ecowittSchema = z
  .object({
    PASSKEY: z.string(),
    stationtype: z.string().optional(),
    dateutc: z.string(),
  })
  .passthrough();

export interface NormalizerOptions {
  clockSkewToleranceMs: number;
  now?: () => number;
}

interface Candidate {
  station_id: string;
  timestamp: number;
  fields: Record<string, number>;
  provenance: string;
}

const describeIssues = (error: z.ZodError): string =>
  error.issues.map(issue => `${issue.path.join('.') || 'payload'}: ${issue.message}`).join('; ');

/**
 * Turns station-software payloads into canonical, frozen Measurements.
 * Pure apart from reading the station registry: it never writes to the cache or store.
 */
export class IngestionNormalizer {
  private readonly now: () => number;

  constructor(
    private readonly registry: StationRegistry,
    private readonly options: NormalizerOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  normalize(raw: RawReport): Measurement {
    const candidate = this.parse(raw);

    if (!IDENTIFIER_PATTERN.test(candidate.station_id)) {
      throw malformedReport(`Invalid station id '${candidate.station_id}'`);
    }

    if (!this.registry.isKnown(candidate.station_id)) {
      throw new EngineError('UNKNOWN_STATION', `Station '${candidate.station_id}' is not registered`, {
        station_id: candidate.station_id,
      });
    }

    this.checkTimestamp(candidate.station_id, candidate.timestamp);

    if (Object.keys(candidate.fields).length === 0) {
      throw malformedReport('Report carries no numeric fields', { station_id: candidate.station_id });
    }

    return Object.freeze({
      station_id: candidate.station_id,
      timestamp: candidate.timestamp,
      fields: Object.freeze({ ...candidate.fields }),
      provenance: candidate.provenance,
    });
  }

  // Station id used to route a report onto its station's sequential path, if one can be read
  extractStationId(raw: RawReport): string | null {
    const payload = raw.payload;
    if (typeof payload !== 'object' || payload === null) {
      return null;
    }
    switch (raw.source) {
      case 'generic':
        return 'station_id' in payload && typeof payload.station_id === 'string' ? payload.station_id : null;
      case 'weewx':
        return 'station' in payload && typeof payload.station === 'string' ? payload.station : null;
      case 'ecowitt':
        return 'PASSKEY' in payload && typeof payload.PASSKEY === 'string'
          ? this.registry.resolvePasskey(payload.PASSKEY)
          : null;
      default:
        return null;
    }
  }

  private parse(raw: RawReport): Candidate {
    switch (raw.source) {
      case 'generic':
        return this.parseGeneric(raw.payload);
      case 'weewx':
        return this.parseWeewx(raw.payload);
      case 'ecowitt':
        return this.parseEcowitt(raw.payload, raw.received_at);
      default:
        return this.unsupported(raw.source);
    }
  }

  private unsupported(source: never): never {
    throw malformedReport(`Unsupported report source '${String(source)}'`);
  }

  private parseGeneric(payload: unknown): Candidate {
    const result = genericSchema.safeParse(payload);
    if (!result.success) {
      throw malformedReport(`Malformed generic report: ${describeIssues(result.error)}`);
    }
    const report = result.data;

    const fields: Record<string, number> = {};
    for (const [name, value] of Object.entries(report.fields)) {
      if (!IDENTIFIER_PATTERN.test(name)) {
        throw malformedReport(`Invalid field name '${name}'`, { field: name });
      }
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw malformedReport(`Field '${name}' must be a finite number`, { field: name });
      }
      fields[name] = value;
    }

    return {
      station_id: report.station_id,
      timestamp: this.requireTimestamp(report.timestamp),
      fields,
      provenance: report.software || PROVENANCE.GENERIC,
    };
  }

  private parseWeewx(payload: unknown): Candidate {
    const result = weewxSchema.safeParse(payload);
    if (!result.success) {
      throw malformedReport(`Malformed weewx record: ${describeIssues(result.error)}`);
    }
    const record = result.data;

    const converters =
      record.usUnits === WEEWX_US ? IMPERIAL_TO_METRIC : record.usUnits === WEEWX_METRIC ? METRIC_TO_METRICWX : IDENTITY;

    return {
      station_id: record.station,
      timestamp: this.requireTimestamp(record.dateTime * 1000),
      fields: mapFields(record, WEEWX_FIELDS, converters),
      provenance: record.software_version ? `${PROVENANCE.WEEWX}/${record.software_version}` : PROVENANCE.WEEWX,
    };
  }

  private parseEcowitt(payload: unknown, received_at?: number): Candidate {
    const result = ecowittSchema.safeParse(payload);
    if (!result.success) {
      throw malformedReport(`Malformed ecowitt upload: ${describeIssues(result.error)}`);
    }
    const upload = result.data;

    const station_id = this.registry.resolvePasskey(upload.PASSKEY);
    if (!station_id) {
      throw new EngineError('UNKNOWN_STATION', 'No station registered for this passkey');
    }

    // Gateways without a clock send dateutc=now
    const timestamp =
      upload.dateutc === 'now'
        ? received_at ?? this.now()
        : this.requireTimestamp(`${upload.dateutc.trim().replace(' ', 'T')}Z`);

    return {
      station_id,
      timestamp,
      fields: mapFields(upload, ECOWITT_FIELDS, IMPERIAL_TO_METRIC),
      provenance: upload.stationtype ? `${PROVENANCE.ECOWITT}/${upload.stationtype}` : PROVENANCE.ECOWITT,
    };
  }

  private requireTimestamp(value: string | number): number {
    const timestamp = parseTimestamp(value);
    if (timestamp === null) {
      throw malformedReport(`Unparseable timestamp '${String(value)}'`);
    }
    return timestamp;
  }

  private checkTimestamp(station_id: string, timestamp: number): void {
    const tolerance = this.options.clockSkewToleranceMs;

    if (timestamp > this.now() + tolerance) {
      throw malformedReport('Timestamp is in the future', { station_id, timestamp, reason: 'future' });
    }

    const watermark = this.registry.lastAcceptedAt(station_id);
    if (watermark !== undefined && timestamp < watermark - tolerance) {
      throw malformedReport('Timestamp is older than the clock-skew tolerance allows', {
        station_id,
        timestamp,
        last_accepted: watermark,
        reason: 'stale',
      });
    }
  }
}

function mapFields(
  payload: Record<string, unknown>,
  mapping: Record<string, FieldMapping>,
  converters: Record<UnitKind, UnitConverter>,
): Record<string, number> {
  const fields: Record<string, number> = {};

  for (const [key, { field, unit }] of Object.entries(mapping)) {
    const value = payload[key];
    if (value === undefined || value === null || value === '') {
      continue;
    }
    const numeric = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : Number.NaN;
    if (!Number.isFinite(numeric)) {
      throw malformedReport(`Field '${key}' must be numeric`, { field: key });
    }
    fields[field] = converters[unit](numeric);
  }

  return fields;
}

export const SUPPORTED_SOURCES: ReportSource[] = ['generic', 'weewx', 'ecowitt'];
