import { TimeRange } from '@/types/aggregation.types';

export interface Bucket {
  index: number;
  start: number;
  end: number;
}

export const countBuckets = (range: TimeRange, interval_ms: number): number =>
  Math.ceil((range.end - range.start) / interval_ms);

// Bucket i covers [start + i*interval, start + (i+1)*interval), the last one clipped at range.end
export const getBucket = (range: TimeRange, interval_ms: number, index: number): Bucket => {
  const start = range.start + index * interval_ms;
  const end = Math.min(start + interval_ms, range.end);
  return { index, start, end };
};

export const isWithinRange = (timestamp: number, range: TimeRange): boolean =>
  timestamp >= range.start && timestamp < range.end;

const DURATION_PATTERN =
  /^P(?:(\d+(?:\.\d+)?)W)?(?:(\d+(?:\.\d+)?)D)?(?:T(?:(\d+(?:\.\d+)?)H)?(?:(\d+(?:\.\d+)?)M)?(?:(\d+(?:\.\d+)?)S)?)?$/;

/**
 * Parses the fixed-length subset of ISO 8601 durations (weeks, days, hours,
 * minutes, seconds) into milliseconds. Years and months have no fixed length
 * and are not accepted. Returns null for anything unparseable.
 */
export const parseIsoDuration = (value: string): number | null => {
  const match = DURATION_PATTERN.exec(value.trim().toUpperCase());
  if (!match || value.trim().toUpperCase() === 'P' || value.trim().toUpperCase().endsWith('T')) {
    return null;
  }

  const [, weeks, days, hours, minutes, seconds] = match.map(part => (part === undefined ? 0 : Number(part)));
  const ms = ((((weeks * 7 + days) * 24 + hours) * 60 + minutes) * 60 + seconds) * 1000;
  return Math.round(ms);
};

// Accepts ISO 8601 timestamps or epoch milliseconds
export const parseTimestamp = (value: string | number): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  const trimmed = value.trim();
  if (/^-?\d+$/.test(trimmed)) {
    return Number(trimmed);
  }
  const parsed = Date.parse(trimmed);
  return Number.isNaN(parsed) ? null : parsed;
};
