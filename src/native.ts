/**
 * Constructors and runtime guards for native values.
 *
 * The constructors return frozen objects and leave out absent optional
 * fields, so two equal values are also deep-equal.
 */

import type {
  CalendarDate,
  CalendarMoment,
  Frequency,
  GeoCoordinates,
  SignedDuration,
  TemporalNative,
  TimeOfDay,
  Weekday,
  WeekdayCode,
} from './types.js';

export const FREQUENCIES: readonly Frequency[] = Object.freeze([
  'SECONDLY',
  'MINUTELY',
  'HOURLY',
  'DAILY',
  'WEEKLY',
  'MONTHLY',
  'YEARLY',
]);

export const WEEKDAYS: readonly WeekdayCode[] = Object.freeze(['SU', 'MO', 'TU', 'WE', 'TH', 'FR', 'SA']);

// ── Constructors ───────────────────────────────────────────────────────────

export function date(year: number, month: number, day: number): CalendarDate {
  return Object.freeze({ kind: 'date', year, month, day });
}

export function time(hour: number, minute: number, second: number, tzid?: string): TimeOfDay {
  const value: TimeOfDay = { kind: 'time', hour, minute, second };
  return Object.freeze(tzid === undefined ? value : { ...value, tzid });
}

export function dateTime(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  tzid?: string,
): CalendarMoment {
  const value: CalendarMoment = { kind: 'date-time', year, month, day, hour, minute, second };
  return Object.freeze(tzid === undefined ? value : { ...value, tzid });
}

export interface DurationParts {
  weeks?: number;
  days?: number;
  hours?: number;
  minutes?: number;
  seconds?: number;
}

/**
 * Build a normalized duration. Parts may be negative; the sign of the total
 * decides the sign of the result.
 *
 * @example duration({ hours: 36 }) // { sign: 1, days: 1, hours: 12, ... }
 */
export function duration(parts: DurationParts): SignedDuration {
  const { weeks = 0, days = 0, hours = 0, minutes = 0, seconds = 0 } = parts;
  const total = (((weeks * 7 + days) * 24 + hours) * 60 + minutes) * 60 + seconds;
  return durationFromSeconds(total);
}

export function durationFromSeconds(total: number): SignedDuration {
  const sign = total < 0 ? -1 : 1;
  let rest = Math.abs(total);
  const days = Math.floor(rest / 86400);
  rest -= days * 86400;
  const hours = Math.floor(rest / 3600);
  rest -= hours * 3600;
  const minutes = Math.floor(rest / 60);
  return Object.freeze({ kind: 'duration', sign, days, hours, minutes, seconds: rest - minutes * 60 });
}

export function weekday(code: WeekdayCode, ordinal?: number): Weekday {
  return Object.freeze(ordinal === undefined ? { weekday: code } : { weekday: code, ordinal });
}

export function geo(latitude: number, longitude: number): GeoCoordinates {
  return Object.freeze({ latitude, longitude });
}

// ── Guards ─────────────────────────────────────────────────────────────────

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

function optionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === 'string';
}

export function isFrequency(value: unknown): value is Frequency {
  return typeof value === 'string' && FREQUENCIES.some(f => f === value);
}

export function isWeekdayCode(value: unknown): value is WeekdayCode {
  return typeof value === 'string' && WEEKDAYS.some(w => w === value);
}

/** Rebuild a temporal native from an untyped object, or undefined if it is none */
export function asTemporal(value: unknown): TemporalNative | undefined {
  if (!isRecord(value)) return undefined;
  const { kind, year, month, day, hour, minute, second, tzid } = value;
  switch (kind) {
    case 'date':
      if (isInteger(year) && isInteger(month) && isInteger(day)) return date(year, month, day);
      return undefined;
    case 'time':
      if (isInteger(hour) && isInteger(minute) && isInteger(second) && optionalString(tzid)) {
        return time(hour, minute, second, tzid);
      }
      return undefined;
    case 'date-time':
      if (
        isInteger(year) && isInteger(month) && isInteger(day) &&
        isInteger(hour) && isInteger(minute) && isInteger(second) && optionalString(tzid)
      ) {
        return dateTime(year, month, day, hour, minute, second, tzid);
      }
      return undefined;
    case 'duration': {
      const { sign, days, hours, minutes, seconds } = value;
      if (
        (sign === 1 || sign === -1) &&
        isInteger(days) && isInteger(hours) && isInteger(minutes) && isInteger(seconds)
      ) {
        return duration({ days: sign * days, hours: sign * hours, minutes: sign * minutes, seconds: sign * seconds });
      }
      return undefined;
    }
    default:
      return undefined;
  }
}
