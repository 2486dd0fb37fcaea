/**
 * Core type definitions for iCalendar property values (RFC 5545)
 */

// ── Value Types ────────────────────────────────────────────────────────────

/** All value types defined in RFC 5545 section 3.3, plus the helper types */
export type ValueTypeName =
  | 'binary'
  | 'boolean'
  | 'cal-address'
  | 'date'
  | 'date-time'
  | 'duration'
  | 'float'
  | 'integer'
  | 'period'
  | 'recur'
  | 'text'
  | 'time'
  | 'uri'
  | 'utc-offset'
  // not value types on their own, but used by GEO, EXDATE/RDATE and raw values
  | 'geo'
  | 'inline'
  | 'date-time-list';

/** Discriminants of the value classes (registry names plus RECUR rule parts) */
export type ValueKind = ValueTypeName | 'weekday' | 'frequency';

/** FREQ rule part values (RFC 5545 §3.3.10) */
export type Frequency =
  | 'SECONDLY'
  | 'MINUTELY'
  | 'HOURLY'
  | 'DAILY'
  | 'WEEKLY'
  | 'MONTHLY'
  | 'YEARLY';

/** Two-letter weekday codes used by BYDAY and WKST */
export type WeekdayCode = 'SU' | 'MO' | 'TU' | 'WE' | 'TH' | 'FR' | 'SA';

// ── Temporal Values ────────────────────────────────────────────────────────

/** A calendar date without time (RFC 5545 §3.3.4) */
export interface CalendarDate {
  readonly kind: 'date';
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

/**
 * A time of day (RFC 5545 §3.3.12).
 * `tzid` is absent for floating time and `'UTC'` for UTC time.
 */
export interface TimeOfDay {
  readonly kind: 'time';
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly tzid?: string;
}

/**
 * A calendar date and time of day (RFC 5545 §3.3.5).
 * Without `tzid` the moment is zone-naive ("floating").
 */
export interface CalendarMoment {
  readonly kind: 'date-time';
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly tzid?: string;
}

/**
 * A signed span of time (RFC 5545 §3.3.6), normalized so that
 * hours < 24, minutes < 60 and seconds < 60. Zero has `sign: 1`.
 */
export interface SignedDuration {
  readonly kind: 'duration';
  readonly sign: 1 | -1;
  readonly days: number;
  readonly hours: number;
  readonly minutes: number;
  readonly seconds: number;
}

/** Any value the temporal dispatcher can encode */
export type TemporalNative = CalendarDate | TimeOfDay | CalendarMoment | SignedDuration;

/** Start or end of a PERIOD */
export type PeriodBound = CalendarDate | CalendarMoment;

/** PERIOD value: start plus either an explicit end or a duration */
export type PeriodNative = readonly [start: PeriodBound, endOrDuration: PeriodBound | SignedDuration];

// ── Structured Value Types ─────────────────────────────────────────────────

/** GEO value: latitude;longitude (RFC 5545 §3.8.1.6) */
export interface GeoCoordinates {
  readonly latitude: number;
  readonly longitude: number;
}

/** BYDAY / WKST entry: weekday with an optional signed ordinal (e.g. -1FR) */
export interface Weekday {
  readonly weekday: WeekdayCode;
  readonly ordinal?: number;
}

/** Any value a RECUR rule part may hold */
export type RecurPart = Frequency | Weekday | number | string | TemporalNative;

// ── Diagnostics ────────────────────────────────────────────────────────────

/** A value that could not be decoded and was kept as raw text */
export interface DecodeWarning {
  property: string;
  valueType: ValueTypeName;
  message: string;
}
