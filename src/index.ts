/**
 * ical-value-types: RFC 5545 (iCalendar) property value types
 *
 * Strict parsing and generation of single property values: dates and
 * times with zone handling, durations, periods, recurrence rules, UTC
 * offsets, calendar addresses, binary data and the scalar types.
 *
 * @example
 * ```ts
 * import { RecurValue, DateTimeValue, decodeValue, dateTime } from 'ical-value-types';
 *
 * // Decode by type
 * const rule = RecurValue.fromIcal('BYDAY=MO;FREQ=DAILY');
 * rule.toIcal();                                  // 'FREQ=DAILY;BYDAY=MO'
 *
 * // Encode a native value
 * new DateTimeValue(dateTime(2023, 1, 1, 12, 0, 0, 'UTC')).toIcal(); // '20230101T120000Z'
 *
 * // Decode by property name
 * const start = decodeValue('DTSTART', '20230101T120000', { TZID: 'America/New_York' });
 * start.params.get('TZID');                       // 'America/New_York'
 * ```
 */

// ── Value base and errors ──────────────────────────────────────────────────
export { PropertyValue } from './value.js';
export type { ValueType } from './value.js';
export { InvalidValueError } from './error.js';

// ── All value classes ──────────────────────────────────────────────────────
export {
  // Scalars (RFC 5545 §3.3)
  BinaryValue,
  BooleanValue,
  CalAddressValue,
  FloatValue,
  IntegerValue,
  TextValue,
  UriValue,
  UtcOffsetValue,

  // Helpers
  GeoValue,
  InlineValue,
} from './scalar.js';

export { DateValue, DateTimeValue, TimeValue, DurationValue } from './temporal.js';
export { DateTimeListValue, PeriodValue } from './composite.js';
export { TemporalValue, temporal, decodeTemporal } from './dispatch.js';
export type { TemporalPropertyValue } from './dispatch.js';
export { RecurValue, WeekdayValue, FrequencyValue, CANONICAL_ORDER, partType } from './recur.js';
export type { RecurRule, RecurInit } from './recur.js';

// ── Registry ───────────────────────────────────────────────────────────────
export { TypesRegistry, types, VALUE_TYPES, isValueTypeName } from './registry.js';
export type { AnyValue, LenientResult } from './registry.js';

// ── Native values ──────────────────────────────────────────────────────────
export {
  date,
  time,
  dateTime,
  duration,
  durationFromSeconds,
  weekday,
  geo,
  FREQUENCIES,
  WEEKDAYS,
} from './native.js';
export type { DurationParts } from './native.js';

// ── Types ──────────────────────────────────────────────────────────────────
export type {
  ValueTypeName,
  ValueKind,
  Frequency,
  WeekdayCode,
  CalendarDate,
  TimeOfDay,
  CalendarMoment,
  SignedDuration,
  TemporalNative,
  PeriodBound,
  PeriodNative,
  GeoCoordinates,
  Weekday,
  RecurPart,
  DecodeWarning,
} from './types.js';

// ── Primitives (for advanced usage) ────────────────────────────────────────
export { escapeText, unescapeText, needsParamQuoting, quoteParamValue } from './escape.js';
export { CaselessMap, Parameters } from './caseless.js';
export type { CaselessInit, ReadonlyCaselessMap, ReadonlyParameters } from './caseless.js';
export { toText, DEFAULT_ENCODING } from './text.js';
export { tzidOf, isUtc, isKnownZone, fromDateTime, toDateTime, UTC } from './timezone.js';

// ── Convenience functions ──────────────────────────────────────────────────

import type { CaselessInit } from './caseless.js';
import { types } from './registry.js';
import type { AnyValue } from './registry.js';

/**
 * Decode a property or parameter value by name, using the default registry.
 * @throws InvalidValueError if the text does not match the value type
 */
export function decodeValue(name: string, text: string, params?: CaselessInit<string>): AnyValue {
  return types.decode(name, text, params);
}

/**
 * Encode a native value for the named property, using the default registry.
 * @throws InvalidValueError if the value does not fit the property's type
 */
export function encodeValue(name: string, value: unknown): string {
  return types.encode(name, value);
}
