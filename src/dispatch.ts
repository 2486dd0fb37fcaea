/**
 * Picks the temporal value type for a native value or a piece of text.
 */

import type { CaselessInit } from './caseless.js';
import { InvalidValueError, describeValue } from './error.js';
import { asTemporal } from './native.js';
import { DateTimeValue, DateValue, DurationValue, TimeValue } from './temporal.js';
import type { TemporalNative } from './types.js';
import type { ValueType } from './value.js';

export type TemporalPropertyValue = DateValue | DateTimeValue | TimeValue | DurationValue;

/** Wrap a native date, date-time, time or duration in its value type */
export function temporal(value: TemporalNative, params?: CaselessInit<string>): TemporalPropertyValue {
  switch (value.kind) {
    case 'date-time':
      return new DateTimeValue(value, params);
    case 'date':
      return new DateValue(value, params);
    case 'time':
      return new TimeValue(value, params);
    case 'duration':
      return new DurationValue(value, params);
    default:
      throw new InvalidValueError(describeValue(value), 'temporal', 'unsupported native type');
  }
}

/**
 * Decode a duration, date-time, date or time, in that order.
 * Text starting with `P` or `-P` can only be a duration.
 */
export function decodeTemporal(text: string, tzid?: string, params?: CaselessInit<string>): TemporalPropertyValue {
  const upper = text.toUpperCase();
  if (upper.startsWith('P') || upper.startsWith('-P') || upper.startsWith('+P')) {
    return DurationValue.fromIcal(text, tzid, params);
  }
  const failures: InvalidValueError[] = [];
  for (const decode of [
    (t: string) => DateTimeValue.fromIcal(t, tzid, params),
    (t: string) => DateValue.fromIcal(t, tzid, params),
    (t: string) => TimeValue.fromIcal(t, tzid, params),
  ]) {
    try {
      return decode(text);
    } catch (err) {
      if (!(err instanceof InvalidValueError)) throw err;
      failures.push(err);
    }
  }
  throw new InvalidValueError(text, 'date-time, date or time', 'no temporal type matched', {
    cause: new AggregateError(failures),
  });
}

/** DATE, DATE-TIME, TIME and DURATION as a single value type */
export const TemporalValue = {
  fromIcal: decodeTemporal,

  fromNative(value: unknown, params?: CaselessInit<string>): TemporalPropertyValue {
    const native = asTemporal(value);
    if (native === undefined) {
      throw new InvalidValueError(describeValue(value), 'temporal', 'unsupported native type');
    }
    return temporal(native, params);
  },
} satisfies ValueType<TemporalPropertyValue>;
