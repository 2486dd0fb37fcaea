/**
 * Date and time value types: RFC 5545 sections 3.3.4, 3.3.5, 3.3.6, 3.3.12
 *
 * DATE-TIME and TIME values keep their zone as a TZID parameter. Text input
 * may only be floating, end in `Z`, or be localized through a zone
 * identifier supplied by the caller; inline numeric offsets such as
 * `20230101T120000+0100` are rejected.
 */

import type { CaselessInit } from './caseless.js';
import { InvalidValueError, describeValue } from './error.js';
import { asTemporal, date, dateTime, duration, durationFromSeconds, time } from './native.js';
import { isKnownZone, isUtc, isValidDateTime, totalSeconds, tzidOf, UTC } from './timezone.js';
import type { CalendarDate, CalendarMoment, SignedDuration, TimeOfDay } from './types.js';
import { PropertyValue } from './value.js';

const DATE = /^(\d{4})(\d{2})(\d{2})$/;
const DATE_TIME = /^(\d{4})(\d{2})(\d{2})[Tt](\d{2})(\d{2})(\d{2})(.*)$/;
const TIME = /^(\d{2})(\d{2})(\d{2})(.*)$/;
const DURATION = /^([+-]?)P(?:(\d+)W|(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?)$/i;

// ── Date ───────────────────────────────────────────────────────────────────

/** DATE (§3.3.4): `YYYYMMDD` */
export class DateValue extends PropertyValue<CalendarDate> {
  readonly type = 'date' as const;

  constructor(value: CalendarDate, params?: CaselessInit<string>) {
    const { year, month, day } = value;
    if (year < 0 || year > 9999 || !isValidDateTime(year, month, day)) {
      throw new InvalidValueError(describeValue(value), 'date', 'not a valid calendar date');
    }
    super(date(year, month, day), { VALUE: 'DATE' }, params);
  }

  toIcal(): string {
    const { year, month, day } = this.value;
    return pad(year, 4) + pad(month) + pad(day);
  }

  static fromIcal(text: string, _tzid?: string, params?: CaselessInit<string>): DateValue {
    const m = DATE.exec(text);
    if (!m) throw new InvalidValueError(text, 'date', 'expected YYYYMMDD');
    const [, year = '', month = '', day = ''] = m;
    const fields = date(Number(year), Number(month), Number(day));
    if (!isValidDateTime(fields.year, fields.month, fields.day)) {
      throw new InvalidValueError(text, 'date', 'not a valid calendar date');
    }
    return new DateValue(fields, params);
  }

  static fromNative(value: unknown, params?: CaselessInit<string>): DateValue {
    const native = asTemporal(value);
    if (native?.kind === 'date') return new DateValue(native, params);
    throw new InvalidValueError(describeValue(value), 'date', 'expected a calendar date');
  }
}

// ── Date-Time ──────────────────────────────────────────────────────────────

/**
 * DATE-TIME (§3.3.5): `YYYYMMDDTHHMMSS[Z]`
 *
 * A moment without `tzid` is floating, `tzid: 'UTC'` is written with a
 * trailing `Z`, any other zone is written as local time plus TZID.
 */
export class DateTimeValue extends PropertyValue<CalendarMoment> {
  readonly type = 'date-time' as const;

  constructor(value: CalendarMoment, params?: CaselessInit<string>) {
    const { year, month, day, hour, minute, second } = value;
    const tzid = tzidOf(value);
    if (year < 0 || year > 9999 || !isValidDateTime(year, month, day, hour, minute, second)) {
      throw new InvalidValueError(describeValue(value), 'date-time', 'not a valid date and time');
    }
    if (tzid !== undefined && !isKnownZone(tzid)) {
      throw new InvalidValueError(describeValue(value), 'date-time', `unknown time zone ${tzid}`);
    }
    super(dateTime(year, month, day, hour, minute, second, tzid), zoneParams('DATE-TIME', tzid), params);
  }

  toIcal(): string {
    const { year, month, day, hour, minute, second, tzid } = this.value;
    return (
      pad(year, 4) + pad(month) + pad(day) + 'T' +
      pad(hour) + pad(minute) + pad(second) +
      (isUtc(tzid) ? 'Z' : '')
    );
  }

  /**
   * Decode `YYYYMMDDTHHMMSS[Z]`.
   * A known `tzid` localizes the wall-clock fields into that zone; an
   * unknown one is ignored.
   */
  static fromIcal(text: string, tzid?: string, params?: CaselessInit<string>): DateTimeValue {
    const m = DATE_TIME.exec(text);
    if (!m) throw new InvalidValueError(text, 'date-time', 'expected YYYYMMDDTHHMMSS');
    const [, year = '', month = '', day = '', hour = '', minute = '', second = '', suffix = ''] = m;
    const zone = resolveZone(text, 'date-time', suffix, tzid);
    const fields = dateTime(
      Number(year), Number(month), Number(day),
      Number(hour), Number(minute), Number(second),
      zone,
    );
    if (!isValidDateTime(fields.year, fields.month, fields.day, fields.hour, fields.minute, fields.second)) {
      throw new InvalidValueError(text, 'date-time', 'not a valid date and time');
    }
    return new DateTimeValue(fields, params);
  }

  static fromNative(value: unknown, params?: CaselessInit<string>): DateTimeValue {
    const native = asTemporal(value);
    if (native?.kind === 'date-time') return new DateTimeValue(native, params);
    throw new InvalidValueError(describeValue(value), 'date-time', 'expected a date and time');
  }
}

// ── Time ───────────────────────────────────────────────────────────────────

/** TIME (§3.3.12): `HHMMSS[Z]` */
export class TimeValue extends PropertyValue<TimeOfDay> {
  readonly type = 'time' as const;

  constructor(value: TimeOfDay, params?: CaselessInit<string>) {
    const { hour, minute, second } = value;
    const tzid = tzidOf(value);
    if (!isValidDateTime(2000, 1, 1, hour, minute, second)) {
      throw new InvalidValueError(describeValue(value), 'time', 'not a valid time of day');
    }
    if (tzid !== undefined && !isKnownZone(tzid)) {
      throw new InvalidValueError(describeValue(value), 'time', `unknown time zone ${tzid}`);
    }
    super(time(hour, minute, second, tzid), zoneParams('TIME', tzid), params);
  }

  toIcal(): string {
    const { hour, minute, second, tzid } = this.value;
    return pad(hour) + pad(minute) + pad(second) + (isUtc(tzid) ? 'Z' : '');
  }

  static fromIcal(text: string, tzid?: string, params?: CaselessInit<string>): TimeValue {
    const m = TIME.exec(text);
    if (!m) throw new InvalidValueError(text, 'time', 'expected HHMMSS');
    const [, hour = '', minute = '', second = '', suffix = ''] = m;
    const zone = resolveZone(text, 'time', suffix, tzid);
    const fields = time(Number(hour), Number(minute), Number(second), zone);
    if (!isValidDateTime(2000, 1, 1, fields.hour, fields.minute, fields.second)) {
      throw new InvalidValueError(text, 'time', 'not a valid time of day');
    }
    return new TimeValue(fields, params);
  }

  static fromNative(value: unknown, params?: CaselessInit<string>): TimeValue {
    const native = asTemporal(value);
    if (native?.kind === 'time') return new TimeValue(native, params);
    throw new InvalidValueError(describeValue(value), 'time', 'expected a time of day');
  }
}

/** Zone of a decoded value: caller's zone, then `Z`, then floating */
function resolveZone(text: string, valueType: string, suffix: string, tzid?: string): string | undefined {
  if (suffix !== '' && suffix !== 'Z' && suffix !== 'z') {
    throw new InvalidValueError(text, valueType, `unsupported zone suffix ${JSON.stringify(suffix)}`);
  }
  if (tzid !== undefined && isKnownZone(tzid)) return isUtc(tzid) ? UTC : tzid;
  return suffix === '' ? undefined : UTC;
}

function zoneParams(valueType: string, tzid: string | undefined): Record<string, string> {
  return tzid === undefined || isUtc(tzid) ? { VALUE: valueType } : { VALUE: valueType, TZID: tzid };
}

// ── Duration ───────────────────────────────────────────────────────────────

/** DURATION (§3.3.6): e.g. `P15DT5H0M20S`, `-P1D`, `P7W` */
export class DurationValue extends PropertyValue<SignedDuration> {
  readonly type = 'duration' as const;

  constructor(value: SignedDuration, params?: CaselessInit<string>) {
    const seconds = totalSeconds(value);
    if (!Number.isSafeInteger(seconds)) {
      throw new InvalidValueError(describeValue(value), 'duration', 'must be a whole number of seconds');
    }
    super(durationFromSeconds(seconds), undefined, params);
  }

  toIcal(): string {
    const { sign, days, hours, minutes, seconds } = this.value;
    let timePart = '';
    if (hours || minutes || seconds) {
      timePart = 'T';
      if (hours) timePart += `${hours}H`;
      // the minute segment may not be skipped between hours and seconds
      if (minutes || (hours && seconds)) timePart += `${minutes}M`;
      if (seconds) timePart += `${seconds}S`;
    }
    const prefix = sign < 0 ? '-P' : 'P';
    if (days === 0 && timePart) return prefix + timePart;
    return `${prefix}${days}D${timePart}`;
  }

  static fromIcal(text: string, _tzid?: string, params?: CaselessInit<string>): DurationValue {
    const m = DURATION.exec(text);
    if (!m) throw new InvalidValueError(text, 'duration', 'expected [+-]P[nW] or [+-]P[nD][T[nH][nM][nS]]');
    const [, sign, weeks, days, hours, minutes, seconds] = m;
    const parts = weeks !== undefined
      ? { weeks: Number(weeks) }
      : {
          days: Number(days ?? 0),
          hours: Number(hours ?? 0),
          minutes: Number(minutes ?? 0),
          seconds: Number(seconds ?? 0),
        };
    const value = duration(parts);
    return new DurationValue(sign === '-' ? durationFromSeconds(-totalSeconds(value)) : value, params);
  }

  static fromNative(value: unknown, params?: CaselessInit<string>): DurationValue {
    const native = asTemporal(value);
    if (native?.kind === 'duration') return new DurationValue(native, params);
    throw new InvalidValueError(describeValue(value), 'duration', 'expected a duration');
  }
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}
