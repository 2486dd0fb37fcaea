/**
 * Timezone handling on top of luxon.
 *
 * Values only carry a zone identifier; luxon is used to validate it and
 * for arithmetic and comparison of moments.
 */

import { DateTime, IANAZone } from 'luxon';
import type { CalendarDate, CalendarMoment, PeriodBound, SignedDuration, TimeOfDay } from './types.js';

export const UTC = 'UTC';

/** Is this zone identifier UTC? (case-insensitive) */
export function isUtc(tzid: string | undefined): boolean {
  return tzid !== undefined && tzid.toLowerCase() === 'utc';
}

/** `UTC` or any IANA zone name the runtime knows */
export function isKnownZone(tzid: string): boolean {
  return isUtc(tzid) || IANAZone.isValidZone(tzid);
}

/** Zone identifier of a moment or time; undefined when zone-naive */
export function tzidOf(value: CalendarMoment | TimeOfDay): string | undefined {
  return value.tzid;
}

/** Check that date/time fields name a real moment (leap years, month lengths) */
export function isValidDateTime(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
): boolean {
  if (![year, month, day, hour, minute, second].every(Number.isInteger)) return false;
  return DateTime.fromObject({ year, month, day, hour, minute, second }, { zone: UTC }).isValid;
}

/**
 * Luxon value of a date or moment. Dates are midnight UTC and zone-naive
 * moments are read as UTC.
 */
export function toDateTime(value: PeriodBound): DateTime {
  if (value.kind === 'date') {
    return DateTime.fromObject({ year: value.year, month: value.month, day: value.day }, { zone: UTC });
  }
  const { year, month, day, hour, minute, second, tzid } = value;
  return DateTime.fromObject(
    { year, month, day, hour, minute, second },
    { zone: tzid === undefined || isUtc(tzid) ? UTC : tzid },
  );
}

/** Fields of a luxon value; UTC zones become `UTC`, others keep their name */
export function fromDateTime(dt: DateTime): CalendarMoment {
  return fieldsOf(dt, dt.zone.isUniversal && dt.offset === 0 ? UTC : (dt.zoneName ?? undefined));
}

/** The same instant as a UTC moment */
export function toUtc(value: CalendarMoment): CalendarMoment {
  return fromDateTime(toDateTime(value).toUTC());
}

function fieldsOf(dt: DateTime, tzid: string | undefined): CalendarMoment {
  const moment: CalendarMoment = {
    kind: 'date-time',
    year: dt.year,
    month: dt.month,
    day: dt.day,
    hour: dt.hour,
    minute: dt.minute,
    second: dt.second,
  };
  return Object.freeze(tzid === undefined ? moment : { ...moment, tzid });
}

/** Milliseconds since the epoch, used to order period bounds */
export function instant(value: PeriodBound): number {
  return toDateTime(value).toMillis();
}

/** Signed total length of a duration in seconds */
export function totalSeconds(d: SignedDuration): number {
  return d.sign * (((d.days * 24 + d.hours) * 60 + d.minutes) * 60 + d.seconds);
}

/**
 * Add a duration to a period bound. Moments keep their zone; dates move by
 * whole days only.
 */
export function addDuration(value: PeriodBound, d: SignedDuration): PeriodBound {
  if (value.kind === 'date') {
    const shifted = toDateTime(value).plus({ days: d.sign * d.days });
    const date: CalendarDate = { kind: 'date', year: shifted.year, month: shifted.month, day: shifted.day };
    return Object.freeze(date);
  }
  const shifted = toDateTime(value).plus({
    days: d.sign * d.days,
    hours: d.sign * d.hours,
    minutes: d.sign * d.minutes,
    seconds: d.sign * d.seconds,
  });
  return fieldsOf(shifted, value.tzid);
}
