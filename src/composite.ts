/**
 * Value types built from other temporal values:
 * PERIOD (RFC 5545 §3.3.9) and the comma-separated lists used by EXDATE
 * and RDATE.
 */

import type { CaselessInit } from './caseless.js';
import { InvalidValueError, describeValue } from './error.js';
import { decodeTemporal, temporal } from './dispatch.js';
import type { TemporalPropertyValue } from './dispatch.js';
import { asTemporal, durationFromSeconds } from './native.js';
import { UTC, addDuration, instant, isUtc } from './timezone.js';
import type { PeriodBound, PeriodNative, SignedDuration, TemporalNative } from './types.js';
import { PropertyValue } from './value.js';

// ── Date/Time lists ───────────────────────────────────────────────────────

/**
 * A list of dates, date-times, times or durations (EXDATE, RDATE).
 * All elements share one TZID parameter: the last zone found in the list.
 */
export class DateTimeListValue extends PropertyValue<readonly TemporalNative[]> {
  readonly type = 'date-time-list' as const;

  constructor(values: readonly TemporalNative[], params?: CaselessInit<string>) {
    const first = values[0];
    if (first === undefined) {
      throw new InvalidValueError('', 'date-time-list', 'list must not be empty');
    }
    if (values.some(v => v.kind !== first.kind)) {
      throw new InvalidValueError(describeValue(values), 'date-time-list', 'all elements must be of the same type');
    }
    const items = values.map(v => temporal(v));
    super(Object.freeze(items.map(item => item.value)), listParams(items), params);
  }

  toIcal(): string {
    return this.value.map(v => temporal(v).toIcal()).join(',');
  }

  static fromIcal(text: string, tzid?: string, params?: CaselessInit<string>): DateTimeListValue {
    return new DateTimeListValue(
      text.split(',').map(part => decodeTemporal(part, tzid).value),
      params,
    );
  }

  /** Accepts a list, or a single value which becomes a list of one */
  static fromNative(value: unknown, params?: CaselessInit<string>): DateTimeListValue {
    const raw: unknown[] = Array.isArray(value) ? value : [value];
    return new DateTimeListValue(
      raw.map(v => {
        const native = asTemporal(v);
        if (native === undefined) {
          throw new InvalidValueError(describeValue(v), 'date-time-list', 'unsupported native type');
        }
        return native;
      }),
      params,
    );
  }
}

function listParams(items: TemporalPropertyValue[]): Record<string, string> {
  let tzid: string | undefined;
  for (const item of items) tzid = item.params.get('TZID') ?? tzid;
  return tzid === undefined ? {} : { TZID: tzid };
}

// ── Period ─────────────────────────────────────────────────────────────────

/**
 * PERIOD (§3.3.9): `start/end` or `start/duration`.
 *
 * Both forms are normalized so that `start`, `end` and `duration` are
 * always available; `byDuration` remembers which one to write.
 */
export class PeriodValue extends PropertyValue<PeriodNative> {
  readonly type = 'period' as const;
  readonly start: PeriodBound;
  readonly end: PeriodBound;
  readonly duration: SignedDuration;
  readonly byDuration: boolean;

  constructor(value: PeriodNative, params?: CaselessInit<string>) {
    const [startInput, endOrDuration] = value;
    const start = boundValue(startInput, value);
    let end: PeriodBound;
    let duration: SignedDuration;
    if (endOrDuration.kind === 'duration') {
      duration = temporalDuration(endOrDuration);
      end = addDuration(start, duration);
    } else {
      end = boundValue(endOrDuration, value);
      if (end.kind !== start.kind) {
        throw new InvalidValueError(describeValue(value), 'period', 'start and end must both be dates or both be date-times');
      }
      if (zoneOf(start) !== zoneOf(end)) {
        throw new InvalidValueError(describeValue(value), 'period', 'start and end must be in the same time zone');
      }
      duration = durationFromSeconds((instant(end) - instant(start)) / 1000);
    }
    if (instant(start) > instant(end)) {
      throw new InvalidValueError(describeValue(value), 'period', 'start is after end');
    }
    const byDuration = endOrDuration.kind === 'duration';
    const tzid = start.kind === 'date-time' ? start.tzid : undefined;
    super(
      Object.freeze([start, byDuration ? duration : end] as const),
      tzid === undefined || isUtc(tzid) ? undefined : { TZID: tzid },
      params,
    );
    this.start = start;
    this.end = end;
    this.duration = duration;
    this.byDuration = byDuration;
  }

  /** Same span: `start/P1D` equals `start/<start + 1 day>` */
  override equals(other: PropertyValue<unknown>): boolean {
    return other instanceof PeriodValue && sameBound(this.start, other.start) && sameBound(this.end, other.end);
  }

  /** Does this period share any time with `other`? (ends are exclusive) */
  overlaps(other: PeriodValue): boolean {
    if (instant(this.start) > instant(other.start)) return other.overlaps(this);
    return instant(this.start) <= instant(other.start) && instant(other.start) < instant(this.end);
  }

  toIcal(): string {
    const second = this.byDuration ? temporal(this.duration) : temporal(this.end);
    return `${temporal(this.start).toIcal()}/${second.toIcal()}`;
  }

  static fromIcal(text: string, tzid?: string, params?: CaselessInit<string>): PeriodValue {
    const parts = text.split('/');
    if (parts.length !== 2) {
      throw new InvalidValueError(text, 'period', 'expected start/end or start/duration');
    }
    const [startText = '', endText = ''] = parts;
    try {
      const start = decodeTemporal(startText, tzid).value;
      const endOrDuration = decodeTemporal(endText, tzid).value;
      if (start.kind !== 'date' && start.kind !== 'date-time') {
        throw new InvalidValueError(startText, 'period', 'start must be a date or date-time');
      }
      if (endOrDuration.kind === 'time') {
        throw new InvalidValueError(endText, 'period', 'end must be a date, date-time or duration');
      }
      return new PeriodValue([start, endOrDuration], params);
    } catch (err) {
      if (!(err instanceof InvalidValueError)) throw err;
      throw new InvalidValueError(text, 'period', err.reason ?? err.message, { cause: err });
    }
  }

  /** Accepts a `[start, endOrDuration]` pair */
  static fromNative(value: unknown, params?: CaselessInit<string>): PeriodValue {
    if (Array.isArray(value) && value.length === 2) {
      const [first, second]: unknown[] = value;
      const start = asTemporal(first);
      const endOrDuration = asTemporal(second);
      if (
        start !== undefined && endOrDuration !== undefined &&
        (start.kind === 'date' || start.kind === 'date-time') &&
        endOrDuration.kind !== 'time'
      ) {
        return new PeriodValue([start, endOrDuration], params);
      }
    }
    throw new InvalidValueError(describeValue(value), 'period', 'expected a [start, end or duration] pair');
  }
}

/** Validated copy of a period bound */
function boundValue(bound: PeriodBound, period: PeriodNative): PeriodBound {
  const value = temporal(bound).value;
  if (value.kind === 'date' || value.kind === 'date-time') return value;
  throw new InvalidValueError(describeValue(period), 'period', 'bounds must be dates or date-times');
}

/** Zone of a bound with every spelling of UTC folded together; dates have none */
function zoneOf(bound: PeriodBound): string | undefined {
  if (bound.kind === 'date' || bound.tzid === undefined) return undefined;
  return isUtc(bound.tzid) ? UTC : bound.tzid;
}

function sameBound(a: PeriodBound, b: PeriodBound): boolean {
  return a.kind === b.kind && zoneOf(a) === zoneOf(b) && instant(a) === instant(b);
}

function temporalDuration(d: SignedDuration): SignedDuration {
  const value = temporal(d).value;
  if (value.kind === 'duration') return value;
  throw new InvalidValueError(describeValue(d), 'period', 'expected a duration');
}
