/**
 * Recurrence rules: RFC 5545 section 3.3.10
 *
 *   FREQ=WEEKLY;BYDAY=MO,WE,FR;COUNT=10
 *
 * Each rule part holds a list of values whose type depends on the part
 * name. Parts are always written in the order the RFC lists them.
 */

import { isDeepStrictEqual } from 'node:util';
import { CaselessMap } from './caseless.js';
import type { CaselessInit, ReadonlyCaselessMap } from './caseless.js';
import { InvalidValueError, describeValue } from './error.js';
import { TemporalValue } from './dispatch.js';
import { FREQUENCIES, isFrequency, isRecord, isWeekdayCode, weekday } from './native.js';
import { IntegerValue, TextValue } from './scalar.js';
import { isUtc, toUtc } from './timezone.js';
import type { Frequency, RecurPart, Weekday } from './types.js';
import { PropertyValue } from './value.js';
import type { ValueType } from './value.js';

const WEEKDAY_RULE = /^([+-]?)(\d{0,2})([A-Za-z]{2})$/;

// ── Weekday ────────────────────────────────────────────────────────────────

/** BYDAY / WKST entry, e.g. `MO`, `2TU`, `-1FR` */
export class WeekdayValue extends PropertyValue<Weekday> {
  readonly type = 'weekday' as const;

  constructor(value: Weekday) {
    const { weekday: code, ordinal } = value;
    if (!isWeekdayCode(code)) {
      throw new InvalidValueError(describeValue(value), 'weekday', 'expected one of SU, MO, TU, WE, TH, FR, SA');
    }
    if (ordinal !== undefined && (!Number.isInteger(ordinal) || ordinal === 0 || Math.abs(ordinal) > 53)) {
      throw new InvalidValueError(describeValue(value), 'weekday', 'ordinal must be between 1 and 53, optionally negative');
    }
    super(weekday(code, ordinal));
  }

  toIcal(): string {
    const { weekday: code, ordinal } = this.value;
    return ordinal === undefined ? code : `${ordinal}${code}`;
  }

  static fromIcal(text: string): WeekdayValue {
    const m = WEEKDAY_RULE.exec(text);
    if (!m) throw new InvalidValueError(text, 'weekday', 'expected [+-][ordinal]weekday');
    const [, sign = '', digits = '', rawCode = ''] = m;
    const code = rawCode.toUpperCase();
    if (!isWeekdayCode(code)) {
      throw new InvalidValueError(text, 'weekday', 'expected one of SU, MO, TU, WE, TH, FR, SA');
    }
    if (sign && !digits) {
      throw new InvalidValueError(text, 'weekday', 'sign without an ordinal');
    }
    if (!digits) return new WeekdayValue(weekday(code));
    const ordinal = Number(digits);
    return new WeekdayValue(weekday(code, sign === '-' ? -ordinal : ordinal));
  }

  /** Accepts a `{ weekday, ordinal? }` object or a two-letter code */
  static fromNative(value: unknown): WeekdayValue {
    if (typeof value === 'string') return WeekdayValue.fromIcal(value);
    if (isRecord(value)) {
      const { weekday: code, ordinal } = value;
      if (isWeekdayCode(code) && (ordinal === undefined || typeof ordinal === 'number')) {
        return new WeekdayValue(weekday(code, ordinal));
      }
    }
    throw new InvalidValueError(describeValue(value), 'weekday', 'expected a weekday');
  }
}

// ── Frequency ──────────────────────────────────────────────────────────────

/** FREQ rule part: SECONDLY … YEARLY */
export class FrequencyValue extends PropertyValue<Frequency> {
  readonly type = 'frequency' as const;

  constructor(value: Frequency) {
    if (!isFrequency(value)) {
      throw new InvalidValueError(String(value), 'frequency', `expected one of ${FREQUENCIES.join(', ')}`);
    }
    super(value);
  }

  toIcal(): string {
    return this.value;
  }

  static fromIcal(text: string): FrequencyValue {
    const upper = text.toUpperCase();
    if (!isFrequency(upper)) {
      throw new InvalidValueError(text, 'frequency', `expected one of ${FREQUENCIES.join(', ')}`);
    }
    return new FrequencyValue(upper);
  }

  static fromNative(value: unknown): FrequencyValue {
    if (typeof value === 'string') return FrequencyValue.fromIcal(value);
    throw new InvalidValueError(describeValue(value), 'frequency', 'expected a frequency name');
  }
}

// ── Recurrence rule ────────────────────────────────────────────────────────

/** RFC 5545 order; Apple Calendar ignores RRULEs where FREQ is not first */
export const CANONICAL_ORDER: readonly string[] = Object.freeze([
  'FREQ',
  'UNTIL',
  'COUNT',
  'INTERVAL',
  'BYSECOND',
  'BYMINUTE',
  'BYHOUR',
  'BYDAY',
  'BYMONTHDAY',
  'BYYEARDAY',
  'BYWEEKNO',
  'BYMONTH',
  'BYSETPOS',
  'WKST',
]);

type PartType = ValueType<PropertyValue<RecurPart>>;

const PART_TYPES = new CaselessMap<PartType>({
  COUNT: IntegerValue,
  INTERVAL: IntegerValue,
  BYSECOND: IntegerValue,
  BYMINUTE: IntegerValue,
  BYHOUR: IntegerValue,
  BYMONTHDAY: IntegerValue,
  BYYEARDAY: IntegerValue,
  BYMONTH: IntegerValue,
  BYSETPOS: IntegerValue,
  UNTIL: TemporalValue,
  WKST: WeekdayValue,
  BYDAY: WeekdayValue,
  FREQ: FrequencyValue,
});

/** Value type of a rule part; unknown parts are plain text */
export function partType(name: string): PartType {
  return PART_TYPES.get(name) ?? TextValue;
}

export type RecurRule = ReadonlyCaselessMap<readonly RecurPart[]>;

export type RecurInit =
  | Iterable<readonly [string, RecurPart | readonly RecurPart[]]>
  | Readonly<Record<string, RecurPart | readonly RecurPart[]>>;

/** RECUR (§3.3.10) */
export class RecurValue extends PropertyValue<RecurRule> {
  readonly type = 'recur' as const;

  /** A zoned UNTIL is stored as the same instant in UTC */
  constructor(init: RecurInit, params?: CaselessInit<string>) {
    const rule = new CaselessMap<readonly RecurPart[]>();
    for (const [name, parts] of new CaselessMap<RecurPart | readonly RecurPart[]>(init)) {
      const list = isPartList(parts) ? parts : [parts];
      if (list.length === 0) {
        throw new InvalidValueError(name, 'recur', `rule part ${name} has no values`);
      }
      const type = partType(name);
      rule.set(name, Object.freeze(list.map(part => untilInUtc(name, type.fromNative(part).value))));
    }
    super(rule, undefined, params);
  }

  /** Values of one rule part, e.g. `get('BYDAY')` */
  get(name: string): readonly RecurPart[] | undefined {
    return this.value.get(name);
  }

  toIcal(): string {
    const known = CANONICAL_ORDER.filter(name => this.value.has(name));
    const extra = this.value.keys().filter(name => !CANONICAL_ORDER.includes(name));
    return [...known, ...extra]
      .map(name => {
        const type = partType(name);
        const parts = this.value.get(name) ?? [];
        return `${name}=${parts.map(part => type.fromNative(part).toIcal()).join(',')}`;
      })
      .join(';');
  }

  override equals(other: PropertyValue<unknown>): boolean {
    return other instanceof RecurValue && this.value.equals(other.value, isDeepStrictEqual);
  }

  static fromIcal(text: string, _tzid?: string, params?: CaselessInit<string>): RecurValue {
    const rule: [string, RecurPart[]][] = [];
    for (const pair of text.split(';')) {
      const fields = pair.split('=');
      const [name = '', values = ''] = fields;
      if (fields.length !== 2 || name === '') {
        throw new InvalidValueError(text, 'recur', `malformed rule part ${JSON.stringify(pair)}`);
      }
      const type = partType(name);
      try {
        rule.push([name, values.split(',').map(v => type.fromIcal(v).value)]);
      } catch (err) {
        if (!(err instanceof InvalidValueError)) throw err;
        throw new InvalidValueError(text, 'recur', `bad ${name.toUpperCase()} value: ${err.message}`, { cause: err });
      }
    }
    return new RecurValue(rule, params);
  }

  /** Accepts a RecurRule, a Map or a plain object of rule parts */
  static fromNative(value: unknown, params?: CaselessInit<string>): RecurValue {
    if (value instanceof CaselessMap || value instanceof Map) {
      return new RecurValue(recurEntries(value.entries()), params);
    }
    if (isRecord(value)) return new RecurValue(recurEntries(Object.entries(value)), params);
    throw new InvalidValueError(describeValue(value), 'recur', 'expected a map of rule parts');
  }
}

/** RECUR carries no TZID, so UNTIL is either floating, a date or UTC */
function untilInUtc(name: string, part: RecurPart): RecurPart {
  if (CaselessMap.normalize(name) !== 'UNTIL' || typeof part !== 'object' || !('kind' in part)) return part;
  if (part.kind !== 'date-time' || part.tzid === undefined || isUtc(part.tzid)) return part;
  return toUtc(part);
}

function isPartList(parts: RecurPart | readonly RecurPart[]): parts is readonly RecurPart[] {
  return Array.isArray(parts);
}

function recurEntries(entries: Iterable<[unknown, unknown]>): [string, RecurPart[]][] {
  const out: [string, RecurPart[]][] = [];
  for (const [name, parts] of entries) {
    if (typeof name !== 'string') {
      throw new InvalidValueError(describeValue(name), 'recur', 'rule part names must be strings');
    }
    const list: unknown[] = Array.isArray(parts) ? parts : [parts];
    out.push([name, list.map(part => partType(name).fromNative(part).value)]);
  }
  return out;
}
