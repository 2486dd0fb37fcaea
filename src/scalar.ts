/**
 * Scalar value types: RFC 5545 section 3.3
 *
 * BINARY, BOOLEAN, CAL-ADDRESS, FLOAT, INTEGER, TEXT, URI and UTC-OFFSET,
 * plus GEO (defined only by its property, §3.8.1.6) and an inline type that
 * keeps raw text verbatim.
 */

import type { CaselessInit } from './caseless.js';
import { InvalidValueError, describeValue } from './error.js';
import { escapeText, unescapeText } from './escape.js';
import { asTemporal, durationFromSeconds, geo, isRecord } from './native.js';
import { toText } from './text.js';
import { totalSeconds } from './timezone.js';
import type { GeoCoordinates, SignedDuration } from './types.js';
import { PropertyValue } from './value.js';

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;
const INTEGER = /^[+-]?\d+$/;
const FLOAT = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const EMAIL = /^[^@]+@[^@]+\.[^@]+/;
const UTC_OFFSET = /^([+-])(\d{2})(\d{2})(\d{2})?$/;

// ── Binary ─────────────────────────────────────────────────────────────────

/**
 * BINARY (§3.3.1): inline data, always base64 encoded.
 * The value is the raw bytes; a string is stored as its UTF-8 encoding.
 */
export class BinaryValue extends PropertyValue<Uint8Array> {
  readonly type = 'binary' as const;

  constructor(value: string | Uint8Array, params?: CaselessInit<string>) {
    super(
      typeof value === 'string' ? new TextEncoder().encode(value) : Uint8Array.from(value),
      { ENCODING: 'BASE64', VALUE: 'BINARY' },
      params,
    );
  }

  /** The bytes read as text, for attachments that hold text */
  get text(): string {
    return toText(this.value);
  }

  toIcal(): string {
    return Buffer.from(this.value).toString('base64');
  }

  static fromIcal(text: string, _tzid?: string, params?: CaselessInit<string>): BinaryValue {
    const compact = text.replace(/\s+/g, '');
    if (!BASE64.test(compact) || compact.length % 4 !== 0) {
      throw new InvalidValueError(text, 'binary', 'not valid base64');
    }
    return new BinaryValue(Buffer.from(compact, 'base64'), params);
  }

  static fromNative(value: unknown, params?: CaselessInit<string>): BinaryValue {
    if (typeof value === 'string' || value instanceof Uint8Array) return new BinaryValue(value, params);
    throw new InvalidValueError(describeValue(value), 'binary', 'expected a string or bytes');
  }
}

// ── Boolean ────────────────────────────────────────────────────────────────

/** BOOLEAN (§3.3.2) */
export class BooleanValue extends PropertyValue<boolean> {
  readonly type = 'boolean' as const;

  constructor(value: boolean, params?: CaselessInit<string>) {
    super(value, undefined, params);
  }

  toIcal(): string {
    return this.value ? 'TRUE' : 'FALSE';
  }

  static fromIcal(text: string, _tzid?: string, params?: CaselessInit<string>): BooleanValue {
    switch (text.toUpperCase()) {
      case 'TRUE':
        return new BooleanValue(true, params);
      case 'FALSE':
        return new BooleanValue(false, params);
      default:
        throw new InvalidValueError(text, 'boolean', 'expected TRUE or FALSE');
    }
  }

  static fromNative(value: unknown, params?: CaselessInit<string>): BooleanValue {
    if (typeof value === 'boolean') return new BooleanValue(value, params);
    throw new InvalidValueError(describeValue(value), 'boolean', 'expected a boolean');
  }
}

// ── Numbers ────────────────────────────────────────────────────────────────

/** FLOAT (§3.3.7) */
export class FloatValue extends PropertyValue<number> {
  readonly type = 'float' as const;

  constructor(value: number, params?: CaselessInit<string>) {
    if (!Number.isFinite(value)) {
      throw new InvalidValueError(String(value), 'float', 'must be a finite number');
    }
    super(positiveZero(value), undefined, params);
  }

  toIcal(): string {
    return String(this.value);
  }

  static fromIcal(text: string, _tzid?: string, params?: CaselessInit<string>): FloatValue {
    return new FloatValue(parseFloatText(text, 'float'), params);
  }

  static fromNative(value: unknown, params?: CaselessInit<string>): FloatValue {
    if (typeof value === 'number') return new FloatValue(value, params);
    throw new InvalidValueError(describeValue(value), 'float', 'expected a number');
  }
}

/** INTEGER (§3.3.8) */
export class IntegerValue extends PropertyValue<number> {
  readonly type = 'integer' as const;

  constructor(value: number, params?: CaselessInit<string>) {
    if (!Number.isSafeInteger(value)) {
      throw new InvalidValueError(String(value), 'integer', 'must be a safe integer');
    }
    super(positiveZero(value), undefined, params);
  }

  toIcal(): string {
    return String(this.value);
  }

  static fromIcal(text: string, _tzid?: string, params?: CaselessInit<string>): IntegerValue {
    if (!INTEGER.test(text)) {
      throw new InvalidValueError(text, 'integer', 'expected an optionally signed decimal integer');
    }
    return new IntegerValue(Number(text), params);
  }

  static fromNative(value: unknown, params?: CaselessInit<string>): IntegerValue {
    if (typeof value === 'number') return new IntegerValue(value, params);
    throw new InvalidValueError(describeValue(value), 'integer', 'expected a number');
  }
}

/** `-0` is written as `0`, so it is stored as `0` */
function positiveZero(n: number): number {
  return n === 0 ? 0 : n;
}

function parseFloatText(text: string, valueType: string): number {
  if (!FLOAT.test(text)) {
    throw new InvalidValueError(text, valueType, 'expected a decimal number');
  }
  return Number(text);
}

// ── Text-like values ──────────────────────────────────────────────────────

/**
 * CAL-ADDRESS (§3.3.3).
 * A bare e-mail address is turned into a mailto: URI.
 */
export class CalAddressValue extends PropertyValue<string> {
  readonly type = 'cal-address' as const;

  constructor(value: string | Uint8Array, params?: CaselessInit<string>) {
    const text = toText(value);
    super(!/^mailto:/i.test(text) && EMAIL.test(text) ? `mailto:${text}` : text, undefined, params);
  }

  toIcal(): string {
    return this.value;
  }

  static fromIcal(text: string, _tzid?: string, params?: CaselessInit<string>): CalAddressValue {
    return new CalAddressValue(text, params);
  }

  static fromNative(value: unknown, params?: CaselessInit<string>): CalAddressValue {
    return new CalAddressValue(textual(value, 'cal-address'), params);
  }
}

/** URI (§3.3.13): no escaping */
export class UriValue extends PropertyValue<string> {
  readonly type = 'uri' as const;

  constructor(value: string | Uint8Array, params?: CaselessInit<string>) {
    super(toText(value), undefined, params);
  }

  toIcal(): string {
    return this.value;
  }

  static fromIcal(text: string, _tzid?: string, params?: CaselessInit<string>): UriValue {
    return new UriValue(text, params);
  }

  static fromNative(value: unknown, params?: CaselessInit<string>): UriValue {
    return new UriValue(textual(value, 'uri'), params);
  }
}

/** TEXT (§3.3.11): the only type that escapes its content */
export class TextValue extends PropertyValue<string> {
  readonly type = 'text' as const;

  constructor(value: string | Uint8Array, params?: CaselessInit<string>) {
    super(toText(value), undefined, params);
  }

  toIcal(): string {
    return escapeText(this.value);
  }

  static fromIcal(text: string, _tzid?: string, params?: CaselessInit<string>): TextValue {
    return new TextValue(unescapeText(text), params);
  }

  static fromNative(value: unknown, params?: CaselessInit<string>): TextValue {
    return new TextValue(textual(value, 'text'), params);
  }
}

/**
 * Raw, unparsed text with parameters. Used for values whose type is handled
 * elsewhere, and for values that failed to decode.
 */
export class InlineValue extends PropertyValue<string> {
  readonly type = 'inline' as const;

  constructor(value: string | Uint8Array, params?: CaselessInit<string>) {
    super(toText(value), undefined, params);
  }

  toIcal(): string {
    return this.value;
  }

  static fromIcal(text: string, _tzid?: string, params?: CaselessInit<string>): InlineValue {
    return new InlineValue(text, params);
  }

  static fromNative(value: unknown, params?: CaselessInit<string>): InlineValue {
    return new InlineValue(textual(value, 'inline'), params);
  }
}

function textual(value: unknown, valueType: string): string | Uint8Array {
  if (typeof value === 'string' || value instanceof Uint8Array) return value;
  throw new InvalidValueError(describeValue(value), valueType, 'expected a string or bytes');
}

// ── Geographic ────────────────────────────────────────────────────────────

/** GEO (§3.8.1.6): `latitude;longitude` */
export class GeoValue extends PropertyValue<GeoCoordinates> {
  readonly type = 'geo' as const;

  constructor(value: GeoCoordinates, params?: CaselessInit<string>) {
    const { latitude, longitude } = value;
    if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
      throw new InvalidValueError(describeValue(value), 'geo', 'latitude and longitude must be finite numbers');
    }
    super(geo(positiveZero(latitude), positiveZero(longitude)), undefined, params);
  }

  toIcal(): string {
    return `${this.value.latitude};${this.value.longitude}`;
  }

  static fromIcal(text: string, _tzid?: string, params?: CaselessInit<string>): GeoValue {
    const parts = text.split(';');
    if (parts.length !== 2) {
      throw new InvalidValueError(text, 'geo', 'expected latitude;longitude');
    }
    const [latitude = '', longitude = ''] = parts;
    return new GeoValue(geo(parseFloatText(latitude, 'geo'), parseFloatText(longitude, 'geo')), params);
  }

  /** Accepts `{ latitude, longitude }` or a `[latitude, longitude]` pair */
  static fromNative(value: unknown, params?: CaselessInit<string>): GeoValue {
    if (Array.isArray(value) && value.length === 2) {
      const [latitude, longitude]: unknown[] = value;
      if (typeof latitude === 'number' && typeof longitude === 'number') {
        return new GeoValue(geo(latitude, longitude), params);
      }
    }
    if (isRecord(value)) {
      const { latitude, longitude } = value;
      if (typeof latitude === 'number' && typeof longitude === 'number') {
        return new GeoValue(geo(latitude, longitude), params);
      }
    }
    throw new InvalidValueError(describeValue(value), 'geo', 'expected latitude and longitude numbers');
  }
}

// ── UTC Offset ────────────────────────────────────────────────────────────

/** UTC-OFFSET (§3.3.14): `+HHMM[SS]` / `-HHMM[SS]`, less than 24 hours */
export class UtcOffsetValue extends PropertyValue<SignedDuration> {
  readonly type = 'utc-offset' as const;

  constructor(value: SignedDuration, params?: CaselessInit<string>) {
    const seconds = totalSeconds(value);
    if (!Number.isInteger(seconds) || Math.abs(seconds) >= 86400) {
      throw new InvalidValueError(describeValue(value), 'utc-offset', 'offset must be less than 24 hours');
    }
    super(durationFromSeconds(seconds), undefined, params);
  }

  toIcal(): string {
    const { sign, hours, minutes, seconds } = this.value;
    // Google Calendar rejects '0000' but accepts '+0000'
    const prefix = sign < 0 ? '-' : '+';
    const hhmm = pad(hours) + pad(minutes);
    return prefix + (seconds ? hhmm + pad(seconds) : hhmm);
  }

  static fromIcal(text: string, _tzid?: string, params?: CaselessInit<string>): UtcOffsetValue {
    const m = UTC_OFFSET.exec(text);
    if (!m) {
      throw new InvalidValueError(text, 'utc-offset', 'expected [+-]HHMM or [+-]HHMMSS');
    }
    const [, sign, hh = '', mm = '', ss = '00'] = m;
    const hours = Number(hh);
    const minutes = Number(mm);
    const seconds = Number(ss);
    if (minutes > 59 || seconds > 59) {
      throw new InvalidValueError(text, 'utc-offset', 'minutes and seconds must be below 60');
    }
    if (hours >= 24) {
      throw new InvalidValueError(text, 'utc-offset', 'offset must be less than 24 hours');
    }
    const total = (hours * 60 + minutes) * 60 + seconds;
    return new UtcOffsetValue(durationFromSeconds(sign === '-' ? -total : total), params);
  }

  static fromNative(value: unknown, params?: CaselessInit<string>): UtcOffsetValue {
    const native = asTemporal(value);
    if (native?.kind === 'duration') return new UtcOffsetValue(native, params);
    throw new InvalidValueError(describeValue(value), 'utc-offset', 'expected a duration');
  }
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}
