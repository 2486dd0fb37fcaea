/**
 * Maps property and parameter names to their default value types.
 *
 * Property and parameter names do not overlap in RFC 5545, so one table
 * serves both.
 */

import { CaselessMap, Parameters } from './caseless.js';
import type { CaselessInit } from './caseless.js';
import { DateTimeListValue, PeriodValue } from './composite.js';
import { TemporalValue } from './dispatch.js';
import { InvalidValueError } from './error.js';
import PROPERTY_TYPES from './property-types.json' with { type: 'json' };
import { FrequencyValue, RecurValue, WeekdayValue } from './recur.js';
import {
  BinaryValue,
  BooleanValue,
  CalAddressValue,
  FloatValue,
  GeoValue,
  InlineValue,
  IntegerValue,
  TextValue,
  UriValue,
  UtcOffsetValue,
} from './scalar.js';
import { DateTimeValue, DateValue, DurationValue, TimeValue } from './temporal.js';
import type { DecodeWarning, ValueTypeName } from './types.js';
import type { ValueType } from './value.js';

/** Every value class, discriminated by `type` */
export type AnyValue =
  | BinaryValue
  | BooleanValue
  | CalAddressValue
  | DateValue
  | DateTimeValue
  | DateTimeListValue
  | DurationValue
  | FloatValue
  | FrequencyValue
  | GeoValue
  | InlineValue
  | IntegerValue
  | PeriodValue
  | RecurValue
  | TextValue
  | TimeValue
  | UriValue
  | UtcOffsetValue
  | WeekdayValue;

export const VALUE_TYPES: Readonly<Record<ValueTypeName, ValueType<AnyValue>>> = Object.freeze({
  binary: BinaryValue,
  boolean: BooleanValue,
  'cal-address': CalAddressValue,
  date: TemporalValue,
  'date-time': TemporalValue,
  duration: TemporalValue,
  float: FloatValue,
  integer: IntegerValue,
  period: PeriodValue,
  recur: RecurValue,
  text: TextValue,
  time: TemporalValue,
  uri: UriValue,
  'utc-offset': UtcOffsetValue,
  geo: GeoValue,
  inline: InlineValue,
  'date-time-list': DateTimeListValue,
});

const LIST_ELEMENT_TYPES: readonly ValueTypeName[] = ['date', 'date-time', 'time', 'duration'];

export function isValueTypeName(name: string): name is ValueTypeName {
  return Object.prototype.hasOwnProperty.call(VALUE_TYPES, name);
}

export interface LenientResult {
  value: AnyValue;
  warnings: DecodeWarning[];
}

export class TypesRegistry {
  private readonly names = new CaselessMap<ValueTypeName>();

  /**
   * @param overrides extra or replacement name → value type mappings,
   *   e.g. `{ 'X-WR-TIMEZONE': 'text', 'X-ALT-DTSTART': 'date-time' }`
   */
  constructor(overrides?: Readonly<Record<string, string>>) {
    for (const [name, type] of [...Object.entries(PROPERTY_TYPES), ...Object.entries(overrides ?? {})]) {
      if (!isValueTypeName(type)) {
        throw new InvalidValueError(type, 'value type name', `unknown value type for ${name}`);
      }
      this.names.set(name, type);
    }
  }

  /** Default value type of a property or parameter; `text` when unlisted */
  valueTypeOf(name: string): ValueTypeName {
    return this.names.get(name) ?? 'text';
  }

  codecFor(name: string): ValueType<AnyValue> {
    return VALUE_TYPES[this.valueTypeOf(name)];
  }

  /** Encode a native value as the named property's value text */
  encode(name: string, value: unknown): string {
    return this.codecFor(name).fromNative(value).toIcal();
  }

  /**
   * Decode the named property's value text.
   *
   * A `VALUE` parameter naming a known type replaces the default type, and
   * `TZID` is used to localize date-times. The given parameters become the
   * decoded value's parameters, over the ones its type sets itself.
   */
  decode(name: string, text: string, params?: CaselessInit<string>): AnyValue {
    const parameters = new Parameters(params);
    const type = VALUE_TYPES[this.resolve(name, parameters)];
    return type.fromIcal(text, parameters.get('TZID'), parameters);
  }

  /**
   * Like `decode`, but a value that fails to decode is kept verbatim as an
   * InlineValue and reported in `warnings` instead of throwing.
   */
  decodeLenient(name: string, text: string, params?: CaselessInit<string>): LenientResult {
    try {
      return { value: this.decode(name, text, params), warnings: [] };
    } catch (err) {
      if (!(err instanceof InvalidValueError)) throw err;
      const parameters = new Parameters(params);
      return {
        value: new InlineValue(text, parameters),
        warnings: [{ property: name.toUpperCase(), valueType: this.resolve(name, parameters), message: err.message }],
      };
    }
  }

  private resolve(name: string, params: Parameters): ValueTypeName {
    const fallback = this.valueTypeOf(name);
    const requested = params.get('VALUE')?.toLowerCase();
    if (requested === undefined || !isValueTypeName(requested)) return fallback;
    // EXDATE;VALUE=DATE:20230101,20230108 is still a list
    if (fallback === 'date-time-list' && LIST_ELEMENT_TYPES.includes(requested)) return fallback;
    return requested;
  }
}

/** Shared registry with the RFC 5545 defaults */
export const types = new TypesRegistry();
