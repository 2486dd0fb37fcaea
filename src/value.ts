/**
 * Base class shared by all property value types.
 *
 * A value is validated once, at construction, and never changes after that,
 * parameters included. Parameters are a side channel: every instance owns
 * its own map and they take no part in equality.
 */

import { isDeepStrictEqual } from 'node:util';
import { Parameters } from './caseless.js';
import type { CaselessInit, ReadonlyParameters } from './caseless.js';
import type { ValueKind } from './types.js';

export abstract class PropertyValue<T> {
  abstract readonly type: ValueKind;
  readonly value: T;
  readonly params: ReadonlyParameters;

  /**
   * @param defaults parameters the type always carries, e.g. `VALUE=DATE`
   * @param params caller parameters, which win over `defaults`
   */
  constructor(value: T, defaults?: CaselessInit<string>, params?: CaselessInit<string>) {
    this.value = value;
    this.params = Parameters.merge(defaults, params);
  }

  /** RFC 5545 text of the value (without name or parameters) */
  abstract toIcal(): string;

  /** Same value type and native value; parameters are not compared */
  equals(other: PropertyValue<unknown>): boolean {
    return this.type === other.type && isDeepStrictEqual(this.value, other.value);
  }

  toString(): string {
    return `${this.constructor.name}('${this.toIcal()}')`;
  }
}

/**
 * The static side of a value class: decode from text, or build from a
 * native value whose type is only known at runtime.
 */
export interface ValueType<V extends PropertyValue<unknown> = PropertyValue<unknown>> {
  fromIcal(text: string, tzid?: string, params?: CaselessInit<string>): V;
  fromNative(value: unknown, params?: CaselessInit<string>): V;
}
