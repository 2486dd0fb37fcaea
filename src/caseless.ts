/**
 * Case-insensitive, insertion-ordered maps used for parameters,
 * the type registry and recurrence rule parts.
 */

import { quoteParamValue } from './escape.js';

export type CaselessInit<V> = Iterable<readonly [string, V]> | Readonly<Record<string, V>>;

/** Read-only view of a CaselessMap */
export interface ReadonlyCaselessMap<V> extends Iterable<[string, V]> {
  readonly size: number;
  get(key: string): V | undefined;
  has(key: string): boolean;
  keys(): string[];
  values(): V[];
  entries(): [string, V][];
  equals(other: ReadonlyCaselessMap<V>, eq?: (a: V, b: V) => boolean): boolean;
}

/** Map whose keys are compared case-insensitively and stored upper-cased */
export class CaselessMap<V> implements ReadonlyCaselessMap<V> {
  private readonly items = new Map<string, V>();

  constructor(init?: CaselessInit<V>) {
    if (init === undefined) return;
    const entries = isIterable(init) ? init : Object.entries(init);
    for (const [key, value] of entries) this.set(key, value);
  }

  static normalize(key: string): string {
    return key.toUpperCase();
  }

  get size(): number {
    return this.items.size;
  }

  get(key: string): V | undefined {
    return this.items.get(CaselessMap.normalize(key));
  }

  has(key: string): boolean {
    return this.items.has(CaselessMap.normalize(key));
  }

  /** Set a value; an existing key keeps its position */
  set(key: string, value: V): this {
    this.items.set(CaselessMap.normalize(key), value);
    return this;
  }

  delete(key: string): boolean {
    return this.items.delete(CaselessMap.normalize(key));
  }

  keys(): string[] {
    return [...this.items.keys()];
  }

  values(): V[] {
    return [...this.items.values()];
  }

  entries(): [string, V][] {
    return [...this.items.entries()];
  }

  [Symbol.iterator](): Iterator<[string, V]> {
    return this.items.entries();
  }

  /** Same keys mapped to equal values; insertion order is ignored */
  equals(other: ReadonlyCaselessMap<V>, eq: (a: V, b: V) => boolean = Object.is): boolean {
    if (this.size !== other.size) return false;
    for (const [key, value] of this.items) {
      const theirs = other.get(key);
      if (theirs === undefined || !eq(value, theirs)) return false;
    }
    return true;
  }

  toJSON(): Record<string, V> {
    return Object.fromEntries(this.items);
  }
}

// ── Parameters ─────────────────────────────────────────────────────────────

/** Parameters as seen on a value: readable and serializable only */
export interface ReadonlyParameters extends ReadonlyCaselessMap<string> {
  toIcal(): string;
}

/** Property parameters: NAME=VALUE pairs attached to a value */
export class Parameters extends CaselessMap<string> implements ReadonlyParameters {
  /** Later maps win: `merge({ VALUE: 'DATE' }, callerParams)` */
  static merge(...maps: (CaselessInit<string> | undefined)[]): Parameters {
    const params = new Parameters();
    for (const map of maps) {
      for (const [name, value] of new Parameters(map)) params.set(name, value);
    }
    return params;
  }

  /** Serialize as `NAME=VALUE;NAME=VALUE` in insertion order */
  toIcal(): string {
    return this.entries()
      .map(([name, value]) => `${name}=${quoteParamValue(value)}`)
      .join(';');
  }
}

function isIterable<V>(init: CaselessInit<V>): init is Iterable<readonly [string, V]> {
  return Symbol.iterator in init;
}
