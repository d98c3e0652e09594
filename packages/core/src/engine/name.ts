/**
 * Names - stable identities for incremental reuse
 *
 * A name is a value: equal constructions give equal names, and `nameFork`
 * is a pure function of its input.
 */

import { murmur3, type Hashable } from '../internal/hash';

export class Name implements Hashable {
  /** Canonical encoding; two names are equal iff their keys are equal. */
  readonly key: string;

  private constructor(key: string) {
    this.key = key;
  }

  static fromKey(key: string): Name {
    return new Name(key);
  }

  hashCode(): number {
    return murmur3(this.key, 0x6e616d65);
  }

  equals(other: unknown): boolean {
    return other instanceof Name && other.key === this.key;
  }

  toString(): string {
    return this.key;
  }
}

const UNIT = Name.fromKey('()');

export function nameUnit(): Name {
  return UNIT;
}

export function nameOfStr(s: string): Name {
  return Name.fromKey(JSON.stringify(s));
}

export function nameOfUsize(n: number): Name {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new RangeError(`nameOfUsize expects a non-negative integer, got ${n}`);
  }
  return Name.fromKey(`#${n}`);
}

export function namePair(a: Name, b: Name): Name {
  return Name.fromKey(`(${a.key},${b.key})`);
}

/**
 * Two children of `nm`, distinct from each other and from the children
 * of any other name.
 */
export function nameFork(nm: Name): [Name, Name] {
  return [Name.fromKey(`${nm.key}.0`), Name.fromKey(`${nm.key}.1`)];
}
