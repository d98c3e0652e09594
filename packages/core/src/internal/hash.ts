/**
 * Placement hashing and element equality
 * Structural on tuples and plain objects, identity on other objects
 */

import { PLACEMENT_SEED } from './constants';

// Identity hash caches
const OBJ_HASH = new WeakMap<object, number>();
let OBJ_SEQ = 1;
const SYM_HASH = new Map<symbol, number>();
let SYM_SEQ = 1;

/** Values that define their own hash and equality. */
export interface Hashable {
  hashCode(): number;
  equals(other: unknown): boolean;
}

export function isHashable(value: unknown): value is Hashable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'hashCode' in value &&
    typeof value.hashCode === 'function' &&
    'equals' in value &&
    typeof value.equals === 'function'
  );
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

// Splitmix32 finalizer
export function mix32(z: number): number {
  z = (z + 0x9e3779b9) | 0;
  z ^= z >>> 16;
  z = Math.imul(z, 0x85ebca6b);
  z ^= z >>> 13;
  z = Math.imul(z, 0xc2b2ae35);
  z ^= z >>> 16;
  return z >>> 0;
}

function mixBlock(h: number, k: number): number {
  k = Math.imul(k, 0xcc9e2d51);
  k = (k << 15) | (k >>> 17);
  k = Math.imul(k, 0x1b873593);
  h ^= k;
  h = (h << 13) | (h >>> 19);
  return (Math.imul(h, 5) + 0xe6546b64) | 0;
}

// Murmur3 32-bit hash over UTF-16 code units, two per block
export function murmur3(key: string, seed = 0): number {
  let h = seed ^ key.length;
  let i = 0;

  while (i + 2 <= key.length) {
    h = mixBlock(h, (key.charCodeAt(i) & 0xffff) | ((key.charCodeAt(i + 1) & 0xffff) << 16));
    i += 2;
  }

  if (i < key.length) {
    let k = key.charCodeAt(i) & 0xffff;
    k = Math.imul(k, 0xcc9e2d51);
    k = (k << 15) | (k >>> 17);
    k = Math.imul(k, 0x1b873593);
    h ^= k;
  }

  h ^= key.length;
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}

// Scratch view over one float64: [low word, high word] on little-endian hosts
const F64 = new Float64Array(1);
const F64_WORDS = new Uint32Array(F64.buffer);

// Hash of the full float64 bit pattern; -0 is folded into 0 and NaN is canonical
function hashNumber(n: number, seed: number): number {
  F64[0] = Object.is(n, -0) ? 0 : Number.isNaN(n) ? NaN : n;
  const lo = F64_WORDS[0];
  const hi = F64_WORDS[1];
  return mix32(mixBlock(mixBlock(seed ^ 8, lo), hi) ^ 8);
}

export function hashCombine(h: number, v: number): number {
  return mix32((Math.imul(h, 31) + v) | 0);
}

function identityHash(obj: object): number {
  let id = OBJ_HASH.get(obj);
  if (id === undefined) {
    id = OBJ_SEQ++;
    OBJ_HASH.set(obj, id);
  }
  return (id * 0x85ebca77) >>> 0;
}

/**
 * Fresh 32-bit placement hash of a value. Never cached on the value itself.
 */
export function hashValue(value: unknown, seed: number = PLACEMENT_SEED): number {
  switch (typeof value) {
    case 'string':
      return murmur3(value, seed);
    case 'number':
      return hashNumber(value, seed);
    case 'boolean':
      return ((value ? 0x27d4eb2d : 0x165667b1) ^ seed) >>> 0;
    case 'bigint':
      return murmur3(value.toString(), seed ^ 0x5bd1e995);
    case 'undefined':
      return (0x9747b28c ^ seed) >>> 0;
    case 'symbol': {
      let id = SYM_HASH.get(value);
      if (id === undefined) {
        id = SYM_SEQ++;
        SYM_HASH.set(value, id);
      }
      return (id * 0x9e3779b1) >>> 0;
    }
    case 'function':
      return identityHash(value);
    case 'object': {
      if (value === null) return (0x811c9dc5 ^ seed) >>> 0;
      if (isHashable(value)) return value.hashCode() >>> 0;
      if (Array.isArray(value)) {
        let h = mix32(seed ^ 0x3c6ef372);
        for (const item of value) {
          h = hashCombine(h, hashValue(item, seed));
        }
        return mix32(h ^ value.length);
      }
      if (isPlainObject(value)) {
        let h = mix32(seed ^ 0x1b873593);
        for (const key of Object.keys(value).sort()) {
          h = hashCombine(h, murmur3(key, seed));
          h = hashCombine(h, hashValue(Reflect.get(value, key), seed));
        }
        return h;
      }
      return identityHash(value);
    }
    default:
      return 0;
  }
}

/**
 * Element equality agreeing with `hashValue`.
 */
export function valueEquals(a: unknown, b: unknown): boolean {
  if (typeof a === 'number' && typeof b === 'number') {
    if (a === 0 && b === 0) return true;
  }
  if (Object.is(a, b)) return true;
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) {
    return false;
  }
  if (isHashable(a)) return a.equals(b);

  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!valueEquals(a[i], b[i])) return false;
    }
    return true;
  }

  if (isPlainObject(a) && !Array.isArray(b) && isPlainObject(b)) {
    const ka = Object.keys(a);
    const kb = Object.keys(b);
    if (ka.length !== kb.length) return false;
    for (const key of ka) {
      if (!Object.prototype.hasOwnProperty.call(b, key)) return false;
      if (!valueEquals(Reflect.get(a, key), Reflect.get(b, key))) return false;
    }
    return true;
  }

  return false;
}
