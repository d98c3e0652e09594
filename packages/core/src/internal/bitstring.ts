/**
 * Bit-string paths - trie addresses, one bit per level
 *
 * Bit `i` of `value` is the branch taken at depth `i` (0 = left, 1 = right),
 * so a leaf's path equals the low `length` bits of its placement hash.
 */

import { MAX_LEN } from './constants';
import { TrieError } from './errors';

export type Bit = 0 | 1;

export interface BitString {
  readonly length: number;
  readonly value: number;
}

export const BS_EMPTY: BitString = { length: 0, value: 0 };

export function bsPrepend(bit: Bit, bs: BitString): BitString {
  if (bs.length >= MAX_LEN) {
    throw new TrieError('PATH_OVERFLOW', `Cannot extend a bit-string of length ${bs.length} past ${MAX_LEN}`);
  }
  return {
    length: bs.length + 1,
    value: (bs.value | (bit << bs.length)) >>> 0,
  };
}

export function bsLength(bs: BitString): number {
  return bs.length;
}

export function bsBit(bs: BitString, index: number): Bit {
  return ((bs.value >>> index) & 1) === 0 ? 0 : 1;
}

export function bsEquals(a: BitString, b: BitString): boolean {
  return a.length === b.length && a.value === b.value;
}

// Bit of a placement hash consumed at `depth`
export function hashBit(hash: number, depth: number): Bit {
  return ((hash >>> depth) & 1) === 0 ? 0 : 1;
}

// Low `length` bits of a hash, as a path value
export function bsMask(hash: number, length: number): number {
  if (length >= MAX_LEN) return hash >>> 0;
  return (hash & ((1 << length) - 1)) >>> 0;
}

export function bsToString(bs: BitString): string {
  let out = '';
  for (let i = 0; i < bs.length; i++) {
    out += bsBit(bs, i);
  }
  return `<${out}>`;
}
