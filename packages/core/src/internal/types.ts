/**
 * Core type definitions
 */

import type { Art } from '../engine/art';
import type { Name } from '../engine/name';
import type { BitString } from './bitstring';

/** Per-trie configuration, fixed at creation. */
export interface Meta {
  readonly minDepth: number;
}

export interface TrieNil {
  readonly kind: 'nil';
  readonly bs: BitString;
}

export interface TrieLeaf<X> {
  readonly kind: 'leaf';
  readonly bs: BitString;
  readonly elt: X;
}

export interface TrieBin<X> {
  readonly kind: 'bin';
  readonly bs: BitString;
  readonly left: Trie<X>;
  readonly right: Trie<X>;
}

export interface TrieRoot<X> {
  readonly kind: 'root';
  readonly meta: Meta;
  readonly trie: Trie<X>;
}

export interface TrieName<X> {
  readonly kind: 'name';
  readonly name: Name;
  readonly trie: Trie<X>;
}

export interface TrieArt<X> {
  readonly kind: 'art';
  readonly art: Art<Trie<X>>;
}

export type Trie<X> = TrieNil | TrieLeaf<X> | TrieBin<X> | TrieRoot<X> | TrieName<X> | TrieArt<X>;

/** A trie node with its articulation forced. */
export type TrieNode<X> = Exclude<Trie<X>, TrieArt<X>>;

/**
 * How elements are addressed: the placement hash, and whether a stored
 * element occupies the same slot as an incoming one.
 */
export interface Placement<X> {
  hash(elt: X): number;
  sameSlot(stored: X, elt: X): boolean;
}

/** Case handlers; articulations are forced before any of them runs. */
export interface TrieCases<X, R> {
  nil: (bs: BitString) => R;
  leaf: (bs: BitString, elt: X) => R;
  bin: (bs: BitString, left: Trie<X>, right: Trie<X>) => R;
  root: (meta: Meta, trie: Trie<X>) => R;
  name: (nm: Name, trie: Trie<X>) => R;
}

export interface TrieArgCases<X, A, R> {
  nil: (bs: BitString, arg: A) => R;
  leaf: (bs: BitString, elt: X, arg: A) => R;
  bin: (bs: BitString, left: Trie<X>, right: Trie<X>, arg: A) => R;
  root: (meta: Meta, trie: Trie<X>, arg: A) => R;
  name: (nm: Name, trie: Trie<X>, arg: A) => R;
}

/** Handlers that receive the forced node itself. */
export interface TrieRefCases<X, R> {
  nil: (node: TrieNil) => R;
  leaf: (node: TrieLeaf<X>) => R;
  bin: (node: TrieBin<X>) => R;
  root: (node: TrieRoot<X>) => R;
  name: (node: TrieName<X>) => R;
}
