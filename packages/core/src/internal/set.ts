/**
 * Set view - a map whose values carry no information
 */

import { nameUnit, type Name } from '../engine/name';
import { config, type MetaInput } from './config';
import { trieElements, trieFold } from './fold';
import { hashValue } from './hash';
import { mapEmpty, mapUpdate, type TrieMap } from './map';
import { trieFind } from './trie';

export type Unit = null;
export const UNIT: Unit = null;

export type TrieSet<X> = TrieMap<X, Unit>;

export function setEmpty<X>(meta: MetaInput = { minDepth: config.minDepth }): TrieSet<X> {
  return mapEmpty(meta);
}

export function setAdd<X>(set: TrieSet<X>, elt: X, nm: Name = nameUnit()): TrieSet<X> {
  return mapUpdate(set, elt, UNIT, nm);
}

export function setMem<X>(set: TrieSet<X>, elt: X): boolean {
  return trieFind(set, [elt, UNIT], hashValue(elt)) !== undefined;
}

export function setFold<X, R>(set: TrieSet<X>, init: R, fn: (elt: X, acc: R) => R): R {
  return trieFold(set, init, ([elt], acc) => fn(elt, acc));
}

export function setOfArray<X>(elts: Iterable<X>, meta: MetaInput = { minDepth: config.minDepth }): TrieSet<X> {
  let set = setEmpty<X>(meta);
  for (const elt of elts) {
    set = setAdd(set, elt);
  }
  return set;
}

export function setToArray<X>(set: TrieSet<X>): X[] {
  return trieElements(set).map(([elt]) => elt);
}
