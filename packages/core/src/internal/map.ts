/**
 * Map view - a trie of [key, value] pairs placed by key
 */

import { nameUnit, type Name } from '../engine/name';
import { config, type MetaInput } from './config';
import { TrieError } from './errors';
import { trieElements, trieFold } from './fold';
import { hashValue, valueEquals } from './hash';
import { trieEmpty, trieExtend, trieFindBy } from './trie';
import type { Placement, Trie } from './types';

export type MapEntry<K, V> = readonly [K, V];

export type TrieMap<K, V> = Trie<MapEntry<K, V>>;

/** Address entries by key only, so an update replaces the stored value. */
export function keyPlacement<K, V>(): Placement<MapEntry<K, V>> {
  return {
    hash: ([key]) => hashValue(key),
    sameSlot: ([a], [b]) => valueEquals(a, b),
  };
}

export function mapEmpty<K, V>(meta: MetaInput = { minDepth: config.minDepth }): TrieMap<K, V> {
  return trieEmpty(meta);
}

export function mapUpdate<K, V>(map: TrieMap<K, V>, key: K, value: V, nm: Name = nameUnit()): TrieMap<K, V> {
  return trieExtend(nm, map, [key, value], keyPlacement<K, V>());
}

export function mapFindEntry<K, V>(map: TrieMap<K, V>, key: K): MapEntry<K, V> | undefined {
  return trieFindBy(map, hashValue(key), ([stored]) => valueEquals(stored, key));
}

export function mapFind<K, V>(map: TrieMap<K, V>, key: K): V | undefined {
  const entry = mapFindEntry(map, key);
  return entry === undefined ? undefined : entry[1];
}

export function mapHas<K, V>(map: TrieMap<K, V>, key: K): boolean {
  return mapFindEntry(map, key) !== undefined;
}

export function mapFold<K, V, R>(map: TrieMap<K, V>, init: R, fn: (key: K, value: V, acc: R) => R): R {
  return trieFold(map, init, ([key, value], acc) => fn(key, value, acc));
}

export function mapOfEntries<K, V>(
  entries: Iterable<readonly [K, V]>,
  meta: MetaInput = { minDepth: config.minDepth }
): TrieMap<K, V> {
  let map = mapEmpty<K, V>(meta);
  for (const [key, value] of entries) {
    map = mapUpdate(map, key, value);
  }
  return map;
}

export function mapToEntries<K, V>(map: TrieMap<K, V>): [K, V][] {
  return trieElements(map).map(([key, value]): [K, V] => [key, value]);
}

// Removal is not supported; rebuild the map without the key instead.
export function mapRemove<K, V>(_map: TrieMap<K, V>, _key: K): never {
  throw new TrieError('UNSUPPORTED', 'mapRemove is not supported');
}

export function mapAppend<K, V>(_a: TrieMap<K, V>, _b: TrieMap<K, V>): never {
  throw new TrieError('UNSUPPORTED', 'mapAppend is not supported');
}
