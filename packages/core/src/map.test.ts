/**
 * Tests for the map view
 */

import { describe, it, expect } from 'vitest';
import {
  mapAppend,
  mapEmpty,
  mapFind,
  mapFindEntry,
  mapFold,
  mapHas,
  mapOfEntries,
  mapRemove,
  mapToEntries,
  mapUpdate,
  nameOfStr,
  trieEquals,
  trieSize,
} from './index';
import { errorCode, leafNodes } from './test-utils';

describe('TrieMap', () => {
  it('should find updated values', () => {
    let m = mapEmpty<string, number>({ minDepth: 1 });
    m = mapUpdate(m, 'a', 1, nameOfStr('a'));
    m = mapUpdate(m, 'b', 2, nameOfStr('b'));

    expect(mapFind(m, 'a')).toBe(1);
    expect(mapFind(m, 'b')).toBe(2);
    expect(mapFindEntry(m, 'b')).toEqual(['b', 2]);
  });

  it('should leave other keys untouched on update', () => {
    const m = mapOfEntries([
      ['a', 1],
      ['b', 2],
    ]);
    const m2 = mapUpdate(m, 'c', 3);

    for (const k of ['a', 'b', 'z']) {
      expect(mapFind(m2, k)).toBe(mapFind(m, k));
    }
    expect(mapFind(m2, 'c')).toBe(3);
  });

  it('should keep keys that differ only above the low byte', () => {
    const m = mapOfEntries([
      ['д', 1],
      ['4', 2],
    ]);

    expect(mapFind(m, 'д')).toBe(1);
    expect(mapFind(m, '4')).toBe(2);
  });

  it('should report absent keys', () => {
    const m = mapOfEntries([['a', 1]]);

    expect(mapFind(m, 'z')).toBeUndefined();
    expect(mapHas(m, 'z')).toBe(false);
    expect(mapHas(m, 'a')).toBe(true);
  });

  it('should replace the value of an existing key', () => {
    const m1 = mapOfEntries([['a', 1]], { minDepth: 1 });
    const m2 = mapUpdate(m1, 'a', 2);

    expect(mapFind(m2, 'a')).toBe(2);
    expect(trieSize(m2)).toBe(1);
    expect(mapFind(m1, 'a')).toBe(1);
  });

  it('should keep the stored entry when the same pair is written again', () => {
    const m1 = mapOfEntries([['a', 1]], { minDepth: 1 });
    const m2 = mapUpdate(m1, 'a', 1);

    expect(leafNodes(m2)[0]).toBe(leafNodes(m1)[0]);
  });

  it('should use structural keys', () => {
    const m = mapUpdate(mapEmpty<{ id: number }, string>(), { id: 1 }, 'one');

    expect(mapFind(m, { id: 1 })).toBe('one');
    expect(mapFind(m, { id: 2 })).toBeUndefined();
  });

  it('should fold over entries', () => {
    const m = mapOfEntries([
      ['a', 1],
      ['b', 2],
      ['c', 3],
    ]);

    expect(mapFold(m, 0, (_, v, acc) => acc + v)).toBe(6);
    expect(mapFold(m, '', (k, _, acc) => acc + k).split('').sort()).toEqual(['a', 'b', 'c']);
  });

  it('should list entries', () => {
    const entries: [string, number][] = [
      ['x', 10],
      ['y', 20],
    ];
    const m = mapOfEntries(entries);
    const listed = mapToEntries(m).sort(([p], [q]) => p.localeCompare(q));

    expect(listed).toEqual(entries);
  });

  it('should be order independent', () => {
    const m1 = mapOfEntries([
      ['a', 1],
      ['b', 2],
    ]);
    const m2 = mapOfEntries([
      ['b', 2],
      ['a', 1],
    ]);

    expect(trieEquals(m1, m2)).toBe(true);
    expect(trieEquals(m1, mapUpdate(m2, 'a', 3))).toBe(false);
  });

  it('should refuse removal and append', () => {
    const m = mapOfEntries([['a', 1]]);

    expect(errorCode(() => mapRemove(m, 'a'))).toBe('UNSUPPORTED');
    expect(errorCode(() => mapAppend(m, m))).toBe('UNSUPPORTED');
  });
});
