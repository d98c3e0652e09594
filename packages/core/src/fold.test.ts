/**
 * Tests for folds, canonical forms and equality
 */

import { describe, it, expect } from 'vitest';
import {
  BS_EMPTY,
  createEngine,
  nameOfStr,
  put,
  showTrie,
  trieArt,
  trieBin,
  trieCanonicalize,
  trieElements,
  trieEmpty,
  trieEquals,
  trieExtend,
  trieFold,
  trieFoldSeq,
  trieFoldSeqNm,
  trieFoldUp,
  trieHash,
  trieLeaf,
  trieName,
  trieNil,
  trieRoot,
  type Name,
  type Trie,
} from './index';
import { Fixed, interleave } from './test-utils';

const x = nameOfStr('x');

function build<X>(minDepth: number, elts: readonly X[], nm: Name = x): Trie<X> {
  let t = trieEmpty<X>({ minDepth });
  for (const elt of elts) {
    t = trieExtend(nm, t, elt);
  }
  return t;
}

const range = (n: number) => Array.from({ length: n }, (_, i) => i);
const a = new Fixed(1, 0);
const b = new Fixed(2, 1);

function named(key: string, trie: Trie<number>): Trie<number> {
  return trieName(nameOfStr(key), trieArt(put(trie)));
}

describe('trieFold', () => {
  it('should visit every element once', () => {
    expect(trieFold(build(1, range(11)), 0, (n, acc) => acc + n)).toBe(55);
  });

  it('should fold right before left', () => {
    const ids = trieFold<Fixed, number[]>(build(1, [a, b]), [], (f, acc) => [...acc, f.id]);

    expect(ids).toEqual([2, 1]);
  });
});

describe('trieFoldSeq', () => {
  const ignoreName = (_: Name, acc: number) => acc;

  it('should fold left to right', () => {
    const ids = trieFoldSeq<Fixed, number[]>(
      build(1, [b, a]),
      [],
      (f, acc) => [...acc, f.id],
      acc => acc,
      (_, acc) => acc
    );

    expect(ids).toEqual([1, 2]);
  });

  it('should call binFn once per branch', () => {
    const bins = trieFoldSeq(build(2, [a, b]), 0, (_, acc) => acc, acc => acc + 1, ignoreName);

    expect(bins).toBe(3);
  });

  it('should pass names innermost first', () => {
    const names = trieFoldSeq<Fixed, string[]>(
      build(1, [a]),
      [],
      (_, acc) => acc,
      acc => acc,
      (nm, acc) => [...acc, nm.key]
    );

    expect(names).toEqual(['"x".1', '"x".0']);
  });

  it('should reuse a named subtree on refold', () => {
    const engine = createEngine({ mode: 'incremental' });
    const t = build(1, [a, b]);
    let leafCalls = 0;
    const leafFn = (f: Fixed, acc: number) => {
      leafCalls++;
      return acc + f.id;
    };
    const binFn = (acc: number) => acc;
    const nameFn = (_: Name, acc: number) => acc;

    expect(trieFoldSeq(t, 0, leafFn, binFn, nameFn, engine)).toBe(3);
    expect(leafCalls).toBe(2);
    expect(engine.stats.memoMisses).toBe(2);

    expect(trieFoldSeq(t, 0, leafFn, binFn, nameFn, engine)).toBe(3);
    expect(leafCalls).toBe(2);
    expect(engine.stats.memoHits).toBe(1);
  });

  it('should recompute only the changed named subtree', () => {
    const left = named('l', trieLeaf({ length: 1, value: 0 }, 1));
    const v1 = trieBin(BS_EMPTY, left, named('r', trieLeaf({ length: 1, value: 1 }, 2)));
    const v2 = trieBin(BS_EMPTY, left, named('r', trieLeaf({ length: 1, value: 1 }, 5)));

    const run = (mode: 'naive' | 'incremental') => {
      const engine = createEngine({ mode });
      let leafCalls = 0;
      const leafFn = (n: number, acc: number) => {
        leafCalls++;
        return acc + n;
      };
      const binFn = (acc: number) => acc;
      const nameFn = (_: Name, acc: number) => acc;
      const sums = [
        trieFoldSeq(v1, 0, leafFn, binFn, nameFn, engine),
        trieFoldSeq(v2, 0, leafFn, binFn, nameFn, engine),
      ];
      return { sums, leafCalls, stats: engine.stats };
    };

    const incremental = run('incremental');
    expect(incremental.sums).toEqual([3, 6]);
    expect(incremental.leafCalls).toBe(3);
    expect(incremental.stats.memoHits).toBe(1);
    expect(incremental.stats.memoMisses).toBe(3);

    const naive = run('naive');
    expect(naive.sums).toEqual([3, 6]);
    expect(naive.leafCalls).toBe(4);
  });
});

describe('trieFoldSeqNm', () => {
  type Seen = [number, string | undefined][];
  const record = (n: number, nm: Name | undefined, acc: Seen): Seen => [...acc, [n, nm?.key]];
  const same = (acc: Seen) => acc;
  const sameNamed = (_: Name, acc: Seen) => acc;

  it('should hand each name to the first leaf under it', () => {
    const t = trieBin(
      BS_EMPTY,
      named('l', trieLeaf({ length: 1, value: 0 }, 1)),
      named('r', trieLeaf({ length: 1, value: 1 }, 2))
    );

    expect(trieFoldSeqNm<number, Seen>(t, [], record, same, sameNamed)).toEqual([
      [1, '"l"'],
      [2, '"r"'],
    ]);
  });

  it('should give later leaves no name', () => {
    const seen = trieFoldSeqNm<Fixed, Seen>(
      build(1, [a, b]),
      [],
      (f, nm, acc) => record(f.id, nm, acc),
      same,
      sameNamed
    );

    expect(seen).toEqual([
      [1, '"x".1'],
      [2, undefined],
    ]);
  });

  it('should restore the outer name past an empty named subtree', () => {
    const t = named(
      'o',
      trieBin(BS_EMPTY, named('l', trieNil({ length: 1, value: 0 })), trieLeaf({ length: 1, value: 1 }, 7))
    );

    expect(trieFoldSeqNm<number, Seen>(t, [], record, same, sameNamed)).toEqual([[7, '"o"']]);
  });

  it('should give the same names when memoized', () => {
    const engine = createEngine({ mode: 'incremental' });
    const t = trieBin(
      BS_EMPTY,
      named('l', trieLeaf({ length: 1, value: 0 }, 1)),
      named('r', trieLeaf({ length: 1, value: 1 }, 2))
    );
    const first = trieFoldSeqNm<number, Seen>(t, [], record, same, sameNamed, engine);
    const second = trieFoldSeqNm<number, Seen>(t, [], record, same, sameNamed, engine);

    expect(second).toEqual(first);
  });
});

describe('canonical form', () => {
  const showId = (f: Fixed) => String(f.id);

  it('should strip names and articulations', () => {
    const t = trieCanonicalize(build(1, [a, b]));

    expect(showTrie(t, showId)).toBe('Root{minDepth=1}(Bin<>(Leaf<0>(1), Leaf<1>(2)))');
    expect(t).toEqual(
      trieRoot({ minDepth: 1 }, trieBin(BS_EMPTY, trieLeaf({ length: 1, value: 0 }, a), trieLeaf({ length: 1, value: 1 }, b)))
    );
  });

  it('should fold bottom-up', () => {
    const count = trieFoldUp<number, number>(build(1, range(8)), {
      nil: () => 0,
      leaf: () => 1,
      bin: (_, left, right) => left + right,
      root: (_, t) => t,
      name: (_, t) => t,
    });

    expect(count).toBe(8);
  });

  it('should list elements in path order', () => {
    expect(trieElements(build(1, [b, a]))).toEqual([a, b]);
  });
});

describe('trieEquals', () => {
  it('should treat empty tries alike', () => {
    expect(trieEquals(trieEmpty({ minDepth: 1 }), trieEmpty({ minDepth: 1 }))).toBe(true);
    expect(trieEquals(trieEmpty({ minDepth: 1 }), trieEmpty({ minDepth: 2 }))).toBe(false);
  });

  it('should ignore insertion order and names', () => {
    const t1 = build(1, range(20));
    const t2 = build(1, interleave(range(20)), nameOfStr('y'));

    expect(trieEquals(t1, t2)).toBe(true);
    expect(trieHash(t1)).toBe(trieHash(t2));
  });

  it('should tell different contents and depths apart', () => {
    const t = build(1, range(20));

    expect(trieEquals(t, build(1, range(19)))).toBe(false);
    expect(trieEquals(t, build(2, range(20)))).toBe(false);
    expect(trieEquals(build(1, [1]), build(1, [2]))).toBe(false);
  });

  it('should hash canonical forms identically', () => {
    const t = build(3, range(12));

    expect(trieHash(trieCanonicalize(t))).toBe(trieHash(t));
  });
});
