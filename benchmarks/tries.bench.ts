/**
 * Benchmark: trie construction and folds, naive vs incremental engine
 */

import { bench, describe } from 'vitest';
import {
  createEngine,
  mapOfEntries,
  mapFind,
  nameOfUsize,
  setMem,
  setOfArray,
  trieEmpty,
  trieExtend,
  trieFoldSeq,
  type Engine,
  type Name,
  type Trie,
} from '../packages/core/src/index';

// ===== Setup =====
const SIZE = 1000;
const items = Array.from({ length: SIZE }, (_, i) => i);
const nativeSet = new Set(items);
const trieSet = setOfArray(items, { minDepth: 4 });
const trieMap = mapOfEntries(
  items.map((i): [number, string] => [i, `v${i}`]),
  { minDepth: 4 }
);

// Each input goes through a named cell before insertion
function pushInputs(engine: Engine, count: number): Trie<number> {
  let t = trieEmpty<number>({ minDepth: 4 });
  for (let i = 0; i < count; i++) {
    const nm = nameOfUsize(i);
    const input = engine.force(engine.cell(nm, i));
    t = trieExtend(nm, t, input);
  }
  return t;
}

function sum(t: Trie<number>, engine: Engine): number {
  return trieFoldSeq(
    t,
    0,
    (n, acc) => acc + n,
    acc => acc,
    (_: Name, acc) => acc,
    engine
  );
}

describe(`Build ${SIZE} elements`, () => {
  bench('Native Set', () => {
    const s = new Set<number>();
    for (const i of items) s.add(i);
    return s;
  });

  bench('setOfArray()', () => {
    return setOfArray(items, { minDepth: 4 });
  });

  bench('trieExtend() with named cells', () => {
    return pushInputs(createEngine({ mode: 'incremental' }), SIZE);
  });
});

describe('Membership', () => {
  bench('Native Set.has', () => {
    let hits = 0;
    for (const i of items) if (nativeSet.has(i)) hits++;
    return hits;
  });

  bench('setMem()', () => {
    let hits = 0;
    for (const i of items) if (setMem(trieSet, i)) hits++;
    return hits;
  });

  bench('mapFind()', () => {
    let hits = 0;
    for (const i of items) if (mapFind(trieMap, i) !== undefined) hits++;
    return hits;
  });
});

// ===== Refold =====
const naive = createEngine({ mode: 'naive' });
const incremental = createEngine({ mode: 'incremental' });
const built = pushInputs(incremental, SIZE);
sum(built, incremental);

describe('Refold unchanged trie', () => {
  bench('naive engine', () => {
    return sum(built, naive);
  });

  bench('incremental engine', () => {
    return sum(built, incremental);
  });
});
