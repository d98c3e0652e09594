/**
 * Simple usage - sets, maps and an incremental refold
 */

import {
  createEngine,
  mapFind,
  mapOfEntries,
  mapUpdate,
  nameOfStr,
  setAdd,
  setEmpty,
  setMem,
  setToArray,
  showTrie,
  trieEquals,
  trieFoldSeq,
  type Name,
} from '../packages/core/src/index';

console.log('=== artrie: nominal hash tries ===\n');

// ===== Sets =====
console.log('1️⃣ Build a set, naming each insertion');
let s = setEmpty<number>({ minDepth: 1 });
s = setAdd(s, 7, nameOfStr('seven'));
s = setAdd(s, 1, nameOfStr('one'));
s = setAdd(s, 8, nameOfStr('eight'));
console.log('Elements:', setToArray(s));
console.log('mem(1):', setMem(s, 1), 'mem(2):', setMem(s, 2));
console.log('Shape:', showTrie(s));

// ===== Order independence =====
console.log('\n2️⃣ Same elements, other order');
let s2 = setEmpty<number>({ minDepth: 1 });
for (const n of [8, 7, 1]) s2 = setAdd(s2, n, nameOfStr(`n${n}`));
console.log('Equal:', trieEquals(s, s2));
console.log('✅ Shape depends only on the elements');

// ===== Maps =====
console.log('\n3️⃣ Maps replace values by key');
const m1 = mapOfEntries([
  ['a', 1],
  ['b', 2],
]);
const m2 = mapUpdate(m1, 'a', 100);
console.log('m1.a:', mapFind(m1, 'a'), 'm2.a:', mapFind(m2, 'a'));
console.log('✅ Persistent - m1 unchanged');

// ===== Incremental refold =====
console.log('\n4️⃣ Refold under an incremental engine');
const engine = createEngine({ mode: 'incremental' });
const sum = () =>
  trieFoldSeq(
    s,
    0,
    ([n], acc) => acc + n,
    acc => acc,
    (_: Name, acc) => acc,
    engine
  );
console.log('First sum:', sum(), engine.stats);
console.log('Second sum:', sum(), engine.stats);
console.log('✅ Second fold reused the named subtree');
