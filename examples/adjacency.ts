/**
 * Adjacency map - a directed graph as a map from node to successor set
 */

import {
  mapEmpty,
  mapFind,
  mapToEntries,
  mapUpdate,
  namePair,
  nameOfStr,
  setAdd,
  setEmpty,
  setToArray,
  trieFoldSeq,
  type TrieMap,
  type TrieSet,
} from '../packages/core/src/index';

type Graph = TrieMap<string, TrieSet<string>>;

function addEdge(g: Graph, from: string, to: string): Graph {
  const succs = mapFind(g, from) ?? setEmpty<string>({ minDepth: 1 });
  const nm = namePair(nameOfStr(from), nameOfStr(to));
  return mapUpdate(g, from, setAdd(succs, to, nm), nm);
}

function reverse(g: Graph): Graph {
  return trieFoldSeq(
    g,
    mapEmpty<string, TrieSet<string>>({ minDepth: 1 }),
    ([from, succs], acc) => setToArray(succs).reduce((r, to) => addEdge(r, to, from), acc),
    acc => acc,
    (_, acc) => acc
  );
}

function show(g: Graph): string {
  return mapToEntries(g)
    .map(([from, succs]) => `${from} -> ${setToArray(succs).sort().join(', ')}`)
    .sort()
    .join('\n');
}

let g: Graph = mapEmpty({ minDepth: 1 });
for (const [from, to] of [
  ['a', 'b'],
  ['a', 'c'],
  ['b', 'c'],
  ['c', 'a'],
]) {
  g = addEdge(g, from, to);
}

console.log('=== Graph ===');
console.log(show(g));
console.log('\n=== Reversed ===');
console.log(show(reverse(g)));
