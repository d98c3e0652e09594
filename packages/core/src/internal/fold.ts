/**
 * Fold combinators over tries
 *
 * All folds go through `trieElimArg` / `trieElim`, so articulations are
 * forced in one place. `trieFoldSeq` and `trieFoldSeqNm` hand named
 * subtrees to the engine's memo table when one is given.
 */

import type { Engine } from '../engine/engine';
import type { Name } from '../engine/name';
import { bsEquals, bsToString, type BitString } from './bitstring';
import { hashCombine, hashValue, valueEquals } from './hash';
import { trieBin, trieElim, trieElimArg, trieForce, trieLeaf, trieNil, trieRoot } from './trie';
import type { Meta, Trie, TrieNode } from './types';

export interface FoldUpCases<X, R> {
  nil: (bs: BitString) => R;
  leaf: (bs: BitString, elt: X) => R;
  bin: (bs: BitString, left: R, right: R) => R;
  root: (meta: Meta, trie: R) => R;
  name: (nm: Name, trie: R) => R;
}

// =====================================================
// Unordered
// =====================================================

/**
 * Visit every leaf once. Branches are folded right-then-left; callers must
 * not depend on the order.
 */
export function trieFold<X, R>(trie: Trie<X>, init: R, leafFn: (elt: X, acc: R) => R): R {
  return trieElimArg<X, R, R>(trie, init, {
    nil: (_, acc) => acc,
    leaf: (_, elt, acc) => leafFn(elt, acc),
    bin: (_, left, right, acc) => trieFold(left, trieFold(right, acc, leafFn), leafFn),
    root: (_, t, acc) => trieFold(t, acc, leafFn),
    name: (_, t, acc) => trieFold(t, acc, leafFn),
  });
}

// =====================================================
// Sequential
// =====================================================

/**
 * In-order fold: left child, then `binFn`, then right child. A named
 * subtree is folded under the engine's memo table keyed on its name, then
 * passed through `nameFn`.
 */
export function trieFoldSeq<X, R>(
  trie: Trie<X>,
  init: R,
  leafFn: (elt: X, acc: R) => R,
  binFn: (acc: R) => R,
  nameFn: (nm: Name, acc: R) => R,
  engine?: Engine
): R {
  return trieElimArg<X, R, R>(trie, init, {
    nil: (_, acc) => acc,
    leaf: (_, elt, acc) => leafFn(elt, acc),
    bin: (_, left, right, acc) => {
      const mid = binFn(trieFoldSeq(left, acc, leafFn, binFn, nameFn, engine));
      return trieFoldSeq(right, mid, leafFn, binFn, nameFn, engine);
    },
    root: (_, t, acc) => trieFoldSeq(t, acc, leafFn, binFn, nameFn, engine),
    name: (nm, t, acc) => {
      const inner = () => trieFoldSeq(t, acc, leafFn, binFn, nameFn, engine);
      const res = engine ? engine.memo(nm, 'trieFoldSeq', [t, acc, leafFn, binFn, nameFn], inner) : inner();
      return nameFn(nm, res);
    },
  });
}

interface SeqNmState<R> {
  acc: R;
  // Name of the nearest enclosing Name node not yet handed to a leaf
  pending: Name | undefined;
}

function foldSeqNm<X, R>(
  trie: Trie<X>,
  state: SeqNmState<R>,
  leafFn: (elt: X, nm: Name | undefined, acc: R) => R,
  binFn: (acc: R) => R,
  nameFn: (nm: Name, acc: R) => R,
  engine: Engine | undefined
): SeqNmState<R> {
  return trieElimArg<X, SeqNmState<R>, SeqNmState<R>>(trie, state, {
    nil: (_, s) => s,
    leaf: (_, elt, s) => ({ acc: leafFn(elt, s.pending, s.acc), pending: undefined }),
    bin: (_, left, right, s) => {
      const l = foldSeqNm(left, s, leafFn, binFn, nameFn, engine);
      return foldSeqNm(right, { acc: binFn(l.acc), pending: l.pending }, leafFn, binFn, nameFn, engine);
    },
    root: (_, t, s) => foldSeqNm(t, s, leafFn, binFn, nameFn, engine),
    name: (nm, t, s) => {
      const inner = () => foldSeqNm(t, { acc: s.acc, pending: nm }, leafFn, binFn, nameFn, engine);
      const res = engine ? engine.memo(nm, 'trieFoldSeqNm', [t, s.acc, leafFn, binFn, nameFn], inner) : inner();
      return {
        acc: nameFn(nm, res.acc),
        pending: res.pending !== undefined && res.pending.equals(nm) ? s.pending : undefined,
      };
    },
  });
}

/**
 * `trieFoldSeq` that also hands each named subtree's name to the first leaf
 * visited beneath it; later leaves receive `undefined`.
 */
export function trieFoldSeqNm<X, R>(
  trie: Trie<X>,
  init: R,
  leafFn: (elt: X, nm: Name | undefined, acc: R) => R,
  binFn: (acc: R) => R,
  nameFn: (nm: Name, acc: R) => R,
  engine?: Engine
): R {
  return foldSeqNm(trie, { acc: init, pending: undefined }, leafFn, binFn, nameFn, engine).acc;
}

// =====================================================
// Bottom-up
// =====================================================

export function trieFoldUp<X, R>(trie: Trie<X>, cases: FoldUpCases<X, R>): R {
  return trieElim<X, R>(trie, {
    nil: bs => cases.nil(bs),
    leaf: (bs, elt) => cases.leaf(bs, elt),
    bin: (bs, left, right) => cases.bin(bs, trieFoldUp(left, cases), trieFoldUp(right, cases)),
    root: (meta, t) => cases.root(meta, trieFoldUp(t, cases)),
    name: (nm, t) => cases.name(nm, trieFoldUp(t, cases)),
  });
}

/** Bare copy: Name and Art wrappers stripped, shape and elements kept. */
export function trieCanonicalize<X>(trie: Trie<X>): Trie<X> {
  return trieFoldUp<X, Trie<X>>(trie, {
    nil: bs => trieNil(bs),
    leaf: (bs, elt) => trieLeaf(bs, elt),
    bin: (bs, left, right) => trieBin(bs, left, right),
    root: (meta, t) => trieRoot(meta, t),
    name: (_, t) => t,
  });
}

// =====================================================
// Comparison
// =====================================================

function unwrap<X>(trie: Trie<X>): TrieNode<X> {
  let node = trieForce(trie);
  while (node.kind === 'name') {
    node = trieForce(node.trie);
  }
  return node;
}

function sameShape<X>(a: Trie<X>, b: Trie<X>): boolean {
  const x = unwrap(a);
  const y = unwrap(b);
  switch (x.kind) {
    case 'nil':
      return y.kind === 'nil' && bsEquals(x.bs, y.bs);
    case 'leaf':
      return y.kind === 'leaf' && bsEquals(x.bs, y.bs) && valueEquals(x.elt, y.elt);
    case 'bin':
      return (
        y.kind === 'bin' &&
        bsEquals(x.bs, y.bs) &&
        sameShape(x.left, y.left) &&
        sameShape(x.right, y.right)
      );
    case 'root':
      return y.kind === 'root' && x.meta.minDepth === y.meta.minDepth && sameShape(x.trie, y.trie);
    case 'name':
      return false;
  }
}

/**
 * Set/map equality: insensitive to insertion order and to where Name/Art
 * wrappers occur.
 */
export function trieEquals<X>(a: Trie<X>, b: Trie<X>): boolean {
  return sameShape(trieCanonicalize(a), trieCanonicalize(b));
}

/** Hash agreeing with `trieEquals`. */
export function trieHash<X>(trie: Trie<X>): number {
  return trieFoldUp<X, number>(trie, {
    nil: bs => hashCombine(hashCombine(0x4e494c, bs.length), bs.value),
    leaf: (bs, elt) => hashCombine(hashCombine(hashValue(elt), bs.length), bs.value),
    bin: (bs, left, right) => hashCombine(hashCombine(hashCombine(right, left), bs.length), bs.value),
    root: (meta, t) => hashCombine(t, meta.minDepth),
    name: (_, t) => t,
  });
}

// =====================================================
// Inspection
// =====================================================

/** Elements in path order (left before right). */
export function trieElements<X>(trie: Trie<X>): X[] {
  const out: X[] = [];
  trieFoldSeq<X, X[]>(
    trie,
    out,
    (elt, acc) => {
      acc.push(elt);
      return acc;
    },
    acc => acc,
    (_, acc) => acc
  );
  return out;
}

export function trieSize<X>(trie: Trie<X>): number {
  return trieFold(trie, 0, (_, n) => n + 1);
}

/** Path length of every leaf, in path order. */
export function trieLeafDepths<X>(trie: Trie<X>): number[] {
  return trieFoldUp<X, number[]>(trie, {
    nil: () => [],
    leaf: bs => [bs.length],
    bin: (_, left, right) => [...left, ...right],
    root: (_, t) => t,
    name: (_, t) => t,
  });
}

export function showTrie<X>(trie: Trie<X>, show: (elt: X) => string = elt => JSON.stringify(elt)): string {
  return trieFoldUp<X, string>(trie, {
    nil: bs => `Nil${bsToString(bs)}`,
    leaf: (bs, elt) => `Leaf${bsToString(bs)}(${show(elt)})`,
    bin: (bs, left, right) => `Bin${bsToString(bs)}(${left}, ${right})`,
    root: (meta, t) => `Root{minDepth=${meta.minDepth}}(${t})`,
    name: (nm, t) => `Name[${nm.key}](${t})`,
  });
}
