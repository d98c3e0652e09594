/**
 * Trie - probabilistically balanced, nominal hash trie
 *
 * Every `trieExtend` rewraps its result as Name(Art(Root(meta, Name(Art(...)))))
 * so an engine can cache each insertion on its own. Only the path from the
 * root to the touched leaf is rebuilt; siblings keep their wrappers.
 */

import { put, type Art } from '../engine/art';
import { nameFork, nameOfStr, type Name } from '../engine/name';
import { BS_EMPTY, bsPrepend, bsToString, hashBit, type BitString } from './bitstring';
import { MetaInputSchema, type MetaInput } from './config';
import { EMPTY_NAME, MAX_LEN } from './constants';
import { TrieError } from './errors';
import { hashValue, valueEquals } from './hash';
import { moduleLogger } from './logger';
import type {
  Meta,
  Placement,
  Trie,
  TrieArgCases,
  TrieCases,
  TrieNode,
  TrieRefCases,
  TrieRoot,
} from './types';

const log = moduleLogger('trie');

// =====================================================
// Meta
// =====================================================

/**
 * Validate and clamp `minDepth` to [0, MAX_LEN]. Out-of-range values are
 * clamped with a warning; an in-range non-integer is rejected.
 */
export function makeMeta(input: MetaInput): Meta {
  const parsed = MetaInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new TrieError('INVALID_META', `Invalid trie meta: ${parsed.error.message}`);
  }
  const given = parsed.data.minDepth;
  if (given > MAX_LEN) {
    log.warn({ given, max: MAX_LEN }, `Cannot make a trie with minDepth > ${MAX_LEN}; clamping`);
    return { minDepth: MAX_LEN };
  }
  if (given < 0) {
    log.warn({ given }, 'Cannot make a trie with negative minDepth; clamping to 0');
    return { minDepth: 0 };
  }
  if (!Number.isInteger(given)) {
    throw new TrieError('INVALID_META', `Invalid trie meta: minDepth must be an integer, got ${given}`);
  }
  return { minDepth: given };
}

// =====================================================
// Placement
// =====================================================

export function elementPlacement<X>(): Placement<X> {
  return {
    hash: elt => hashValue(elt),
    sameSlot: valueEquals,
  };
}

// =====================================================
// Introduction
// =====================================================

export function trieNil<X>(bs: BitString): Trie<X> {
  return { kind: 'nil', bs };
}

export function trieLeaf<X>(bs: BitString, elt: X): Trie<X> {
  return { kind: 'leaf', bs, elt };
}

export function trieBin<X>(bs: BitString, left: Trie<X>, right: Trie<X>): Trie<X> {
  return { kind: 'bin', bs, left, right };
}

export function trieRoot<X>(meta: Meta, trie: Trie<X>): Trie<X> {
  return { kind: 'root', meta, trie };
}

export function trieName<X>(name: Name, trie: Trie<X>): Trie<X> {
  return { kind: 'name', name, trie };
}

export function trieArt<X>(art: Art<Trie<X>>): Trie<X> {
  return { kind: 'art', art };
}

export function trieEmpty<X>(meta: MetaInput): Trie<X> {
  const m = makeMeta(meta);
  const [nm1, nm2] = nameFork(nameOfStr(EMPTY_NAME));
  return trieName(nm1, trieArt(put(trieRoot(m, trieName(nm2, trieArt(put(trieNil<X>(BS_EMPTY))))))));
}

export function trieSingleton<X>(meta: MetaInput, nm: Name, elt: X): Trie<X> {
  return trieExtend(nm, trieEmpty<X>(meta), elt);
}

// =====================================================
// Elimination
// =====================================================

/** Force articulations until a non-articulated node is reached. */
export function trieForce<X>(trie: Trie<X>): TrieNode<X> {
  let node = trie;
  while (node.kind === 'art') {
    node = node.art.force();
  }
  return node;
}

export function trieElim<X, R>(trie: Trie<X>, cases: TrieCases<X, R>): R {
  const node = trieForce(trie);
  switch (node.kind) {
    case 'nil':
      return cases.nil(node.bs);
    case 'leaf':
      return cases.leaf(node.bs, node.elt);
    case 'bin':
      return cases.bin(node.bs, node.left, node.right);
    case 'root':
      return cases.root(node.meta, node.trie);
    case 'name':
      return cases.name(node.name, node.trie);
  }
}

export function trieElimArg<X, A, R>(trie: Trie<X>, arg: A, cases: TrieArgCases<X, A, R>): R {
  const node = trieForce(trie);
  switch (node.kind) {
    case 'nil':
      return cases.nil(node.bs, arg);
    case 'leaf':
      return cases.leaf(node.bs, node.elt, arg);
    case 'bin':
      return cases.bin(node.bs, node.left, node.right, arg);
    case 'root':
      return cases.root(node.meta, node.trie, arg);
    case 'name':
      return cases.name(node.name, node.trie, arg);
  }
}

export function trieElimRef<X, R>(trie: Trie<X>, cases: TrieRefCases<X, R>): R {
  const node = trieForce(trie);
  switch (node.kind) {
    case 'nil':
      return cases.nil(node);
    case 'leaf':
      return cases.leaf(node);
    case 'bin':
      return cases.bin(node);
    case 'root':
      return cases.root(node);
    case 'name':
      return cases.name(node);
  }
}

// =====================================================
// Lookup
// =====================================================

/**
 * Descend by successive low-order bits of `hash` (even = left) and return
 * the first leaf element accepted by `matches`.
 */
export function trieFindBy<X>(trie: Trie<X>, hash: number, matches: (stored: X) => boolean): X | undefined {
  return trieElim<X, X | undefined>(trie, {
    nil: () => undefined,
    leaf: (_, elt) => (matches(elt) ? elt : undefined),
    bin: (_, left, right) =>
      (hash & 1) === 0 ? trieFindBy(left, hash >>> 1, matches) : trieFindBy(right, hash >>> 1, matches),
    root: (_, t) => trieFindBy(t, hash, matches),
    name: (_, t) => trieFindBy(t, hash, matches),
  });
}

export function trieFind<X>(trie: Trie<X>, elt: X, hashIndex: number): X | undefined {
  return trieFindBy(trie, hashIndex, stored => valueEquals(stored, elt));
}

export function trieIsEmpty<X>(trie: Trie<X>): boolean {
  return trieElim(trie, {
    nil: () => true,
    leaf: () => false,
    bin: (_, left, right) => trieIsEmpty(left) && trieIsEmpty(right),
    root: (_, t) => trieIsEmpty(t),
    name: (_, t) => trieIsEmpty(t),
  });
}

/** Meta of the root reached through the trie's named articulations. */
export function trieMeta<X>(trie: Trie<X>): Meta {
  return findRoot(trie).meta;
}

// =====================================================
// Splitting
// =====================================================

/**
 * Turn a leaf into a branch; the stored element moves to the child chosen
 * by its own hash bit at the leaf's depth.
 */
export function trieSplitAtomic<X>(trie: Trie<X>, placement: Placement<X> = elementPlacement()): Trie<X> {
  switch (trie.kind) {
    case 'nil':
    case 'bin':
      return trie;
    case 'leaf': {
      const { bs, elt } = trie;
      const bs0 = bsPrepend(0, bs);
      const bs1 = bsPrepend(1, bs);
      if (hashBit(placement.hash(elt), bs.length) === 1) {
        return trieBin(bs, trieNil<X>(bs0), trieLeaf(bs1, elt));
      }
      return trieBin(bs, trieLeaf(bs0, elt), trieNil<X>(bs1));
    }
    default:
      throw new TrieError('SPLIT_NON_LEAF', `Bad split: ${trie.kind} node must be forced and unwrapped first`);
  }
}

// =====================================================
// Extension
// =====================================================

function findRoot<X>(trie: Trie<X>): TrieRoot<X> {
  if (trie.kind !== 'name' || trie.trie.kind !== 'art') {
    throw new TrieError('MALFORMED_ENTRY', `Non-name node at entry to trieExtend: ${trie.kind}`);
  }
  const inner = trieForce(trie.trie);
  if (inner.kind === 'root') return inner;
  if (inner.kind === 'name') return findRoot(inner);
  throw new TrieError('MALFORMED_ENTRY', `Non-root node at entry to trieExtend: ${inner.kind}`);
}

function place<X>(
  meta: Meta,
  trie: Trie<X>,
  bs: BitString,
  elt: X,
  hash: number,
  placement: Placement<X>
): Trie<X> {
  const node = trieForce(trie);
  switch (node.kind) {
    case 'nil': {
      if (bs.length < meta.minDepth) {
        const bs0 = bsPrepend(0, bs);
        const bs1 = bsPrepend(1, bs);
        const mt0 = trieNil<X>(bs0);
        const mt1 = trieNil<X>(bs1);
        if ((hash & 1) === 0) {
          return trieBin(bs, place(meta, mt0, bs0, elt, hash >>> 1, placement), mt1);
        }
        return trieBin(bs, mt0, place(meta, mt1, bs1, elt, hash >>> 1, placement));
      }
      return trieLeaf(bs, elt);
    }
    case 'leaf': {
      if (placement.sameSlot(node.elt, elt)) {
        return valueEquals(node.elt, elt) ? node : trieLeaf(bs, elt);
      }
      if (bs.length >= MAX_LEN) {
        throw new TrieError(
          'HASH_EXHAUSTED',
          `Hash space exhausted at ${bsToString(bs)}: distinct elements share all ${MAX_LEN} hash bits`
        );
      }
      return place(meta, trieSplitAtomic(node, placement), bs, elt, hash, placement);
    }
    case 'bin': {
      if ((hash & 1) === 0) {
        return trieBin(bs, place(meta, node.left, bsPrepend(0, bs), elt, hash >>> 1, placement), node.right);
      }
      return trieBin(bs, node.left, place(meta, node.right, bsPrepend(1, bs), elt, hash >>> 1, placement));
    }
    case 'name':
      return place(meta, node.trie, bs, elt, hash, placement);
    case 'root':
      throw new TrieError('MALFORMED_ENTRY', `Nested root found at ${bsToString(bs)} in trieExtend`);
  }
}

/**
 * Insert `elt`, returning a new trie; `trie` stays valid. Must be entered
 * with the Name(Art(...)) shape produced by `trieEmpty` or a prior extend.
 */
export function trieExtend<X>(
  nm: Name,
  trie: Trie<X>,
  elt: X,
  placement: Placement<X> = elementPlacement()
): Trie<X> {
  const [nmRoot, nmRec] = nameFork(nm);
  const { meta, trie: subtree } = findRoot(trie);
  const updated = place(meta, subtree, BS_EMPTY, elt, placement.hash(elt), placement);
  return trieName(nmRoot, trieArt(put(trieRoot(meta, trieName(nmRec, trieArt(put(updated)))))));
}
