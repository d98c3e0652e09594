/**
 * Fixtures shared by the test files
 */

import { TrieError, type TrieErrorCode } from './internal/errors';
import type { Hashable } from './internal/hash';
import { trieElimRef } from './internal/trie';
import type { Trie, TrieLeaf } from './internal/types';

/** Element with a chosen placement hash, compared by id. */
export class Fixed implements Hashable {
  constructor(
    readonly id: number,
    readonly hash: number
  ) {}

  hashCode(): number {
    return this.hash;
  }

  equals(other: unknown): boolean {
    return other instanceof Fixed && other.id === this.id;
  }
}

export function leafNodes<X>(trie: Trie<X>): TrieLeaf<X>[] {
  return trieElimRef<X, TrieLeaf<X>[]>(trie, {
    nil: () => [],
    leaf: node => [node],
    bin: node => [...leafNodes(node.left), ...leafNodes(node.right)],
    root: node => leafNodes(node.trie),
    name: node => leafNodes(node.trie),
  });
}

// Deterministic reordering for order-independence checks
export function interleave<T>(items: readonly T[]): T[] {
  const out: T[] = [];
  for (let i = items.length - 1; i >= 0; i -= 2) out.push(items[i]);
  for (let i = items.length % 2 === 0 ? 0 : 1; i < items.length; i += 2) out.push(items[i]);
  return out;
}

/** Code of the TrieError thrown by `fn`; rethrows anything else. */
export function errorCode(fn: () => unknown): TrieErrorCode | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof TrieError) return err.code;
    throw err;
  }
  return undefined;
}
