/**
 * Core constants for artrie data structures
 */

// Placement hashes are 32-bit; one bit is consumed per trie level
export const MAX_LEN = 32;

export const PLACEMENT_SEED = 42;

export const DEFAULT_MIN_DEPTH = 1;

// Base name forked by `trieEmpty`
export const EMPTY_NAME = 'empty';
