/**
 * Internal modules barrel export
 */

// Constants
export { MAX_LEN, PLACEMENT_SEED, DEFAULT_MIN_DEPTH, EMPTY_NAME } from './constants';

// Config, logging, errors
export {
  config,
  loadConfig,
  LOG_LEVELS,
  ENGINE_MODES,
  MetaInputSchema,
  type Config,
  type EngineMode,
  type MetaInput,
} from './config';
export { logger, moduleLogger, type Logger } from './logger';
export { TrieError, type TrieErrorCode } from './errors';

// Bit-strings
export {
  BS_EMPTY,
  bsPrepend,
  bsLength,
  bsBit,
  bsEquals,
  bsMask,
  bsToString,
  hashBit,
  type Bit,
  type BitString,
} from './bitstring';

// Hashing
export { hashValue, hashCombine, valueEquals, isHashable, mix32, murmur3, type Hashable } from './hash';

// Trie
export {
  makeMeta,
  elementPlacement,
  trieNil,
  trieLeaf,
  trieBin,
  trieRoot,
  trieName,
  trieArt,
  trieEmpty,
  trieSingleton,
  trieExtend,
  trieForce,
  trieElim,
  trieElimArg,
  trieElimRef,
  trieFind,
  trieFindBy,
  trieIsEmpty,
  trieMeta,
  trieSplitAtomic,
} from './trie';

// Folds
export {
  trieFold,
  trieFoldSeq,
  trieFoldSeqNm,
  trieFoldUp,
  trieCanonicalize,
  trieEquals,
  trieHash,
  trieElements,
  trieSize,
  trieLeafDepths,
  showTrie,
  type FoldUpCases,
} from './fold';

// Map & Set views
export {
  keyPlacement,
  mapEmpty,
  mapUpdate,
  mapFind,
  mapFindEntry,
  mapHas,
  mapFold,
  mapOfEntries,
  mapToEntries,
  mapRemove,
  mapAppend,
  type MapEntry,
  type TrieMap,
} from './map';
export {
  UNIT,
  setEmpty,
  setAdd,
  setMem,
  setFold,
  setOfArray,
  setToArray,
  type Unit,
  type TrieSet,
} from './set';

// Types
export type {
  Meta,
  Placement,
  Trie,
  TrieNode,
  TrieNil,
  TrieLeaf,
  TrieBin,
  TrieRoot,
  TrieName,
  TrieArt,
  TrieCases,
  TrieArgCases,
  TrieRefCases,
} from './types';
