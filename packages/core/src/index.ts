/**
 * artrie - nominal, probabilistically balanced hash tries
 *
 * - trieEmpty / trieExtend   → persistent trie, renamed on every insertion
 * - trieFind / trieIsEmpty   → lookup with transparent forcing
 * - trieFold*                → unordered, in-order (memoized by name) and bottom-up folds
 * - set* / map*              → set and map views over the same trie
 * - createEngine             → names, articulations and name-keyed memoization
 */

// Engine
export {
  Name,
  nameUnit,
  nameOfStr,
  nameOfUsize,
  namePair,
  nameFork,
  Art,
  put,
  force,
  Engine,
  createEngine,
  type EngineOptions,
  type EngineStats,
} from './engine';

// Trie, folds and views
export * from './internal';
