export type TrieErrorCode =
  | 'MALFORMED_ENTRY'
  | 'SPLIT_NON_LEAF'
  | 'HASH_EXHAUSTED'
  | 'PATH_OVERFLOW'
  | 'INVALID_META'
  | 'UNSUPPORTED';

/**
 * Raised on programmer misuse or a broken hash assumption.
 * Never retried: the operation that threw has produced nothing.
 */
export class TrieError extends Error {
  readonly code: TrieErrorCode;

  constructor(code: TrieErrorCode, message: string) {
    super(message);
    this.name = 'TrieError';
    this.code = code;
  }
}
