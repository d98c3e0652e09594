/**
 * Engine - name-keyed memoization and cells
 *
 * Each engine owns its tables, so naive and incremental runs can share a
 * process without seeing each other's results.
 */

import { config, type EngineMode } from '../internal/config';
import { moduleLogger, type Logger } from '../internal/logger';
import { Art } from './art';
import type { Name } from './name';

interface MemoEntry {
  args: readonly unknown[];
  result: unknown;
}

export interface EngineStats {
  memoHits: number;
  memoMisses: number;
  cellWrites: number;
  cellChanges: number;
}

export interface EngineOptions {
  mode?: EngineMode;
  logger?: Logger;
}

function sameArgs(a: readonly unknown[], b: readonly unknown[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (!Object.is(a[i], b[i])) return false;
  }
  return true;
}

export class Engine {
  readonly mode: EngineMode;
  readonly stats: EngineStats = { memoHits: 0, memoMisses: 0, cellWrites: 0, cellChanges: 0 };

  private readonly memos = new Map<string, MemoEntry>();
  private readonly cells = new Map<string, unknown>();
  private readonly scope: Name[] = [];
  private readonly log: Logger;

  constructor(options: EngineOptions = {}) {
    this.mode = options.mode ?? config.engineMode;
    this.log = options.logger ?? moduleLogger('engine');
    this.log.debug({ mode: this.mode }, 'engine created');
  }

  get incremental(): boolean {
    return this.mode === 'incremental';
  }

  /** Register a named cell holding `value`. */
  cell<T>(nm: Name, value: T): Art<T> {
    this.stats.cellWrites++;
    if (this.incremental) {
      const key = this.scopedKey(nm);
      if (this.cells.has(key) && !Object.is(this.cells.get(key), value)) {
        this.stats.cellChanges++;
        this.log.debug({ key }, 'cell changed');
      }
      this.cells.set(key, value);
    }
    return Art.value(nm, value);
  }

  /** A named, demand-driven value; computed on first force. */
  thunk<T>(nm: Name, compute: () => T): Art<T> {
    return Art.thunk(nm, compute, this.incremental);
  }

  force<T>(art: Art<T>): T {
    return art.force();
  }

  /**
   * Run `compute` under the identity (`label`, `nm`). In incremental mode a
   * previous result is reused when it was computed from the same `args`
   * (compared by identity).
   */
  memo<R>(nm: Name, label: string, args: readonly unknown[], compute: () => R): R {
    if (!this.incremental) return compute();

    const key = `${label}@${this.scopedKey(nm)}`;
    const entry = this.memos.get(key);
    if (entry && sameArgs(entry.args, args)) {
      this.stats.memoHits++;
      // Entries under one key are written only by the call site that reads them
      return entry.result as R;
    }

    this.stats.memoMisses++;
    this.log.debug({ key }, 'memo miss');
    const result = compute();
    this.memos.set(key, { args, result });
    return result;
  }

  /** Run `body` with `nm` appended to the name scope. */
  ns<R>(nm: Name, body: () => R): R {
    this.scope.push(nm);
    try {
      return body();
    } finally {
      this.scope.pop();
    }
  }

  private scopedKey(nm: Name): string {
    if (this.scope.length === 0) return nm.key;
    return `${this.scope.map(s => s.key).join('/')}/${nm.key}`;
  }
}

export function createEngine(options: EngineOptions = {}): Engine {
  return new Engine(options);
}
