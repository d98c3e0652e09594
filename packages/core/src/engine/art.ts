/**
 * Articulations - shared handles to computed or deferred values
 */

import type { Name } from './name';

type ArtState<T> =
  | { kind: 'value'; value: T }
  | { kind: 'thunk'; compute: () => T };

export class Art<T> {
  readonly name: Name | undefined;
  private state: ArtState<T>;
  // Naive thunks recompute on every force
  private readonly cache: boolean;

  private constructor(name: Name | undefined, state: ArtState<T>, cache: boolean) {
    this.name = name;
    this.state = state;
    this.cache = cache;
  }

  static value<T>(name: Name | undefined, value: T): Art<T> {
    return new Art(name, { kind: 'value', value }, true);
  }

  static thunk<T>(name: Name | undefined, compute: () => T, cache: boolean): Art<T> {
    return new Art(name, { kind: 'thunk', compute }, cache);
  }

  get isForced(): boolean {
    return this.state.kind === 'value';
  }

  force(): T {
    const state = this.state;
    if (state.kind === 'value') return state.value;
    const value = state.compute();
    if (this.cache) {
      this.state = { kind: 'value', value };
    }
    return value;
  }
}

/** Wrap an already-computed value. */
export function put<T>(value: T): Art<T> {
  return Art.value(undefined, value);
}

export function force<T>(art: Art<T>): T {
  return art.force();
}
