/**
 * SharedHandle - shared ownership with a multiple-reader / single-writer discipline.
 *
 * JavaScript has one thread per realm, so there is nothing to block on. What the
 * handle enforces instead is the access pattern: any number of nested `read`
 * sections, or exactly one `write` section, never both. A write attempted while a
 * read is open (for example from inside a render callback) throws `LockError`.
 *
 * Listeners run after a write section completes, never inside it, which lets a
 * renderer schedule a repaint without rendering re-entrantly.
 */

import { LockError } from '../errors';

export type SharedHandleListener<T> = (value: T) => void;

export interface SharedHandle<T> {
  /** Number of open read sections. */
  readonly readers: number;
  readonly writing: boolean;
  /** Bumped once per completed write. */
  readonly version: number;
  read<R>(fn: (value: T) => R): R;
  write<R>(fn: (value: T) => R): R;
  /**
   * Registers a listener called after every completed write. Returns an unsubscribe function.
   */
  subscribe(listener: SharedHandleListener<T>): () => void;
}

export function createSharedHandle<T>(value: T, label: string = 'SharedHandle'): SharedHandle<T> {
  let readers = 0;
  let writing = false;
  let version = 0;
  const listeners = new Set<SharedHandleListener<T>>();

  const notify = (): void => {
    for (const listener of Array.from(listeners)) {
      try {
        listener(value);
      } catch (error) {
        console.error(`${label}: Error in change listener:`, error);
      }
    }
  };

  const handle: SharedHandle<T> = {
    get readers() {
      return readers;
    },

    get writing() {
      return writing;
    },

    get version() {
      return version;
    },

    read(fn) {
      if (writing) {
        throw new LockError(`${label}: cannot read while a write is in progress.`);
      }
      readers++;
      try {
        return fn(value);
      } finally {
        readers--;
      }
    },

    write(fn) {
      if (writing) {
        throw new LockError(`${label}: a write is already in progress.`);
      }
      if (readers > 0) {
        throw new LockError(`${label}: cannot write while ${readers} reader(s) are active.`);
      }
      writing = true;
      let completed = false;
      try {
        const result = fn(value);
        completed = true;
        return result;
      } finally {
        writing = false;
        // A write that threw is not announced.
        if (completed) {
          version++;
          notify();
        }
      }
    },

    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };

  return handle;
}
