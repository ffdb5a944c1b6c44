import type { FrameSource } from '../RenderScheduler';

/**
 * In-process frame source for tests: frames fire only when `advance` is called.
 */
export interface ManualFrameSource {
  readonly source: FrameSource;
  readonly pendingCount: number;
  /** Moves the clock forward and fires every frame requested so far. */
  advance(ms?: number): void;
}

export function createManualFrameSource(): ManualFrameSource {
  let time = 0;
  let nextId = 1;
  const pending = new Map<number, (time: number) => void>();

  const source: FrameSource = {
    request(callback) {
      const id = nextId++;
      pending.set(id, callback);
      return id;
    },
    cancel(id) {
      pending.delete(id);
    },
    now: () => time,
  };

  return {
    source,
    get pendingCount() {
      return pending.size;
    },
    advance(ms = 16) {
      time += ms;
      const callbacks = Array.from(pending.values());
      pending.clear();
      for (const callback of callbacks) callback(time);
    },
  };
}
