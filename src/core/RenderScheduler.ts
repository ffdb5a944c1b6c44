/**
 * RenderScheduler - render-on-demand frame loop
 *
 * Coalesces any number of `requestRender` calls into a single frame delivered by a
 * `FrameSource`. Nothing is rendered inside `requestRender` itself: the frame runs
 * later, on the source's schedule, so a model mutation never triggers a re-entrant
 * render.
 *
 * This module provides both functional and class-based APIs.
 * The functional API is preferred for better type safety and immutability.
 */

/**
 * Callback function type for render frames.
 * Receives delta time in milliseconds since the last frame.
 */
export type RenderCallback = (deltaTime: number) => void;

/**
 * Where frames come from. Node has no `requestAnimationFrame`, so the default source
 * is a timer; a windowing host can supply its own vsync-driven source.
 */
export interface FrameSource {
  /** Schedules `callback` for the next frame and returns an id for `cancel`. */
  request(callback: (time: number) => void): number;
  cancel(id: number): void;
  now(): number;
}

/**
 * Represents the state of a render scheduler.
 * All properties are readonly to ensure immutability.
 */
export interface RenderSchedulerState {
  readonly id: symbol;
  readonly running: boolean;
}

/**
 * Expected frame time at 60fps (16.67ms).
 */
const FRAME_INTERVAL_MS = 1000 / 60;

/**
 * Cap on delta time so an idle period does not produce one huge step.
 */
const MAX_DELTA_TIME_MS = 100;

/**
 * Timer-backed frame source, firing roughly every `intervalMs`.
 */
export function createTimerFrameSource(intervalMs: number = FRAME_INTERVAL_MS): FrameSource {
  let nextId = 1;
  const timers = new Map<number, ReturnType<typeof setTimeout>>();

  return {
    request(callback) {
      const id = nextId++;
      timers.set(
        id,
        setTimeout(() => {
          timers.delete(id);
          callback(performance.now());
        }, intervalMs)
      );
      return id;
    },
    cancel(id) {
      const timer = timers.get(id);
      if (timer === undefined) return;
      clearTimeout(timer);
      timers.delete(id);
    },
    now: () => performance.now(),
  };
}

export const timerFrameSource: FrameSource = createTimerFrameSource();

/**
 * Internal mutable state for the render scheduler.
 * Stored separately from the public state interface.
 */
interface RenderSchedulerInternalState {
  readonly frameSource: FrameSource;
  frameId: number | null;
  scheduled: boolean;
  callback: RenderCallback | null;
  lastFrameTime: number;
  dirty: boolean;
  frameHandler: ((time: number) => void) | null;
  totalFrames: number;
}

/**
 * Map to store internal mutable state for each scheduler state instance.
 * Keyed by the state's unique ID symbol.
 */
const internalStateMap = new Map<symbol, RenderSchedulerInternalState>();

const getInternalState = (state: RenderSchedulerState): RenderSchedulerInternalState => {
  const internalState = internalStateMap.get(state.id);
  if (!internalState) {
    throw new Error('Invalid scheduler state. Use createRenderScheduler() to create a new state.');
  }
  return internalState;
};

const scheduleFrame = (internalState: RenderSchedulerInternalState): void => {
  if (!internalState.frameHandler) return;
  internalState.scheduled = true;
  internalState.frameId = internalState.frameSource.request(internalState.frameHandler);
};

/**
 * Creates a new RenderScheduler state with initial values.
 */
export function createRenderScheduler(frameSource: FrameSource = timerFrameSource): RenderSchedulerState {
  const id = Symbol('RenderScheduler');
  const state: RenderSchedulerState = {
    id,
    running: false,
  };

  internalStateMap.set(id, {
    frameSource,
    frameId: null,
    scheduled: false,
    callback: null,
    lastFrameTime: 0,
    dirty: false,
    frameHandler: null,
    totalFrames: 0,
  });

  return state;
}

/**
 * Starts the render loop and schedules a first frame.
 *
 * The callback is invoked only for frames that are dirty; an idle scheduler
 * requests no frames at all.
 *
 * @returns A new RenderSchedulerState with running set to true
 * @throws {Error} If callback is not provided
 * @throws {Error} If scheduler is already running
 * @throws {Error} If state is invalid
 */
export function startRenderScheduler(
  state: RenderSchedulerState,
  callback: RenderCallback
): RenderSchedulerState {
  if (!callback) {
    throw new Error('Render callback is required');
  }

  const internalState = getInternalState(state);

  if (state.running) {
    throw new Error('RenderScheduler is already running. Call stopRenderScheduler() before starting again.');
  }

  internalState.callback = callback;
  internalState.lastFrameTime = internalState.frameSource.now();
  internalState.dirty = true;

  const schedulerId = state.id;
  const frameHandler = (currentTime: number) => {
    // May be missing if the scheduler was destroyed while the frame was pending.
    const current = internalStateMap.get(schedulerId);
    if (!current || !current.callback) {
      return;
    }

    // No longer scheduled: we are now inside the frame.
    current.scheduled = false;
    current.frameId = null;

    const deltaTime = Math.min(MAX_DELTA_TIME_MS, Math.max(0, currentTime - current.lastFrameTime));
    current.lastFrameTime = currentTime;

    if (!current.dirty) return;

    // Reset dirty BEFORE calling the callback so renders requested during it are kept.
    current.dirty = false;
    current.totalFrames++;
    current.callback(deltaTime);

    // Re-check in case the scheduler was stopped or destroyed during the callback.
    const next = internalStateMap.get(schedulerId);
    if (next && next.callback && next.dirty && !next.scheduled) {
      scheduleFrame(next);
    }
  };

  internalState.frameHandler = frameHandler;
  scheduleFrame(internalState);

  return {
    id: state.id,
    running: true,
  };
}

/**
 * Stops the render loop and cancels any pending frame.
 * The scheduler can be restarted by calling startRenderScheduler() again.
 *
 * @throws {Error} If state is invalid
 */
export function stopRenderScheduler(state: RenderSchedulerState): RenderSchedulerState {
  const internalState = getInternalState(state);

  internalState.callback = null;
  internalState.frameHandler = null;

  if (internalState.frameId !== null) {
    internalState.frameSource.cancel(internalState.frameId);
    internalState.frameId = null;
  }
  internalState.scheduled = false;

  return {
    id: state.id,
    running: false,
  };
}

/**
 * Marks the scheduler dirty and schedules a frame if idle.
 *
 * Multiple calls before the frame runs coalesce into a single frame. When the
 * scheduler is stopped the dirty flag is kept, so the next start renders.
 *
 * @throws {Error} If state is invalid
 */
export function requestRender(state: RenderSchedulerState): void {
  const internalState = getInternalState(state);

  internalState.dirty = true;

  if (internalState.callback === null) {
    return;
  }

  if (internalState.scheduled) {
    return;
  }

  // Reset lastFrameTime so the first frame after idle gets a sensible delta.
  internalState.lastFrameTime = internalState.frameSource.now();
  scheduleFrame(internalState);
}

/**
 * Whether a frame is currently pending.
 */
export function isFramePending(state: RenderSchedulerState): boolean {
  return internalStateMap.get(state.id)?.scheduled ?? false;
}

/**
 * Number of frames in which the render callback ran.
 */
export function getTotalFrames(state: RenderSchedulerState): number {
  return internalStateMap.get(state.id)?.totalFrames ?? 0;
}

/**
 * Destroys the render scheduler and cleans up resources.
 * Stops the loop if running and removes internal state from the map.
 *
 * **Important:** Always call this function when done with a scheduler; the internal
 * state map retains entries until explicitly destroyed.
 *
 * @returns The final, no longer usable state
 */
export function destroyRenderScheduler(state: RenderSchedulerState): RenderSchedulerState {
  const internalState = internalStateMap.get(state.id);

  if (internalState) {
    if (internalState.frameId !== null) {
      internalState.frameSource.cancel(internalState.frameId);
      internalState.frameId = null;
    }
    internalState.scheduled = false;

    internalState.callback = null;
    internalState.frameHandler = null;

    internalStateMap.delete(state.id);
  }

  return {
    id: state.id,
    running: false,
  };
}

/**
 * RenderScheduler class wrapper around the functional implementation.
 */
export class RenderScheduler {
  private _state: RenderSchedulerState;

  /**
   * Checks if the scheduler is currently running.
   */
  get running(): boolean {
    return this._state.running;
  }

  get framePending(): boolean {
    return isFramePending(this._state);
  }

  get totalFrames(): number {
    return getTotalFrames(this._state);
  }

  constructor(frameSource: FrameSource = timerFrameSource) {
    this._state = createRenderScheduler(frameSource);
  }

  /**
   * @throws {Error} If callback is not provided or scheduler already running
   */
  start(callback: RenderCallback): void {
    this._state = startRenderScheduler(this._state, callback);
  }

  stop(): void {
    this._state = stopRenderScheduler(this._state);
  }

  requestRender(): void {
    requestRender(this._state);
  }

  /**
   * After calling destroy(), the scheduler cannot be used again.
   */
  destroy(): void {
    this._state = destroyRenderScheduler(this._state);
  }
}
