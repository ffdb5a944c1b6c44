/**
 * RenderCoordinator - drives the clear → rebuild → render → paint cycle for one figure.
 *
 * Mutations never render inline. Writes to the figure handle, or to any axes handle
 * attached to it, mark the coordinator dirty through the scheduler; the pass runs on
 * the next frame:
 *
 * 1. `build` (if given) runs under figure write access. This is where callers clear
 *    and rebuild plots every frame.
 * 2. The figure is read-held while it is traversed into a `RenderedFigure`.
 * 3. Access is released, then `onFrame` receives the snapshot for painting.
 *
 * Writes made during steps 1-2 do not schedule another frame.
 */

import { resolveOptions } from '../config/OptionResolver';
import type { ResolvedRenderOptions } from '../config/OptionResolver';
import type { RenderOptions } from '../config/types';
import type { FigureModel } from '../figure/FigureModel';
import { createGridLayout } from '../figure/layout';
import type { FigureLayout, Viewport } from '../figure/layout';
import { renderFigure } from '../figure/renderFigure';
import type { RenderedFigure } from '../figure/renderFigure';
import { RenderScheduler, timerFrameSource } from './RenderScheduler';
import type { FrameSource } from './RenderScheduler';
import type { SharedHandle } from './SharedHandle';

/**
 * - `'auto'` (default): frames are scheduled on the frame source whenever the model changes.
 * - `'external'`: the host calls `renderFrame()` itself; `needsRender` reports pending changes.
 */
export type RenderMode = 'auto' | 'external';

export interface RenderCoordinatorOptions {
  readonly figure: SharedHandle<FigureModel>;
  /** Either a layout function or a viewport for the stock grid layout. */
  readonly layout: FigureLayout | Viewport;
  readonly options?: RenderOptions;
  /** Per-frame rebuild, run with exclusive access to the figure. */
  readonly build?: (figure: FigureModel) => void;
  /** Painter. Receives each completed pass after all model access is released. */
  readonly onFrame?: (rendered: RenderedFigure, deltaTime: number) => void;
  readonly renderMode?: RenderMode;
  readonly frameSource?: FrameSource;
  /** Request the next frame as soon as one completes. */
  readonly continuous?: boolean;
}

export interface RenderCoordinator {
  readonly disposed: boolean;
  readonly renderMode: RenderMode;
  /** Last completed pass, or null before the first one. */
  readonly lastFrame: RenderedFigure | null;
  /** True when a change has been seen since the last completed pass. */
  readonly needsRender: boolean;
  /** Number of completed passes. */
  readonly frameCount: number;
  requestRender(): void;
  /** Runs a pass synchronously and returns it. */
  renderFrame(deltaTime?: number): RenderedFigure;
  setLayout(layout: FigureLayout | Viewport): void;
  setOptions(options: RenderOptions): void;
  dispose(): void;
}

const toLayout = (layout: FigureLayout | Viewport, options: ResolvedRenderOptions): FigureLayout =>
  typeof layout === 'function' ? layout : createGridLayout(layout, options.margin);

export function createRenderCoordinator(config: RenderCoordinatorOptions): RenderCoordinator {
  const { figure, build, onFrame } = config;
  const renderMode: RenderMode = config.renderMode ?? 'auto';
  const continuous = config.continuous ?? false;

  let disposed = false;
  let inPass = false;
  let dirty = true;
  let frameCount = 0;
  let lastFrame: RenderedFigure | null = null;
  let layoutInput = config.layout;
  let resolved = resolveOptions(config.options);
  let layout = toLayout(layoutInput, resolved);

  const axesSubscriptions = new Map<object, () => void>();

  const scheduler = renderMode === 'auto' ? new RenderScheduler(config.frameSource ?? timerFrameSource) : null;

  const assertNotDisposed = (): void => {
    if (disposed) throw new Error('RenderCoordinator is disposed.');
  };

  const markDirty = (): void => {
    if (disposed || inPass) return;
    dirty = true;
    scheduler?.requestRender();
  };

  const unsubscribeFigure = figure.subscribe(markDirty);

  const syncAxesSubscriptions = (model: FigureModel): void => {
    const seen = new Set<object>();
    for (const plot of model.plots) {
      for (const attached of plot.axes) {
        seen.add(attached.source);
        if (!axesSubscriptions.has(attached.source)) {
          axesSubscriptions.set(attached.source, attached.subscribe(markDirty));
        }
      }
    }
    for (const [source, unsubscribe] of axesSubscriptions) {
      if (!seen.has(source)) {
        unsubscribe();
        axesSubscriptions.delete(source);
      }
    }
  };

  const runPass = (): RenderedFigure => {
    inPass = true;
    try {
      if (build) figure.write(build);
      return figure.read((model) => {
        syncAxesSubscriptions(model);
        return renderFigure(model, layout, resolved);
      });
    } finally {
      inPass = false;
    }
  };

  const renderFrame: RenderCoordinator['renderFrame'] = (deltaTime = 0) => {
    assertNotDisposed();
    if (inPass) {
      throw new Error('RenderCoordinator.renderFrame: a render pass is already in progress.');
    }

    try {
      const rendered = runPass();
      dirty = false;
      frameCount++;
      lastFrame = rendered;

      if (onFrame) {
        try {
          onFrame(rendered, deltaTime);
        } catch (error) {
          console.error('RenderCoordinator: Error in frame callback:', error);
        }
      }

      return rendered;
    } finally {
      // A failed pass must not end a continuous loop.
      if (continuous) markDirty();
    }
  };

  scheduler?.start((deltaTime) => {
    if (disposed) return;
    try {
      renderFrame(deltaTime);
    } catch (error) {
      // The pass is discarded; the previous frame stays current.
      console.error('RenderCoordinator: render pass failed:', error);
    }
  });

  const requestRender: RenderCoordinator['requestRender'] = () => {
    assertNotDisposed();
    markDirty();
  };

  const setLayout: RenderCoordinator['setLayout'] = (next) => {
    assertNotDisposed();
    layoutInput = next;
    layout = toLayout(layoutInput, resolved);
    markDirty();
  };

  const setOptions: RenderCoordinator['setOptions'] = (options) => {
    assertNotDisposed();
    resolved = resolveOptions(options);
    layout = toLayout(layoutInput, resolved);
    markDirty();
  };

  const dispose: RenderCoordinator['dispose'] = () => {
    if (disposed) return;
    disposed = true;
    scheduler?.destroy();
    unsubscribeFigure();
    for (const unsubscribe of axesSubscriptions.values()) unsubscribe();
    axesSubscriptions.clear();
  };

  return {
    get disposed() {
      return disposed;
    },
    get renderMode() {
      return renderMode;
    },
    get lastFrame() {
      return lastFrame;
    },
    get needsRender() {
      return dirty;
    },
    get frameCount() {
      return frameCount;
    },
    requestRender,
    renderFrame,
    setLayout,
    setOptions,
    dispose,
  };
}
