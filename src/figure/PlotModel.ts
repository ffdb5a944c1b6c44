import type { ResolvedRenderOptions } from '../config/OptionResolver';
import type { SharedHandle } from '../core/SharedHandle';
import type { Rect } from '../geometry/point';
import type { Drawable, GeometryAxes, SegmentDrawable } from '../geometry/types';
import { createGridDrawables } from '../renderers/createGridDrawables';
import { renderGeometries } from './AxesContext';
import type { AxesModel } from './AxesModel';
import type { DomainBounds } from './zoomHelpers';

/**
 * Numeric copy of an axes' state taken at render time.
 */
export interface AxesSnapshot {
  readonly x: DomainBounds;
  readonly y: DomainBounds;
  readonly xDivisions: number;
  readonly yDivisions: number;
  readonly zoomed: boolean;
}

/**
 * One axes region after a render pass, ready to paint.
 */
export interface RenderedAxes {
  readonly snapshot: AxesSnapshot;
  readonly rect: Rect;
  /** Grid lines and frame, in paint order. */
  readonly gridLines: ReadonlyArray<SegmentDrawable>;
  /** Geometry output, in attachment order. */
  readonly drawables: ReadonlyArray<Drawable>;
}

/**
 * An axes attached to a plot, with its geometry list. Type parameters are erased
 * here so a plot can hold axes of different value types.
 */
export interface AttachedAxes {
  /** Identity of the shared axes handle. */
  readonly source: object;
  readonly elementCount: number;
  subscribe(listener: () => void): () => void;
  render(rect: Rect, options: ResolvedRenderOptions): RenderedAxes;
}

/**
 * Handle passed to `addAxesWith` builders for attaching geometry.
 */
export interface AxesBuilder<X = number, Y = number> {
  readonly axes: SharedHandle<AxesModel<X, Y>>;
  readonly elements: ReadonlyArray<GeometryAxes<X, Y>>;
  plot(geometry: GeometryAxes<X, Y>): this;
  /** Empties this axes' geometry list; bounds and grid are untouched. */
  clearElements(): this;
}

class AxesEntry<X, Y> implements AttachedAxes, AxesBuilder<X, Y> {
  readonly axes: SharedHandle<AxesModel<X, Y>>;
  private readonly _elements: GeometryAxes<X, Y>[] = [];

  constructor(axes: SharedHandle<AxesModel<X, Y>>) {
    this.axes = axes;
  }

  get source(): object {
    return this.axes;
  }

  get elements(): ReadonlyArray<GeometryAxes<X, Y>> {
    return this._elements;
  }

  get elementCount(): number {
    return this._elements.length;
  }

  plot(geometry: GeometryAxes<X, Y>): this {
    this._elements.push(geometry);
    return this;
  }

  clearElements(): this {
    this._elements.length = 0;
    return this;
  }

  subscribe(listener: () => void): () => void {
    return this.axes.subscribe(() => listener());
  }

  render(rect: Rect, options: ResolvedRenderOptions): RenderedAxes {
    const elements = this._elements.slice();
    // Held for the whole pass: a geometry that tries to re-range the axes gets a LockError.
    return this.axes.read((model) => {
      const bounds = model.bounds;
      const grid = model.grid;
      return {
        snapshot: {
          x: { min: bounds.x.minValue, max: bounds.x.maxValue },
          y: { min: bounds.y.minValue, max: bounds.y.maxValue },
          xDivisions: grid.xDivisions,
          yDivisions: grid.yDivisions,
          zoomed: model.zoomed,
        },
        rect,
        gridLines: createGridDrawables(bounds, grid.generate(bounds), rect, options),
        drawables: renderGeometries(bounds, rect, options.palette, elements),
      };
    });
  }
}

/**
 * A plot: an ordered set of axes regions, each with the geometry drawn against it.
 *
 * Axes are attached by shared handle, not copied, so one AxesModel may appear in
 * several plots. Each attachment keeps its own geometry list.
 */
export class PlotModel {
  title: string | null;
  private readonly entries: AttachedAxes[] = [];

  constructor(title: string | null = null) {
    this.title = title;
  }

  get axes(): ReadonlyArray<AttachedAxes> {
    return this.entries;
  }

  get axesCount(): number {
    return this.entries.length;
  }

  /**
   * Attaches an axes region and lets `builder` populate its geometry.
   * The region is appended only if `builder` returns normally.
   */
  addAxesWith<X, Y>(
    axes: SharedHandle<AxesModel<X, Y>>,
    builder: (axes: AxesBuilder<X, Y>) => void = () => {}
  ): AxesBuilder<X, Y> {
    const entry = new AxesEntry(axes);
    builder(entry);
    this.entries.push(entry);
    return entry;
  }

  /**
   * Detaches every region using `axes`. The model itself is left as is.
   */
  detachAxes(axes: object): number {
    let removed = 0;
    for (let i = this.entries.length - 1; i >= 0; i--) {
      if (this.entries[i].source === axes) {
        this.entries.splice(i, 1);
        removed++;
      }
    }
    return removed;
  }

  clearAxes(): void {
    this.entries.length = 0;
  }
}
