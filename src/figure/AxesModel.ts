import { AxesBounds } from '../geometry/AxisRange';
import type { AxisRange } from '../geometry/AxisRange';
import type { Point2, Rect, ScreenPoint } from '../geometry/point';
import { dataToScreen, screenToData } from './axesTransform';
import type { GridModel, GridPositions } from './GridModel';
import { computeVisibleDomain, isFullSpanZoom, normalizeZoomRange } from './zoomHelpers';
import type { ZoomRange } from './zoomHelpers';

export interface AxesZoom {
  readonly x?: ZoomRange | null;
  readonly y?: ZoomRange | null;
}

const zoomAxis = <T>(home: AxisRange<T>, zoom: ZoomRange | null | undefined): AxisRange<T> => {
  if (isFullSpanZoom(zoom) || !zoom) return home;
  const visible = computeVisibleDomain({ min: home.minValue, max: home.maxValue }, normalizeZoomRange(zoom));
  return home.withValues(visible.min, visible.max);
};

/**
 * One rectangular coordinate frame: current bounds, home bounds and grid.
 *
 * Every mutation swaps a whole immutable `AxesBounds`/`GridModel`, so any reader
 * sees either the old or the new x/y pair, never a mix. Share an instance through
 * a `SharedHandle` so writes are excluded while a render pass reads it.
 */
export class AxesModel<X = number, Y = number> {
  private _bounds: AxesBounds<X, Y>;
  private _homeBounds: AxesBounds<X, Y>;
  private _grid: GridModel;

  constructor(bounds: AxesBounds<X, Y>, grid: GridModel) {
    this._bounds = bounds;
    this._homeBounds = bounds;
    this._grid = grid;
  }

  get bounds(): AxesBounds<X, Y> {
    return this._bounds;
  }

  /** Bounds that `zoomTo` is relative to and `resetZoom` restores. */
  get homeBounds(): AxesBounds<X, Y> {
    return this._homeBounds;
  }

  get grid(): GridModel {
    return this._grid;
  }

  get zoomed(): boolean {
    return !this._bounds.equals(this._homeBounds);
  }

  /**
   * Re-ranges the axes. Replaces both the current and the home bounds.
   */
  setBounds(bounds: AxesBounds<X, Y>): void {
    this._bounds = bounds;
    this._homeBounds = bounds;
  }

  setXRange(x: AxisRange<X>): void {
    this.setBounds(this._homeBounds.withX(x));
  }

  setYRange(y: AxisRange<Y>): void {
    this.setBounds(this._homeBounds.withY(y));
  }

  setGrid(grid: GridModel): void {
    this._grid = grid;
  }

  /**
   * Shows a percent-space window of the home bounds on each axis.
   * An omitted or full-span window leaves that axis at its home range.
   */
  zoomTo(zoom: AxesZoom): void {
    this._bounds = new AxesBounds(zoomAxis(this._homeBounds.x, zoom.x), zoomAxis(this._homeBounds.y, zoom.y));
  }

  resetZoom(): void {
    this._bounds = this._homeBounds;
  }

  gridPositions(): GridPositions<X, Y> {
    return this._grid.generate(this._bounds);
  }

  dataToScreen(p: Point2<X, Y>, rect: Rect): ScreenPoint {
    return dataToScreen(this._bounds, rect, p);
  }

  screenToData(p: ScreenPoint, rect: Rect): Point2<X, Y> {
    return screenToData(this._bounds, rect, p);
  }
}
