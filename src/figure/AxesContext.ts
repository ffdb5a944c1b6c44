import type { ResolvedLineStyle, ResolvedPointStyle } from '../config/OptionResolver';
import type { AxesBounds } from '../geometry/AxisRange';
import type { Point2, Rect, ScreenPoint } from '../geometry/point';
import type { Drawable, GeometryAxes } from '../geometry/types';
import { dataToScreen, dataToScreenX, dataToScreenY, screenToData } from './axesTransform';

/**
 * Scoped handle passed to each geometry's `renderAxes`.
 *
 * Lives for one (axes, render pass) pair: it exposes the transform for the axes'
 * bounds snapshot and destination rect, and collects whatever the geometry emits.
 * Once the pass for its axes ends the context is closed and further pushes throw.
 */
export class AxesContext<X = number, Y = number> {
  readonly bounds: AxesBounds<X, Y>;
  readonly rect: Rect;
  private readonly palette: ReadonlyArray<string>;
  private readonly drawables: Drawable[] = [];
  private seriesIndex = 0;
  private closed = false;

  constructor(bounds: AxesBounds<X, Y>, rect: Rect, palette: ReadonlyArray<string>) {
    if (palette.length === 0) {
      throw new Error('AxesContext: palette must not be empty.');
    }
    this.bounds = bounds;
    this.rect = rect;
    this.palette = palette;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get drawableCount(): number {
    return this.drawables.length;
  }

  transform(p: Point2<X, Y>): ScreenPoint {
    return dataToScreen(this.bounds, this.rect, p);
  }

  transformX(x: X): number {
    return dataToScreenX(this.bounds.x, this.rect, x);
  }

  transformY(y: Y): number {
    return dataToScreenY(this.bounds.y, this.rect, y);
  }

  invert(p: ScreenPoint): Point2<X, Y> {
    return screenToData(this.bounds, this.rect, p);
  }

  /**
   * Palette color for the next unstyled series on this axes. Cycles through the palette.
   */
  nextSeriesColor(): string {
    const color = this.palette[this.seriesIndex % this.palette.length];
    this.seriesIndex++;
    return color;
  }

  push(drawable: Drawable): void {
    this.assertOpen();
    this.drawables.push(drawable);
  }

  pushSegment(from: ScreenPoint, to: ScreenPoint, style: ResolvedLineStyle): void {
    this.push({ kind: 'segment', from, to, style });
  }

  pushPoint(at: ScreenPoint, style: ResolvedPointStyle): void {
    this.push({ kind: 'point', at, style });
  }

  /**
   * Closes the context and hands over everything accumulated.
   * @internal
   */
  finish(): Drawable[] {
    this.assertOpen();
    this.closed = true;
    return this.drawables.slice();
  }

  private assertOpen(): void {
    if (this.closed) throw new Error('AxesContext: used after its render pass ended.');
  }
}

/**
 * Runs every geometry against a fresh context and returns the accumulated drawables.
 *
 * The context is closed whether or not a geometry throws; on a throw the partial
 * accumulation is discarded and the error propagates.
 */
export function renderGeometries<X, Y>(
  bounds: AxesBounds<X, Y>,
  rect: Rect,
  palette: ReadonlyArray<string>,
  geometries: ReadonlyArray<GeometryAxes<X, Y>>
): Drawable[] {
  const ctx = new AxesContext(bounds, rect, palette);
  try {
    for (const geometry of geometries) {
      geometry.renderAxes(ctx);
    }
    return ctx.finish();
  } finally {
    if (!ctx.isClosed) ctx.finish();
  }
}
