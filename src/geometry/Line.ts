import type { LineStyleConfig } from '../config/types';
import { resolveLineStyle } from '../config/OptionResolver';
import { validateColor, validateDash, validateOpacity, validatePositive } from '../config/validateStyle';
import type { AxesContext } from '../figure/AxesContext';
import type { Point2 } from './point';
import type { GeometryAxes } from './types';

const validateLineStyle = (style: LineStyleConfig): LineStyleConfig => ({
  ...(style.color !== undefined ? { color: validateColor(style.color) } : null),
  ...(style.width !== undefined ? { width: validatePositive('Line width', style.width) } : null),
  ...(style.dash !== undefined ? { dash: validateDash(style.dash) } : null),
  ...(style.opacity !== undefined ? { opacity: validateOpacity(style.opacity) } : null),
});

/**
 * Polyline in data space.
 *
 * Style setters return a modified copy; `addPoint` appends in place. Rendering draws
 * one segment between each pair of consecutive points in insertion order, with no
 * smoothing or deduplication.
 *
 * @example
 * ```ts
 * const line = Line.new().color('blue').width(1.5);
 * line.addPoint(point2(0, 0)).addPoint(point2(1, 1));
 * ```
 */
export class Line<X = number, Y = number> implements GeometryAxes<X, Y> {
  readonly style: LineStyleConfig;
  private readonly points: Point2<X, Y>[];

  /**
   * @throws {InvalidStyleError} If a style value is invalid.
   */
  constructor(style: LineStyleConfig = {}, points: Iterable<Point2<X, Y>> = []) {
    this.style = validateLineStyle(style);
    this.points = Array.from(points);
  }

  static new<X = number, Y = number>(): Line<X, Y> {
    return new Line<X, Y>();
  }

  get length(): number {
    return this.points.length;
  }

  getPoints(): ReadonlyArray<Point2<X, Y>> {
    return this.points;
  }

  color(color: string): Line<X, Y> {
    return new Line({ ...this.style, color }, this.points);
  }

  width(width: number): Line<X, Y> {
    return new Line({ ...this.style, width }, this.points);
  }

  dash(pattern: ReadonlyArray<number>): Line<X, Y> {
    return new Line({ ...this.style, dash: pattern }, this.points);
  }

  opacity(opacity: number): Line<X, Y> {
    return new Line({ ...this.style, opacity }, this.points);
  }

  addPoint(p: Point2<X, Y>): this {
    this.points.push(p);
    return this;
  }

  addPoints(points: Iterable<Point2<X, Y>>): this {
    for (const p of points) this.points.push(p);
    return this;
  }

  renderAxes(ctx: AxesContext<X, Y>): void {
    const style = resolveLineStyle(this.style, this.style.color ?? ctx.nextSeriesColor());
    if (this.points.length < 2) return;

    let prev = ctx.transform(this.points[0]);
    for (let i = 1; i < this.points.length; i++) {
      const next = ctx.transform(this.points[i]);
      ctx.pushSegment(prev, next, style);
      prev = next;
    }
  }
}
