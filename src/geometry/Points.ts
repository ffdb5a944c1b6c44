import type { PointStyleConfig, PointSymbol } from '../config/types';
import { resolvePointStyle } from '../config/OptionResolver';
import { validateColor, validateOpacity, validatePositive, validateSymbol } from '../config/validateStyle';
import type { AxesContext } from '../figure/AxesContext';
import type { Point2 } from './point';
import type { GeometryAxes } from './types';

const validatePointStyle = (style: PointStyleConfig): PointStyleConfig => ({
  ...(style.color !== undefined ? { color: validateColor(style.color) } : null),
  ...(style.radius !== undefined ? { radius: validatePositive('Point radius', style.radius) } : null),
  ...(style.symbol !== undefined ? { symbol: validateSymbol(style.symbol) } : null),
  ...(style.opacity !== undefined ? { opacity: validateOpacity(style.opacity) } : null),
});

/**
 * Unconnected markers in data space: one point drawable per point, in insertion order.
 */
export class Points<X = number, Y = number> implements GeometryAxes<X, Y> {
  readonly style: PointStyleConfig;
  private readonly points: Point2<X, Y>[];

  /**
   * @throws {InvalidStyleError} If a style value is invalid.
   */
  constructor(style: PointStyleConfig = {}, points: Iterable<Point2<X, Y>> = []) {
    this.style = validatePointStyle(style);
    this.points = Array.from(points);
  }

  static new<X = number, Y = number>(): Points<X, Y> {
    return new Points<X, Y>();
  }

  get length(): number {
    return this.points.length;
  }

  getPoints(): ReadonlyArray<Point2<X, Y>> {
    return this.points;
  }

  color(color: string): Points<X, Y> {
    return new Points({ ...this.style, color }, this.points);
  }

  radius(radius: number): Points<X, Y> {
    return new Points({ ...this.style, radius }, this.points);
  }

  symbol(symbol: PointSymbol): Points<X, Y> {
    return new Points({ ...this.style, symbol }, this.points);
  }

  opacity(opacity: number): Points<X, Y> {
    return new Points({ ...this.style, opacity }, this.points);
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
    const style = resolvePointStyle(this.style, this.style.color ?? ctx.nextSeriesColor());
    for (const p of this.points) {
      ctx.pushPoint(ctx.transform(p), style);
    }
  }
}
