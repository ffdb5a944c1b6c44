import type { ResolvedLineStyle, ResolvedRenderOptions } from '../config/OptionResolver';
import type { AxesBounds } from '../geometry/AxisRange';
import type { Rect } from '../geometry/point';
import type { SegmentDrawable } from '../geometry/types';
import { dataToScreenX, dataToScreenY } from '../figure/axesTransform';
import type { GridPositions } from '../figure/GridModel';

const solid = (color: string, width: number): ResolvedLineStyle => ({
  color,
  width,
  dash: [],
  opacity: 1,
});

const segment = (x0: number, y0: number, x1: number, y1: number, style: ResolvedLineStyle): SegmentDrawable => ({
  kind: 'segment',
  from: { x: x0, y: y0 },
  to: { x: x1, y: y1 },
  style,
});

/**
 * Grid and frame segments for one axes region.
 *
 * Vertical lines (one per x position) come first, then horizontal lines (one per
 * y position), then the frame outline (top, right, bottom, left).
 */
export function createGridDrawables<X, Y>(
  bounds: AxesBounds<X, Y>,
  positions: GridPositions<X, Y>,
  rect: Rect,
  options: ResolvedRenderOptions
): SegmentDrawable[] {
  const out: SegmentDrawable[] = [];
  const { left, top, width, height } = rect;
  const right = left + width;
  const bottom = top + height;

  if (options.gridLines.show) {
    const style = solid(options.gridLines.color, options.gridLines.width);

    for (const x of positions.x) {
      const sx = dataToScreenX(bounds.x, rect, x);
      out.push(segment(sx, top, sx, bottom, style));
    }

    for (const y of positions.y) {
      const sy = dataToScreenY(bounds.y, rect, y);
      out.push(segment(left, sy, right, sy, style));
    }
  }

  if (options.frame.show) {
    const style = solid(options.frame.color, options.frame.width);
    out.push(segment(left, top, right, top, style));
    out.push(segment(right, top, right, bottom, style));
    out.push(segment(right, bottom, left, bottom, style));
    out.push(segment(left, bottom, left, top, style));
  }

  return out;
}
