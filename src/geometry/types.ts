/**
 * Drawables and the geometry capability.
 */

import type { ResolvedLineStyle, ResolvedPointStyle } from '../config/OptionResolver';
import type { AxesContext } from '../figure/AxesContext';
import type { ScreenPoint } from './point';

export interface SegmentDrawable {
  readonly kind: 'segment';
  readonly from: ScreenPoint;
  readonly to: ScreenPoint;
  readonly style: ResolvedLineStyle;
}

export interface PointDrawable {
  readonly kind: 'point';
  readonly at: ScreenPoint;
  readonly style: ResolvedPointStyle;
}

/**
 * A resolved, screen-space primitive ready for painting.
 */
export type Drawable = SegmentDrawable | PointDrawable;

/**
 * Anything that can emit its own drawables against an axes frame.
 *
 * `renderAxes` is called exactly once per render pass for every geometry attached
 * to an axes. It may read the context and push drawables into it; it must not
 * re-range the axes (the axes handle is read-held for the whole pass).
 */
export interface GeometryAxes<X = number, Y = number> {
  renderAxes(ctx: AxesContext<X, Y>): void;
}
