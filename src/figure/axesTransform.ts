/**
 * Data space <-> screen space mapping for one axes frame.
 *
 * These pure functions are the only place the affine mapping is written down:
 * - x grows to the right: `left + (x - min) / span * width`
 * - y is flipped, since screen y grows downward: `top + (max - y) / span * height`
 *
 * A zero-span range has fraction 0, so every value lands on `left` / `top`.
 * Nothing is clipped: values outside the range extrapolate past the rect.
 *
 * @module axesTransform
 */

import type { AxesBounds, AxisRange } from '../geometry/AxisRange';
import type { Point2, Rect, ScreenPoint } from '../geometry/point';

const fractionFromMin = (value: number, min: number, span: number): number => (span === 0 ? 0 : (value - min) / span);

export const dataToScreenX = <X>(range: AxisRange<X>, rect: Rect, x: X): number => {
  const v = range.valueType.toNumber(x);
  return rect.left + fractionFromMin(v, range.minValue, range.span()) * rect.width;
};

export const dataToScreenY = <Y>(range: AxisRange<Y>, rect: Rect, y: Y): number => {
  const v = range.valueType.toNumber(y);
  const span = range.span();
  const fraction = span === 0 ? 0 : (range.maxValue - v) / span;
  return rect.top + fraction * rect.height;
};

export const dataToScreen = <X, Y>(bounds: AxesBounds<X, Y>, rect: Rect, p: Point2<X, Y>): ScreenPoint => ({
  x: dataToScreenX(bounds.x, rect, p.x),
  y: dataToScreenY(bounds.y, rect, p.y),
});

/**
 * Inverse of `dataToScreenX`. A zero-span range or zero-width rect maps back to `min`.
 */
export const screenToDataX = <X>(range: AxisRange<X>, rect: Rect, screenX: number): X => {
  const span = range.span();
  if (span === 0 || rect.width === 0) return range.min;
  const t = (screenX - rect.left) / rect.width;
  return range.valueType.fromNumber(range.minValue + t * span);
};

/**
 * Inverse of `dataToScreenY`. A zero-span range or zero-height rect maps back to `min`.
 */
export const screenToDataY = <Y>(range: AxisRange<Y>, rect: Rect, screenY: number): Y => {
  const span = range.span();
  if (span === 0 || rect.height === 0) return range.min;
  const t = (screenY - rect.top) / rect.height;
  return range.valueType.fromNumber(range.maxValue - t * span);
};

export const screenToData = <X, Y>(bounds: AxesBounds<X, Y>, rect: Rect, p: ScreenPoint): Point2<X, Y> => ({
  x: screenToDataX(bounds.x, rect, p.x),
  y: screenToDataY(bounds.y, rect, p.y),
});
