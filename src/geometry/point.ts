/**
 * A point in data space. Plain value: no identity, copied freely.
 */
export interface Point2<X = number, Y = number> {
  readonly x: X;
  readonly y: Y;
}

/**
 * A point in screen (logical pixel) space. Y grows downward.
 */
export interface ScreenPoint {
  readonly x: number;
  readonly y: number;
}

/**
 * Destination rectangle in screen space, supplied by the painter at render time.
 */
export interface Rect {
  readonly left: number;
  readonly top: number;
  readonly width: number;
  readonly height: number;
}

export const point2 = <X = number, Y = number>(x: X, y: Y): Point2<X, Y> => ({ x, y });
