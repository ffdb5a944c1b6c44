import { defaultGridDivisions } from '../config/defaults';
import { InvalidGridError } from '../errors';
import type { AxesBounds, AxisRange } from '../geometry/AxisRange';

export interface GridPositions<X = number, Y = number> {
  readonly x: ReadonlyArray<X>;
  readonly y: ReadonlyArray<Y>;
}

const assertDivisionCount = (label: string, value: number): void => {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidGridError(`GridModel: ${label} must be a non-negative integer. Received: ${String(value)}`);
  }
};

/**
 * Evenly spaced positions over a range, endpoints included.
 * `divisions === 0` yields just the two endpoints.
 */
export const generateAxisPositions = <T>(range: AxisRange<T>, divisions: number): T[] => {
  if (divisions === 0) return [range.min, range.max];

  const out: T[] = new Array(divisions + 1);
  const step = range.span() / divisions;
  out[0] = range.min;
  for (let i = 1; i < divisions; i++) {
    out[i] = range.valueType.fromNumber(range.minValue + i * step);
  }
  // Pin the last position so it is exactly `max`, not `min + d * step`.
  out[divisions] = range.max;
  return out;
};

/**
 * Division counts for an axes grid.
 *
 * Holds no coordinates, only counts, so one grid can be shared by axes with
 * different ranges. Positions are derived on demand by `generate`.
 */
export class GridModel {
  readonly xDivisions: number;
  readonly yDivisions: number;

  private constructor(xDivisions: number, yDivisions: number) {
    this.xDivisions = xDivisions;
    this.yDivisions = yDivisions;
  }

  /**
   * @throws {InvalidGridError} If either count is negative or not an integer.
   */
  static fromNumbers(xDivisions: number, yDivisions: number): GridModel {
    assertDivisionCount('xDivisions', xDivisions);
    assertDivisionCount('yDivisions', yDivisions);
    return new GridModel(xDivisions, yDivisions);
  }

  static default(): GridModel {
    return new GridModel(defaultGridDivisions.x, defaultGridDivisions.y);
  }

  generate<X, Y>(bounds: AxesBounds<X, Y>): GridPositions<X, Y> {
    return {
      x: generateAxisPositions(bounds.x, this.xDivisions),
      y: generateAxisPositions(bounds.y, this.yDivisions),
    };
  }
}
