import { InvalidRangeError } from '../errors';
import { numberAxis } from './axisValues';
import type { AxisValueType } from './axisValues';

/**
 * Immutable 1-D axis range.
 *
 * `min <= max` always holds. A zero-span range (`min === max`) is valid; the
 * transform maps every value on such an axis to the start of the destination span.
 */
export class AxisRange<T = number> {
  readonly min: T;
  readonly max: T;
  readonly valueType: AxisValueType<T>;
  /** `min` on the numeric line. */
  readonly minValue: number;
  /** `max` on the numeric line. */
  readonly maxValue: number;

  private constructor(valueType: AxisValueType<T>, min: T, max: T, minValue: number, maxValue: number) {
    this.valueType = valueType;
    this.min = min;
    this.max = max;
    this.minValue = minValue;
    this.maxValue = maxValue;
  }

  /**
   * Creates a numeric range.
   *
   * @throws {InvalidRangeError} If a bound or the span is not finite, or `min > max`.
   */
  static new(min: number, max: number): AxisRange<number> {
    return AxisRange.of(numberAxis, min, max);
  }

  /**
   * Creates a range over any axis value type.
   *
   * @throws {InvalidRangeError} If a bound does not map to a finite number, the span overflows, or `min > max`.
   */
  static of<T>(valueType: AxisValueType<T>, min: T, max: T): AxisRange<T> {
    const minValue = valueType.toNumber(min);
    const maxValue = valueType.toNumber(max);

    if (!Number.isFinite(minValue) || !Number.isFinite(maxValue)) {
      throw new InvalidRangeError(
        `AxisRange: bounds must be finite. Received: min=${String(minValue)}, max=${String(maxValue)}`
      );
    }
    if (minValue > maxValue) {
      throw new InvalidRangeError(`AxisRange: min must not exceed max. Received: min=${minValue}, max=${maxValue}`);
    }
    if (!Number.isFinite(maxValue - minValue)) {
      throw new InvalidRangeError(`AxisRange: span must be finite. Received: min=${minValue}, max=${maxValue}`);
    }

    return new AxisRange(valueType, min, max, minValue, maxValue);
  }

  span(): number {
    return this.maxValue - this.minValue;
  }

  isDegenerate(): boolean {
    return this.maxValue === this.minValue;
  }

  contains(value: T): boolean {
    const v = this.valueType.toNumber(value);
    return v >= this.minValue && v <= this.maxValue;
  }

  equals(other: AxisRange<T>): boolean {
    return this.minValue === other.minValue && this.maxValue === other.maxValue;
  }

  /**
   * Builds a range of the same value type from numeric bounds.
   */
  withValues(minValue: number, maxValue: number): AxisRange<T> {
    return AxisRange.of(this.valueType, this.valueType.fromNumber(minValue), this.valueType.fromNumber(maxValue));
  }
}

/**
 * Immutable pair of x/y ranges. Replaced wholesale whenever an axes is re-ranged,
 * so a reader always sees a consistent x and y.
 */
export class AxesBounds<X = number, Y = number> {
  readonly x: AxisRange<X>;
  readonly y: AxisRange<Y>;

  constructor(x: AxisRange<X>, y: AxisRange<Y>) {
    this.x = x;
    this.y = y;
  }

  static new<X, Y>(x: AxisRange<X>, y: AxisRange<Y>): AxesBounds<X, Y> {
    return new AxesBounds(x, y);
  }

  withX(x: AxisRange<X>): AxesBounds<X, Y> {
    return new AxesBounds(x, this.y);
  }

  withY(y: AxisRange<Y>): AxesBounds<X, Y> {
    return new AxesBounds(this.x, y);
  }

  equals(other: AxesBounds<X, Y>): boolean {
    return this.x.equals(other.x) && this.y.equals(other.y);
  }
}
