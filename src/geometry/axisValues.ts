/**
 * Axis value types.
 *
 * An axis is generic over the values it carries. Every value type must map onto the
 * real number line so ranges can be interpolated; the conversion is supplied here
 * rather than assumed, which lets `Date` axes share the same transform as numeric ones.
 */

export interface AxisValueType<T> {
  readonly name: string;
  toNumber(value: T): number;
  fromNumber(value: number): T;
}

export const numberAxis: AxisValueType<number> = {
  name: 'number',
  toNumber: (value) => value,
  fromNumber: (value) => value,
};

/**
 * Time axis backed by epoch milliseconds.
 */
export const timeAxis: AxisValueType<Date> = {
  name: 'time',
  toNumber: (value) => value.getTime(),
  fromNumber: (value) => new Date(value),
};
