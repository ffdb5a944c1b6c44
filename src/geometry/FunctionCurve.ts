import type { LineStyleConfig } from '../config/types';
import { InvalidRangeError } from '../errors';
import type { AxesContext } from '../figure/AxesContext';
import { AxisRange } from './AxisRange';
import { Line } from './Line';
import type { Point2 } from './point';
import type { GeometryAxes } from './types';

export interface FunctionCurveOptions {
  /** Sampling domain. Defaults to the axes' current x range at render time. */
  readonly domain?: { readonly start: number; readonly end: number };
  /** Fixed sampling step. Takes precedence over `samples`. */
  readonly step?: number;
  /** Sample count across the domain when no `step` is given. */
  readonly samples?: number;
  readonly style?: LineStyleConfig;
}

const DEFAULT_SAMPLES = 200;

/**
 * Samples `fn` from `start` while `x <= end`, stepping by `step`.
 * Positions are computed as `start + i * step` so error does not accumulate.
 */
export function sampleFunction(
  fn: (x: number) => number,
  start: number,
  end: number,
  step: number
): Point2<number, number>[] {
  const out: Point2<number, number>[] = [];
  for (let i = 0; ; i++) {
    const x = start + i * step;
    if (x > end) break;
    out.push({ x, y: fn(x) });
  }
  return out;
}

/**
 * Procedural curve: samples a function on every render pass and draws the result
 * as a polyline. Nothing is stored between passes.
 */
export class FunctionCurve implements GeometryAxes<number, number> {
  private readonly fn: (x: number) => number;
  private readonly domain: AxisRange<number> | null;
  private readonly step: number | null;
  private readonly samples: number;
  private readonly template: Line<number, number>;

  /**
   * @throws {InvalidRangeError} If the domain or sampling parameters are invalid.
   * @throws {InvalidStyleError} If a style value is invalid.
   */
  constructor(fn: (x: number) => number, options: FunctionCurveOptions = {}) {
    this.fn = fn;
    this.domain = options.domain ? AxisRange.new(options.domain.start, options.domain.end) : null;

    if (options.step !== undefined && (!Number.isFinite(options.step) || options.step <= 0)) {
      throw new InvalidRangeError(`FunctionCurve: step must be a positive finite number. Received: ${options.step}`);
    }
    this.step = options.step ?? null;

    const samples = options.samples ?? DEFAULT_SAMPLES;
    if (!Number.isInteger(samples) || samples < 2) {
      throw new InvalidRangeError(`FunctionCurve: samples must be an integer >= 2. Received: ${samples}`);
    }
    this.samples = samples;
    this.template = new Line<number, number>(options.style ?? {});
  }

  sample(domain: AxisRange<number>): Point2<number, number>[] {
    if (domain.isDegenerate()) return [{ x: domain.min, y: this.fn(domain.min) }];
    if (this.step !== null) return sampleFunction(this.fn, domain.min, domain.max, this.step);

    const out: Point2<number, number>[] = new Array(this.samples);
    const last = this.samples - 1;
    for (let i = 0; i < last; i++) {
      const x = domain.min + (i / last) * domain.span();
      out[i] = { x, y: this.fn(x) };
    }
    out[last] = { x: domain.max, y: this.fn(domain.max) };
    return out;
  }

  renderAxes(ctx: AxesContext<number, number>): void {
    const domain = this.domain ?? ctx.bounds.x;
    const line = new Line(this.template.style, this.sample(domain));
    line.renderAxes(ctx);
  }
}
