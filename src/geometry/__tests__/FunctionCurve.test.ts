import { describe, it, expect } from 'vitest';
import { FunctionCurve, sampleFunction } from '../FunctionCurve';
import { Points } from '../Points';
import { AxesBounds, AxisRange } from '../AxisRange';
import { point2 } from '../point';
import { AxesContext, renderGeometries } from '../../figure/AxesContext';
import { InvalidRangeError, InvalidStyleError } from '../../errors';

const bounds = AxesBounds.new(AxisRange.new(0, 10), AxisRange.new(0, 10));
const rect = { left: 0, top: 0, width: 100, height: 100 };
const palette = ['#111111', '#222222'];

describe('sampleFunction', () => {
  it('samples from start while x <= end', () => {
    expect(sampleFunction((x) => x * 2, 0, 1, 0.25)).toEqual([
      { x: 0, y: 0 },
      { x: 0.25, y: 0.5 },
      { x: 0.5, y: 1 },
      { x: 0.75, y: 1.5 },
      { x: 1, y: 2 },
    ]);
  });

  it('yields 126 samples of sin over one period at step 0.05', () => {
    const samples = sampleFunction(Math.sin, 0, 2 * Math.PI, 0.05);
    expect(samples).toHaveLength(126);
    expect(samples[0]).toEqual({ x: 0, y: 0 });
    expect(samples[125].x).toBeCloseTo(6.25, 12);
  });
});

describe('FunctionCurve', () => {
  it('spreads samples evenly and pins the last to the domain end', () => {
    const curve = new FunctionCurve((x) => 2 * x, { samples: 5 });
    expect(curve.sample(AxisRange.new(0, 1))).toEqual([
      { x: 0, y: 0 },
      { x: 0.25, y: 0.5 },
      { x: 0.5, y: 1 },
      { x: 0.75, y: 1.5 },
      { x: 1, y: 2 },
    ]);
  });

  it('samples a zero-span domain once', () => {
    const curve = new FunctionCurve((x) => x + 1);
    expect(curve.sample(AxisRange.new(3, 3))).toEqual([{ x: 3, y: 4 }]);
  });

  it('samples the axes x range when no domain is given', () => {
    const curve = new FunctionCurve((x) => x, { samples: 3 });
    const drawables = renderGeometries(bounds, rect, palette, [curve]);

    expect(drawables).toHaveLength(2);
    expect(drawables[0]).toMatchObject({ from: { x: 0, y: 100 }, to: { x: 50, y: 50 } });
    expect(drawables[1]).toMatchObject({ from: { x: 50, y: 50 }, to: { x: 100, y: 0 } });
    expect(drawables[0].style.color).toBe('#111111');
  });

  it('samples its own domain when given', () => {
    const curve = new FunctionCurve((x) => x, { domain: { start: 2, end: 4 }, samples: 2, style: { color: 'red' } });
    const drawables = renderGeometries(bounds, rect, palette, [curve]);

    expect(drawables).toEqual([
      {
        kind: 'segment',
        from: { x: 20, y: 80 },
        to: { x: 40, y: 60 },
        style: { color: 'red', width: 2, dash: [], opacity: 1 },
      },
    ]);
  });

  it('rejects invalid sampling parameters', () => {
    expect(() => new FunctionCurve(Math.sin, { step: 0 })).toThrow(InvalidRangeError);
    expect(() => new FunctionCurve(Math.sin, { step: Number.NaN })).toThrow(InvalidRangeError);
    expect(() => new FunctionCurve(Math.sin, { samples: 1 })).toThrow(InvalidRangeError);
    expect(() => new FunctionCurve(Math.sin, { samples: 2.5 })).toThrow(InvalidRangeError);
    expect(() => new FunctionCurve(Math.sin, { domain: { start: 1, end: 0 } })).toThrow(InvalidRangeError);
    expect(() => new FunctionCurve(Math.sin, { style: { width: -1 } })).toThrow(InvalidStyleError);
  });
});

describe('Points', () => {
  it('emits one point per data point with resolved style', () => {
    const points = Points.new().symbol('square').radius(4).opacity(0.5).addPoints([point2(0, 10), point2(10, 0)]);
    const drawables = renderGeometries(bounds, rect, palette, [points]);

    expect(drawables).toEqual([
      { kind: 'point', at: { x: 0, y: 0 }, style: { color: '#111111', radius: 4, symbol: 'square', opacity: 0.5 } },
      { kind: 'point', at: { x: 100, y: 100 }, style: { color: '#111111', radius: 4, symbol: 'square', opacity: 0.5 } },
    ]);
  });

  it('defaults to circles of radius 3', () => {
    const ctx = new AxesContext(bounds, rect, palette);
    Points.new().color('green').addPoint(point2(5, 5)).renderAxes(ctx);

    expect(ctx.finish()).toEqual([
      { kind: 'point', at: { x: 50, y: 50 }, style: { color: 'green', radius: 3, symbol: 'circle', opacity: 1 } },
    ]);
  });

  it('rejects a non-positive radius', () => {
    expect(() => Points.new().radius(0)).toThrow(InvalidStyleError);
  });
});
