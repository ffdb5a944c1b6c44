import { describe, it, expect } from 'vitest';
import { AxesContext, renderGeometries } from '../AxesContext';
import { AxesBounds, AxisRange } from '../../geometry/AxisRange';
import { point2 } from '../../geometry/point';
import type { GeometryAxes } from '../../geometry/types';

const bounds = AxesBounds.new(AxisRange.new(0, 10), AxisRange.new(0, 10));
const rect = { left: 0, top: 0, width: 100, height: 100 };
const palette = ['#111111', '#222222'];
const style = { color: '#000000', width: 1, dash: [], opacity: 1 };

describe('AxesContext', () => {
  it('requires a non-empty palette', () => {
    expect(() => new AxesContext(bounds, rect, [])).toThrow('AxesContext: palette must not be empty.');
  });

  it('cycles through the palette', () => {
    const ctx = new AxesContext(bounds, rect, palette);
    expect([ctx.nextSeriesColor(), ctx.nextSeriesColor(), ctx.nextSeriesColor()]).toEqual([
      '#111111',
      '#222222',
      '#111111',
    ]);
  });

  it('exposes the transform for its bounds and rect', () => {
    const ctx = new AxesContext(bounds, rect, palette);
    expect(ctx.transform(point2(2, 8))).toEqual({ x: 20, y: 20 });
    expect(ctx.transformX(10)).toBe(100);
    expect(ctx.transformY(10)).toBe(0);
    expect(ctx.invert({ x: 50, y: 100 })).toEqual({ x: 5, y: 0 });
  });

  it('collects drawables until finished, then rejects pushes', () => {
    const ctx = new AxesContext(bounds, rect, palette);
    ctx.pushSegment({ x: 0, y: 0 }, { x: 1, y: 1 }, style);
    expect(ctx.drawableCount).toBe(1);

    const drawables = ctx.finish();
    expect(drawables).toHaveLength(1);
    expect(ctx.isClosed).toBe(true);
    expect(() => ctx.pushSegment({ x: 0, y: 0 }, { x: 1, y: 1 }, style)).toThrow(
      'AxesContext: used after its render pass ended.'
    );
  });
});

describe('renderGeometries', () => {
  it('runs geometries in order against one context', () => {
    const order: string[] = [];
    const first: GeometryAxes = { renderAxes: () => order.push('first') };
    const second: GeometryAxes = { renderAxes: () => order.push('second') };

    expect(renderGeometries(bounds, rect, palette, [first, second])).toEqual([]);
    expect(order).toEqual(['first', 'second']);
  });

  it('closes the context so a retained reference cannot push later', () => {
    const retained: AxesContext[] = [];
    const leaky: GeometryAxes = {
      renderAxes: (ctx) => {
        retained.push(ctx);
      },
    };

    renderGeometries(bounds, rect, palette, [leaky]);
    expect(retained).toHaveLength(1);
    expect(() => retained[0].pushPoint({ x: 0, y: 0 }, { color: '#000000', radius: 1, symbol: 'circle', opacity: 1 })).toThrow(
      'AxesContext: used after its render pass ended.'
    );
  });

  it('propagates a geometry error and closes the context', () => {
    const seen: AxesContext[] = [];
    const failing: GeometryAxes = {
      renderAxes: (ctx) => {
        seen.push(ctx);
        ctx.pushSegment({ x: 0, y: 0 }, { x: 1, y: 1 }, style);
        throw new Error('geometry failed');
      },
    };

    expect(() => renderGeometries(bounds, rect, palette, [failing])).toThrow('geometry failed');
    expect(seen).toHaveLength(1);
    expect(seen[0].isClosed).toBe(true);
  });
});
