import { describe, it, expect } from 'vitest';
import { renderFigure, countDrawables } from '../renderFigure';
import { FigureModel } from '../FigureModel';
import { AxesModel } from '../AxesModel';
import { GridModel } from '../GridModel';
import { createGridLayout, fixedLayout } from '../layout';
import { createSharedHandle } from '../../core/SharedHandle';
import { resolveOptions } from '../../config/OptionResolver';
import { AxesBounds, AxisRange } from '../../geometry/AxisRange';
import { Line } from '../../geometry/Line';
import { point2 } from '../../geometry/point';

const TWO_PI = 2 * Math.PI;
const STEP = 0.05;

describe('renderFigure', () => {
  it('renders a sampled sine across the full width of its axes', () => {
    const axes = createSharedHandle(
      new AxesModel(AxesBounds.new(AxisRange.new(0, TWO_PI), AxisRange.new(-1, 1)), GridModel.default())
    );
    const line = Line.new().color('blue');
    for (let i = 0; STEP * i <= TWO_PI; i++) {
      const x = STEP * i;
      line.addPoint(point2(x, Math.sin(x)));
    }
    expect(line.length).toBe(126);

    const figure = new FigureModel('sine');
    figure.addPlotWith((plot) => {
      plot.addAxesWith(axes, (a) => {
        a.plot(line);
      });
    });

    const rendered = renderFigure(figure, fixedLayout({ left: 0, top: 0, width: 800, height: 600 }));
    const [region] = rendered.plots[0].axes;
    const segments = region.drawables;

    expect(rendered.title).toBe('sine');
    expect(segments).toHaveLength(125);

    const first = segments[0];
    const last = segments[segments.length - 1];
    if (first.kind !== 'segment' || last.kind !== 'segment') throw new Error('expected segments');

    expect(first.from).toEqual({ x: 0, y: 300 });
    expect(first.style.color).toBe('blue');
    expect(last.to.x).toBeLessThanOrEqual(800);
    expect(800 - last.to.x).toBeLessThan((800 * STEP) / TWO_PI);

    // 11 vertical + 9 horizontal grid lines + 4 frame edges
    expect(region.gridLines).toHaveLength(24);
    expect(countDrawables(rendered)).toBe(149);
  });

  it('stacks plots with the grid layout', () => {
    const axes = createSharedHandle(
      new AxesModel(AxesBounds.new(AxisRange.new(0, 1), AxisRange.new(0, 1)), GridModel.fromNumbers(0, 0))
    );
    const figure = new FigureModel();
    figure.addPlotWith((plot) => {
      plot.addAxesWith(axes);
    }, 'top');
    figure.addPlotWith((plot) => {
      plot.addAxesWith(axes);
    }, 'bottom');

    const options = resolveOptions();
    const rendered = renderFigure(figure, createGridLayout({ width: 800, height: 600 }, options.margin), options);

    expect(rendered.plots.map((p) => p.title)).toEqual(['top', 'bottom']);
    expect(rendered.plots[0].axes[0].rect).toEqual({ left: 60, top: 40, width: 720, height: 220 });
    expect(rendered.plots[1].axes[0].rect).toEqual({ left: 60, top: 340, width: 720, height: 220 });
  });

  it('renders an empty figure to no plots', () => {
    const rendered = renderFigure(new FigureModel(), fixedLayout({ left: 0, top: 0, width: 1, height: 1 }));
    expect(rendered).toEqual({ title: '', plots: [] });
    expect(countDrawables(rendered)).toBe(0);
  });

  it('returns a snapshot that does not follow later model changes', () => {
    const axes = createSharedHandle(
      new AxesModel(AxesBounds.new(AxisRange.new(0, 10), AxisRange.new(0, 10)), GridModel.fromNumbers(1, 1))
    );
    const figure = new FigureModel();
    figure.addPlotWith((plot) => {
      plot.addAxesWith(axes);
    });

    const rendered = renderFigure(figure, fixedLayout({ left: 0, top: 0, width: 10, height: 10 }));
    axes.write((model) => model.setXRange(AxisRange.new(0, 20)));

    expect(rendered.plots[0].axes[0].snapshot.x).toEqual({ min: 0, max: 10 });
  });
});
