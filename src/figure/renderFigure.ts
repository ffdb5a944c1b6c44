/**
 * Figure traversal: turns a figure model into screen-space drawables.
 *
 * For each plot, for each attached axes: the axes handle is read-held, a fresh
 * AxesContext is opened on the axes' bounds and its destination rect, grid
 * drawables are generated, and every geometry renders into the context. The result
 * is a plain snapshot that stays valid after the models change.
 *
 * @module renderFigure
 */

import { resolveOptions } from '../config/OptionResolver';
import type { ResolvedRenderOptions } from '../config/OptionResolver';
import type { FigureModel } from './FigureModel';
import type { FigureLayout } from './layout';
import type { RenderedAxes } from './PlotModel';

export interface RenderedPlot {
  readonly title: string | null;
  readonly axes: ReadonlyArray<RenderedAxes>;
}

export interface RenderedFigure {
  readonly title: string;
  readonly plots: ReadonlyArray<RenderedPlot>;
}

export function renderFigure(
  figure: FigureModel,
  layout: FigureLayout,
  options: ResolvedRenderOptions = resolveOptions()
): RenderedFigure {
  const plotCount = figure.plots.length;

  const plots: RenderedPlot[] = figure.plots.map((plot, plotIndex) => {
    const axesCount = plot.axes.length;
    return {
      title: plot.title,
      axes: plot.axes.map((attached, axesIndex) => {
        const rect = layout({ plotIndex, plotCount, axesIndex, axesCount });
        return attached.render(rect, options);
      }),
    };
  });

  return { title: figure.title, plots };
}

/**
 * Total drawable count (grid lines included) across a rendered figure.
 */
export const countDrawables = (rendered: RenderedFigure): number => {
  let count = 0;
  for (const plot of rendered.plots) {
    for (const axes of plot.axes) {
      count += axes.gridLines.length + axes.drawables.length;
    }
  }
  return count;
};
