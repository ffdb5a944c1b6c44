/**
 * Simple curve example
 *
 * Plots sin and cos over one period on a single axes and prints the figure as SVG.
 * Rendering is driven by the host (`renderMode: 'external'`), once.
 *
 *   npx tsx examples/simple-curve/main.ts > curve.svg
 */

import {
  AxesBounds,
  AxesModel,
  AxisRange,
  FigureModel,
  FunctionCurve,
  GridModel,
  Line,
  createRenderCoordinator,
  createSharedHandle,
  point2,
  renderSvg,
  resolveOptions,
} from '../../src/index';

const WIDTH = 800;
const HEIGHT = 500;
const STEP = 0.05;

const axes = createSharedHandle(
  new AxesModel(AxesBounds.new(AxisRange.new(0, 2 * Math.PI), AxisRange.new(-1, 1)), GridModel.default()),
  'axes'
);
const figure = createSharedHandle(new FigureModel('sin and cos'), 'figure');

const sine = Line.new().color('blue');
for (let x = 0; x <= 2 * Math.PI; x += STEP) {
  sine.addPoint(point2(x, Math.sin(x)));
}

const cosine = new FunctionCurve(Math.cos, { step: STEP, style: { color: 'red', dash: [6, 4] } });

const coordinator = createRenderCoordinator({
  figure,
  layout: { width: WIDTH, height: HEIGHT },
  renderMode: 'external',
  build: (model) => {
    model.clearPlots();
    model.addPlotWith((plot) => {
      plot.addAxesWith(axes, (a) => {
        a.plot(sine).plot(cosine);
      });
    });
  },
});

const rendered = coordinator.renderFrame();
process.stdout.write(renderSvg(rendered, { width: WIDTH, height: HEIGHT, theme: resolveOptions().theme }) + '\n');
coordinator.dispose();
