/**
 * Shared axes example
 *
 * One AxesModel is attached to two plots. A zoom written to the shared handle marks
 * the figure dirty; the scheduler renders the change on its next frame, never inside
 * the write. After two frames the coordinator is disposed and the process exits.
 */

import {
  AxesBounds,
  AxesModel,
  AxisRange,
  FigureModel,
  GridModel,
  Line,
  Points,
  countDrawables,
  createRenderCoordinator,
  createSharedHandle,
  point2,
} from '../../src/index';

const axes = createSharedHandle(
  new AxesModel(AxesBounds.new(AxisRange.new(0, 10), AxisRange.new(0, 100)), GridModel.fromNumbers(5, 4)),
  'shared-axes'
);
const figure = createSharedHandle(new FigureModel('shared axes'), 'figure');

const squares = Array.from({ length: 11 }, (_, i) => point2(i, i * i));

figure.write((model) => {
  model.addPlotWith((plot) => {
    plot.addAxesWith(axes, (a) => {
      a.plot(new Line({}, squares));
    });
  }, 'line');
  model.addPlotWith((plot) => {
    plot.addAxesWith(axes, (a) => {
      a.plot(new Points({ symbol: 'square' }, squares));
    });
  }, 'markers');
});

const coordinator = createRenderCoordinator({
  figure,
  layout: { width: 640, height: 480 },
  onFrame: (rendered) => {
    const x = rendered.plots[0].axes[0].snapshot.x;
    console.log(`frame: x=[${x.min}, ${x.max}] drawables=${countDrawables(rendered)}`);

    if (coordinator.frameCount === 1) {
      // Picked up on the next frame.
      axes.write((model) => model.zoomTo({ x: { start: 0, end: 50 } }));
    } else {
      coordinator.dispose();
    }
  },
});
