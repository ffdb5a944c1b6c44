import { PlotModel } from './PlotModel';

/**
 * Top-level container handed to the painter: a title and an ordered list of plots.
 *
 * Each render cycle is a full clear-then-rebuild, not a diff: `clearPlots()` drops
 * every plot (axes handles held elsewhere survive, simply detached) and
 * `addPlotWith` builds the new ones.
 */
export class FigureModel {
  title: string;
  private readonly _plots: PlotModel[] = [];

  constructor(title: string = '') {
    this.title = title;
  }

  get plots(): ReadonlyArray<PlotModel> {
    return this._plots;
  }

  get plotCount(): number {
    return this._plots.length;
  }

  get isEmpty(): boolean {
    return this._plots.length === 0;
  }

  clearPlots(): void {
    this._plots.length = 0;
  }

  /**
   * Builds a new plot with `builder` and appends it.
   * Nothing is appended if `builder` throws.
   */
  addPlotWith(builder: (plot: PlotModel) => void, title: string | null = null): PlotModel {
    const plot = new PlotModel(title);
    builder(plot);
    this._plots.push(plot);
    return plot;
  }
}
