/**
 * Destination rectangles for axes regions.
 *
 * The painter owns the surface size; the core only needs a rect per axes at render
 * time. `createGridLayout` is the stock policy: plots stacked top to bottom in equal
 * bands, the axes of a plot side by side in equal columns, each cell inset by margins.
 *
 * @module layout
 */

import type { ResolvedMargin } from '../config/OptionResolver';
import type { Rect } from '../geometry/point';

export interface LayoutSlot {
  readonly plotIndex: number;
  readonly plotCount: number;
  readonly axesIndex: number;
  readonly axesCount: number;
}

/**
 * Maps an axes slot to its destination rect in logical pixels.
 */
export type FigureLayout = (slot: LayoutSlot) => Rect;

export interface Viewport {
  readonly width: number;
  readonly height: number;
}

const sanitizeLength = (value: number): number => (Number.isFinite(value) ? Math.max(0, value) : 0);

/**
 * Insets a cell by margins. Non-finite or negative margins count as 0 and the
 * result never has a negative size.
 */
export const insetRect = (cell: Rect, margin: ResolvedMargin): Rect => {
  const left = sanitizeLength(margin.left);
  const right = sanitizeLength(margin.right);
  const top = sanitizeLength(margin.top);
  const bottom = sanitizeLength(margin.bottom);

  return {
    left: cell.left + left,
    top: cell.top + top,
    width: Math.max(0, cell.width - left - right),
    height: Math.max(0, cell.height - top - bottom),
  };
};

/**
 * @throws If the viewport size is not finite.
 */
export function createGridLayout(viewport: Viewport, margin: ResolvedMargin): FigureLayout {
  if (!Number.isFinite(viewport.width) || !Number.isFinite(viewport.height)) {
    throw new Error(
      `createGridLayout: Invalid viewport dimensions: width=${viewport.width}, height=${viewport.height}.`
    );
  }
  const width = Math.max(0, viewport.width);
  const height = Math.max(0, viewport.height);

  return (slot) => {
    const plotCount = Math.max(1, slot.plotCount);
    const axesCount = Math.max(1, slot.axesCount);
    const bandHeight = height / plotCount;
    const columnWidth = width / axesCount;

    const cell: Rect = {
      left: slot.axesIndex * columnWidth,
      top: slot.plotIndex * bandHeight,
      width: columnWidth,
      height: bandHeight,
    };
    return insetRect(cell, margin);
  };
}

/**
 * Layout that gives every axes the same rect, for callers that place a single axes.
 */
export const fixedLayout = (rect: Rect): FigureLayout => () => rect;
