import type { FrameConfig, GridLinesConfig, LineStyleConfig, MarginConfig, PointStyleConfig } from './types';

export const defaultMargin = {
  left: 60,
  right: 20,
  top: 40,
  bottom: 40,
} as const satisfies Required<MarginConfig>;

export const defaultPalette = [
  '#5470C6',
  '#91CC75',
  '#FAC858',
  '#EE6666',
  '#73C0DE',
  '#3BA272',
  '#FC8452',
  '#9A60B4',
  '#EA7CCC',
] as const;

export const defaultLineStyle = {
  width: 2,
  dash: [],
  opacity: 1,
} as const satisfies Required<Omit<LineStyleConfig, 'color'>>;

export const defaultPointStyle = {
  radius: 3,
  symbol: 'circle',
  opacity: 1,
} as const satisfies Required<Omit<PointStyleConfig, 'color'>>;

/**
 * Division counts used by `GridModel.default()`.
 */
export const defaultGridDivisions = {
  x: 10,
  y: 8,
} as const;

export const defaultGridLines = {
  show: true,
  width: 1,
} as const satisfies Required<Omit<GridLinesConfig, 'color'>>;

export const defaultFrame = {
  show: true,
  width: 1,
} as const satisfies Required<Omit<FrameConfig, 'color'>>;

export const defaultOptions = {
  theme: 'dark',
  palette: defaultPalette,
  margin: defaultMargin,
  gridLines: defaultGridLines,
  frame: defaultFrame,
} as const;
