/**
 * axes-plot - figure/plot/axes model for 2D plotting with a pluggable painter
 */

export const version = '0.1.0';

// Errors
export {
  PlotError,
  ConstructionError,
  InvalidRangeError,
  InvalidGridError,
  InvalidStyleError,
  LockError,
} from './errors';
export type { PlotErrorCode } from './errors';

// Geometry
export { AxisRange, AxesBounds } from './geometry/AxisRange';
export { numberAxis, timeAxis } from './geometry/axisValues';
export type { AxisValueType } from './geometry/axisValues';
export { point2 } from './geometry/point';
export type { Point2, ScreenPoint, Rect } from './geometry/point';
export type { Drawable, SegmentDrawable, PointDrawable, GeometryAxes } from './geometry/types';
export { Line } from './geometry/Line';
export { Points } from './geometry/Points';
export { FunctionCurve, sampleFunction } from './geometry/FunctionCurve';
export type { FunctionCurveOptions } from './geometry/FunctionCurve';

// Figure model
export { GridModel, generateAxisPositions } from './figure/GridModel';
export type { GridPositions } from './figure/GridModel';
export { AxesModel } from './figure/AxesModel';
export type { AxesZoom } from './figure/AxesModel';
export { AxesContext, renderGeometries } from './figure/AxesContext';
export { PlotModel } from './figure/PlotModel';
export type { AttachedAxes, AxesBuilder, AxesSnapshot, RenderedAxes } from './figure/PlotModel';
export { FigureModel } from './figure/FigureModel';
export { renderFigure, countDrawables } from './figure/renderFigure';
export type { RenderedFigure, RenderedPlot } from './figure/renderFigure';
export { createGridLayout, fixedLayout, insetRect } from './figure/layout';
export type { FigureLayout, LayoutSlot, Viewport } from './figure/layout';
export {
  dataToScreen,
  dataToScreenX,
  dataToScreenY,
  screenToData,
  screenToDataX,
  screenToDataY,
} from './figure/axesTransform';
export {
  computeVisibleDomain,
  isFullSpanZoom,
  computeBufferedDomain,
  domainValueToPercent,
  percentToDomainValue,
  calculateZoomSpan,
  normalizeZoomRange,
} from './figure/zoomHelpers';
export type { ZoomRange, DomainBounds, VisibleDomain } from './figure/zoomHelpers';

// Painters
export { createGridDrawables } from './renderers/createGridDrawables';
export { renderSvg, renderDrawable, escapeXml, formatSvgNumber } from './renderers/renderSvg';
export type { SvgPaintOptions } from './renderers/renderSvg';

// Shared state and scheduling
export { createSharedHandle } from './core/SharedHandle';
export type { SharedHandle, SharedHandleListener } from './core/SharedHandle';
export {
  RenderScheduler,
  createRenderScheduler,
  startRenderScheduler,
  stopRenderScheduler,
  requestRender,
  isFramePending,
  getTotalFrames,
  destroyRenderScheduler,
  createTimerFrameSource,
  timerFrameSource,
} from './core/RenderScheduler';
export type { FrameSource, RenderCallback, RenderSchedulerState } from './core/RenderScheduler';
export { createRenderCoordinator } from './core/createRenderCoordinator';
export type { RenderCoordinator, RenderCoordinatorOptions, RenderMode } from './core/createRenderCoordinator';

// Options
export { OptionResolver, resolveOptions, resolveLineStyle, resolvePointStyle } from './config/OptionResolver';
export type {
  ResolvedLineStyle,
  ResolvedMargin,
  ResolvedPointStyle,
  ResolvedRenderOptions,
  ResolvedStrokeConfig,
} from './config/OptionResolver';
export {
  defaultFrame,
  defaultGridDivisions,
  defaultGridLines,
  defaultLineStyle,
  defaultMargin,
  defaultOptions,
  defaultPalette,
  defaultPointStyle,
} from './config/defaults';
export type {
  FrameConfig,
  GridLinesConfig,
  LineStyleConfig,
  MarginConfig,
  PointStyleConfig,
  PointSymbol,
  RenderOptions,
  ThemeInput,
} from './config/types';

// Themes
export { darkTheme, lightTheme, getTheme } from './themes';
export type { ThemeName } from './themes';
export type { ThemeConfig } from './themes/types';

// Color utilities
export { parseCssColorToRgba01, isCssColor } from './utils/colors';
