import type { GridLinesConfig, LineStyleConfig, MarginConfig, PointStyleConfig, PointSymbol, RenderOptions } from './types';
import { defaultFrame, defaultGridLines, defaultLineStyle, defaultOptions, defaultPalette, defaultPointStyle } from './defaults';
import { getTheme } from '../themes';
import type { ThemeConfig } from '../themes/types';
import { isCssColor } from '../utils/colors';

export type ResolvedMargin = Readonly<Required<MarginConfig>>;

export interface ResolvedLineStyle {
  readonly color: string;
  readonly width: number;
  readonly dash: ReadonlyArray<number>;
  readonly opacity: number;
}

export interface ResolvedPointStyle {
  readonly color: string;
  readonly radius: number;
  readonly symbol: PointSymbol;
  readonly opacity: number;
}

export type ResolvedStrokeConfig = Readonly<Required<GridLinesConfig>>;

export interface ResolvedRenderOptions {
  readonly theme: ThemeConfig;
  readonly palette: ReadonlyArray<string>;
  readonly margin: ResolvedMargin;
  readonly gridLines: ResolvedStrokeConfig;
  readonly frame: ResolvedStrokeConfig;
}

const takeColor = (value: unknown, label: string): string | undefined => {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  if (trimmed.length === 0) return undefined;
  if (!isCssColor(trimmed)) {
    console.warn(`OptionResolver: ignoring invalid ${label}:`, value);
    return undefined;
  }
  return trimmed;
};

const sanitizePalette = (palette: unknown, label: string): string[] => {
  if (!Array.isArray(palette)) return [];
  const colors: string[] = [];
  for (const entry of palette) {
    const color = takeColor(entry, `${label} entry`);
    if (color !== undefined) colors.push(color);
  }
  return colors;
};

const resolveTheme = (themeInput: unknown): ThemeConfig => {
  const base = getTheme('dark');

  if (typeof themeInput === 'string') {
    const name = themeInput.trim().toLowerCase();
    return name === 'light' ? getTheme('light') : base;
  }

  if (themeInput === null || typeof themeInput !== 'object' || Array.isArray(themeInput)) {
    return base;
  }

  const input: Partial<Record<keyof ThemeConfig, unknown>> = { ...themeInput };
  const colorPaletteCandidate = sanitizePalette(input.colorPalette, 'colorPalette');

  return {
    backgroundColor: takeColor(input.backgroundColor, 'backgroundColor') ?? base.backgroundColor,
    axisLineColor: takeColor(input.axisLineColor, 'axisLineColor') ?? base.axisLineColor,
    gridLineColor: takeColor(input.gridLineColor, 'gridLineColor') ?? base.gridLineColor,
    colorPalette: colorPaletteCandidate.length > 0 ? colorPaletteCandidate : Array.from(base.colorPalette),
  };
};

const finiteNonNegative = (value: number | undefined, fallback: number): number => {
  if (value === undefined) return fallback;
  return Number.isFinite(value) ? Math.max(0, value) : 0;
};

const positiveOr = (value: number | undefined, fallback: number): number =>
  value !== undefined && Number.isFinite(value) && value > 0 ? value : fallback;

export function resolveOptions(userOptions: RenderOptions = {}): ResolvedRenderOptions {
  const baseTheme = resolveTheme(userOptions.theme ?? defaultOptions.theme);

  // A non-empty `palette` overrides the theme palette.
  const paletteOverride = sanitizePalette(userOptions.palette, 'palette');
  const paletteFromTheme = paletteOverride.length > 0 ? paletteOverride : sanitizePalette(baseTheme.colorPalette, 'colorPalette');

  // The palette is indexed modulo its length, so it must never be empty.
  const palette = paletteFromTheme.length > 0 ? paletteFromTheme : Array.from(defaultPalette);
  const theme: ThemeConfig = { ...baseTheme, colorPalette: palette.slice() };

  const margin: ResolvedMargin = {
    left: finiteNonNegative(userOptions.margin?.left, defaultOptions.margin.left),
    right: finiteNonNegative(userOptions.margin?.right, defaultOptions.margin.right),
    top: finiteNonNegative(userOptions.margin?.top, defaultOptions.margin.top),
    bottom: finiteNonNegative(userOptions.margin?.bottom, defaultOptions.margin.bottom),
  };

  const gridLines: ResolvedStrokeConfig = {
    show: userOptions.gridLines?.show ?? defaultGridLines.show,
    width: positiveOr(userOptions.gridLines?.width, defaultGridLines.width),
    color: takeColor(userOptions.gridLines?.color, 'gridLines.color') ?? theme.gridLineColor,
  };

  const frame: ResolvedStrokeConfig = {
    show: userOptions.frame?.show ?? defaultFrame.show,
    width: positiveOr(userOptions.frame?.width, defaultFrame.width),
    color: takeColor(userOptions.frame?.color, 'frame.color') ?? theme.axisLineColor,
  };

  return {
    theme,
    palette: theme.colorPalette,
    margin,
    gridLines,
    frame,
  };
}

/**
 * Fills unset line style fields. Values are assumed validated at construction.
 */
export function resolveLineStyle(style: LineStyleConfig, fallbackColor: string): ResolvedLineStyle {
  return {
    color: style.color ?? fallbackColor,
    width: style.width ?? defaultLineStyle.width,
    dash: style.dash ?? defaultLineStyle.dash,
    opacity: style.opacity ?? defaultLineStyle.opacity,
  };
}

export function resolvePointStyle(style: PointStyleConfig, fallbackColor: string): ResolvedPointStyle {
  return {
    color: style.color ?? fallbackColor,
    radius: style.radius ?? defaultPointStyle.radius,
    symbol: style.symbol ?? defaultPointStyle.symbol,
    opacity: style.opacity ?? defaultPointStyle.opacity,
  };
}

export const OptionResolver = { resolve: resolveOptions } as const;
