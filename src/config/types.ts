/**
 * Configuration types for styles and render passes.
 */

import type { ThemeName } from '../themes';
import type { ThemeConfig } from '../themes/types';

export type PointSymbol = 'circle' | 'square';

export interface LineStyleConfig {
  /** CSS color. Unset lines take the next palette color of their axes. */
  readonly color?: string;
  /** Stroke width in logical pixels. Must be > 0. */
  readonly width?: number;
  /** Dash pattern in logical pixels (alternating on/off). Empty means solid. */
  readonly dash?: ReadonlyArray<number>;
  /** Opacity in [0, 1]. */
  readonly opacity?: number;
}

export interface PointStyleConfig {
  readonly color?: string;
  /** Marker radius in logical pixels. Must be > 0. */
  readonly radius?: number;
  readonly symbol?: PointSymbol;
  readonly opacity?: number;
}

/**
 * Space in logical pixels between an axes cell and its plotting rect.
 */
export interface MarginConfig {
  readonly left?: number;
  readonly right?: number;
  readonly top?: number;
  readonly bottom?: number;
}

export interface GridLinesConfig {
  readonly show?: boolean;
  readonly width?: number;
  /** Defaults to the theme's `gridLineColor`. */
  readonly color?: string;
}

export interface FrameConfig {
  readonly show?: boolean;
  readonly width?: number;
  /** Defaults to the theme's `axisLineColor`. */
  readonly color?: string;
}

export type ThemeInput = ThemeName | Partial<ThemeConfig>;

export interface RenderOptions {
  readonly theme?: ThemeInput;
  /** Overrides the theme palette when non-empty. */
  readonly palette?: ReadonlyArray<string>;
  readonly margin?: MarginConfig;
  readonly gridLines?: GridLinesConfig;
  readonly frame?: FrameConfig;
}
