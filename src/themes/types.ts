/**
 * Theme configuration types.
 */

export interface ThemeConfig {
  readonly backgroundColor: string;
  readonly axisLineColor: string;
  readonly gridLineColor: string;
  readonly colorPalette: string[];
}
