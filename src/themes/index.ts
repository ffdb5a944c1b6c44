import type { ThemeConfig } from './types';

export type ThemeName = 'dark' | 'light';

export const darkTheme: ThemeConfig = {
  backgroundColor: '#1a1a2e',
  axisLineColor: 'rgba(255,255,255,0.5)',
  gridLineColor: 'rgba(255,255,255,0.15)',
  colorPalette: ['#5470C6', '#91CC75', '#FAC858', '#EE6666', '#73C0DE', '#3BA272', '#FC8452', '#9A60B4', '#EA7CCC'],
};

export const lightTheme: ThemeConfig = {
  backgroundColor: '#ffffff',
  axisLineColor: 'rgba(0,0,0,0.6)',
  gridLineColor: 'rgba(0,0,0,0.1)',
  colorPalette: ['#3366CC', '#DC3912', '#FF9900', '#109618', '#990099', '#0099C6', '#DD4477', '#66AA00', '#B82E2E'],
};

export function getTheme(name: ThemeName): ThemeConfig {
  const theme = name === 'light' ? lightTheme : darkTheme;
  return { ...theme, colorPalette: Array.from(theme.colorPalette) };
}
