/**
 * SVG painter.
 *
 * Paints a `RenderedFigure` into a standalone SVG document string. Pure: no file or
 * DOM access. Grid lines are painted first, then each axes' drawables clipped to
 * the axes rect (the transform itself never clips).
 */

import type { ResolvedLineStyle, ResolvedPointStyle } from '../config/OptionResolver';
import type { Rect, ScreenPoint } from '../geometry/point';
import type { Drawable } from '../geometry/types';
import type { RenderedFigure } from '../figure/renderFigure';
import type { ThemeConfig } from '../themes/types';
import { getTheme } from '../themes';

export interface SvgPaintOptions {
  readonly width: number;
  readonly height: number;
  /** Supplies the background color. Defaults to the dark theme. */
  readonly theme?: ThemeConfig;
  /** Clip geometry to its axes rect. Default true. */
  readonly clip?: boolean;
}

/**
 * Numbers are written with at most two decimals; non-finite values become 0.
 */
export const formatSvgNumber = (n: number): string => {
  if (!Number.isFinite(n)) return '0';
  const rounded = Math.round(n * 100) / 100;
  return String(Object.is(rounded, -0) ? 0 : rounded);
};

export const escapeXml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');

const attrs = (pairs: ReadonlyArray<readonly [string, string | number]>): string =>
  pairs
    .map(([name, value]) => `${name}="${typeof value === 'number' ? formatSvgNumber(value) : escapeXml(value)}"`)
    .join(' ');

const renderSegment = (from: ScreenPoint, to: ScreenPoint, style: ResolvedLineStyle): string => {
  const pairs: Array<readonly [string, string | number]> = [
    ['x1', from.x],
    ['y1', from.y],
    ['x2', to.x],
    ['y2', to.y],
    ['stroke', style.color],
    ['stroke-width', style.width],
  ];
  if (style.opacity < 1) pairs.push(['stroke-opacity', style.opacity]);
  if (style.dash.length > 0) pairs.push(['stroke-dasharray', style.dash.map(formatSvgNumber).join(' ')]);
  return `<line ${attrs(pairs)}/>`;
};

const renderPoint = (at: ScreenPoint, style: ResolvedPointStyle): string => {
  const opacity: Array<readonly [string, number]> = style.opacity < 1 ? [['fill-opacity', style.opacity]] : [];

  if (style.symbol === 'square') {
    const size = style.radius * 2;
    return `<rect ${attrs([
      ['x', at.x - style.radius],
      ['y', at.y - style.radius],
      ['width', size],
      ['height', size],
      ['fill', style.color],
      ...opacity,
    ])}/>`;
  }

  return `<circle ${attrs([['cx', at.x], ['cy', at.y], ['r', style.radius], ['fill', style.color], ...opacity])}/>`;
};

export const renderDrawable = (drawable: Drawable): string => {
  switch (drawable.kind) {
    case 'segment':
      return renderSegment(drawable.from, drawable.to, drawable.style);
    case 'point':
      return renderPoint(drawable.at, drawable.style);
  }
};

const rectAttrs = (rect: Rect): string =>
  attrs([
    ['x', rect.left],
    ['y', rect.top],
    ['width', rect.width],
    ['height', rect.height],
  ]);

export function renderSvg(rendered: RenderedFigure, options: SvgPaintOptions): string {
  const theme = options.theme ?? getTheme('dark');
  const clip = options.clip ?? true;
  const { width, height } = options;

  const parts: string[] = [];
  parts.push(
    `<svg xmlns="http://www.w3.org/2000/svg" ${attrs([
      ['width', width],
      ['height', height],
      ['viewBox', `0 0 ${formatSvgNumber(width)} ${formatSvgNumber(height)}`],
    ])}>`
  );
  if (rendered.title.length > 0) {
    parts.push(`<title>${escapeXml(rendered.title)}</title>`);
  }
  parts.push(`<rect ${attrs([['width', width], ['height', height], ['fill', theme.backgroundColor]])}/>`);

  rendered.plots.forEach((plot, p) => {
    parts.push(`<g class="plot">`);
    plot.axes.forEach((axes, a) => {
      parts.push(`<g class="axes">`);
      for (const line of axes.gridLines) parts.push(renderDrawable(line));

      if (clip) {
        const id = `clip-${p}-${a}`;
        parts.push(`<clipPath id="${id}"><rect ${rectAttrs(axes.rect)}/></clipPath>`);
        parts.push(`<g clip-path="url(#${id})">`);
      } else {
        parts.push('<g>');
      }
      for (const drawable of axes.drawables) parts.push(renderDrawable(drawable));
      parts.push('</g>');

      parts.push('</g>');
    });
    parts.push('</g>');
  });

  parts.push('</svg>');
  return parts.join('\n');
}
