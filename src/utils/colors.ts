/**
 * CSS color parsing.
 *
 * Accepted formats: `#rgb`, `#rgba`, `#rrggbb`, `#rrggbbaa`, `rgb(r,g,b)`, `rgba(r,g,b,a)`,
 * `hsl(h,s%,l%)`, `hsla(h,s%,l%,a)` and the basic named colors below.
 */

export type Rgba01 = readonly [r: number, g: number, b: number, a: number];

const NAMED_COLORS: Readonly<Record<string, string>> = {
  black: '#000000',
  silver: '#c0c0c0',
  gray: '#808080',
  grey: '#808080',
  white: '#ffffff',
  maroon: '#800000',
  red: '#ff0000',
  purple: '#800080',
  fuchsia: '#ff00ff',
  magenta: '#ff00ff',
  green: '#008000',
  lime: '#00ff00',
  olive: '#808000',
  yellow: '#ffff00',
  navy: '#000080',
  blue: '#0000ff',
  teal: '#008080',
  aqua: '#00ffff',
  cyan: '#00ffff',
  orange: '#ffa500',
  transparent: '#00000000',
};

const clamp01 = (v: number): number => Math.min(1, Math.max(0, v));

const parseHex = (hex: string): Rgba01 | null => {
  if (!/^[0-9a-f]+$/i.test(hex)) return null;

  if (hex.length === 3 || hex.length === 4) {
    const digits = hex.split('').map((c) => parseInt(c + c, 16) / 255);
    return [digits[0], digits[1], digits[2], hex.length === 4 ? digits[3] : 1];
  }

  if (hex.length === 6 || hex.length === 8) {
    const channel = (i: number): number => parseInt(hex.slice(i * 2, i * 2 + 2), 16) / 255;
    return [channel(0), channel(1), channel(2), hex.length === 8 ? channel(3) : 1];
  }

  return null;
};

const parseNumberList = (body: string): number[] | null => {
  const parts = body.split(',').map((p) => p.trim());
  const out: number[] = [];
  for (const part of parts) {
    const isPercent = part.endsWith('%');
    const n = Number(isPercent ? part.slice(0, -1) : part);
    if (part.length === 0 || !Number.isFinite(n)) return null;
    out.push(isPercent ? n / 100 : n);
  }
  return out;
};

const hueToRgb = (p: number, q: number, t: number): number => {
  let h = t;
  if (h < 0) h += 1;
  if (h > 1) h -= 1;
  if (h < 1 / 6) return p + (q - p) * 6 * h;
  if (h < 1 / 2) return q;
  if (h < 2 / 3) return p + (q - p) * (2 / 3 - h) * 6;
  return p;
};

const hslToRgba01 = (hueDeg: number, s: number, l: number, a: number): Rgba01 => {
  const h = (((hueDeg % 360) + 360) % 360) / 360;
  if (s === 0) return [l, l, l, a];
  const q = l < 0.5 ? l * (1 + s) : l + s - l * s;
  const p = 2 * l - q;
  return [hueToRgb(p, q, h + 1 / 3), hueToRgb(p, q, h), hueToRgb(p, q, h - 1 / 3), a];
};

/**
 * Parses a CSS color string into normalized RGBA in [0, 1], or null if unrecognized.
 */
export function parseCssColorToRgba01(color: string): Rgba01 | null {
  const input = color.trim().toLowerCase();
  if (input.length === 0) return null;

  const named = NAMED_COLORS[input];
  if (named !== undefined) return parseHex(named.slice(1));

  if (input.startsWith('#')) return parseHex(input.slice(1));

  const fn = /^(rgba?|hsla?)\(([^)]*)\)$/.exec(input);
  if (!fn) return null;

  const values = parseNumberList(fn[2]);
  if (!values || (values.length !== 3 && values.length !== 4)) return null;

  const alpha = values.length === 4 ? clamp01(values[3]) : 1;

  if (fn[1].startsWith('rgb')) {
    return [clamp01(values[0] / 255), clamp01(values[1] / 255), clamp01(values[2] / 255), alpha];
  }
  return hslToRgba01(values[0], clamp01(values[1]), clamp01(values[2]), alpha);
}

export const isCssColor = (color: string): boolean => parseCssColorToRgba01(color) !== null;
