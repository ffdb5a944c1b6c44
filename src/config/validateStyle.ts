import { InvalidStyleError } from '../errors';
import { isCssColor } from '../utils/colors';
import type { PointSymbol } from './types';

/**
 * Eager validators for style values. Each returns the (trimmed) value or throws,
 * so an invalid style never reaches a render pass.
 */

export const validateColor = (color: string): string => {
  const trimmed = color.trim();
  if (!isCssColor(trimmed)) {
    throw new InvalidStyleError(`Unrecognized color: ${JSON.stringify(color)}`);
  }
  return trimmed;
};

export const validatePositive = (label: string, value: number): number => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidStyleError(`${label} must be a positive finite number. Received: ${String(value)}`);
  }
  return value;
};

export const validateOpacity = (opacity: number): number => {
  if (!Number.isFinite(opacity) || opacity < 0 || opacity > 1) {
    throw new InvalidStyleError(`Opacity must be within [0, 1]. Received: ${String(opacity)}`);
  }
  return opacity;
};

export const validateDash = (dash: ReadonlyArray<number>): ReadonlyArray<number> => {
  for (const segment of dash) {
    if (!Number.isFinite(segment) || segment < 0) {
      throw new InvalidStyleError(`Dash segments must be non-negative finite numbers. Received: [${dash.join(', ')}]`);
    }
  }
  if (dash.length > 0 && dash.every((segment) => segment === 0)) {
    throw new InvalidStyleError('Dash pattern must contain at least one non-zero segment.');
  }
  return Object.freeze(Array.from(dash));
};

export const validateSymbol = (symbol: PointSymbol): PointSymbol => {
  if (symbol !== 'circle' && symbol !== 'square') {
    throw new InvalidStyleError(`Unknown point symbol: ${JSON.stringify(symbol)}`);
  }
  return symbol;
};
