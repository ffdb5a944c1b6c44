import { describe, it, expect, vi, afterEach } from 'vitest';
import { resolveLineStyle, resolveOptions, resolvePointStyle } from '../OptionResolver';
import { defaultPalette } from '../defaults';
import { darkTheme, lightTheme } from '../../themes';

describe('OptionResolver - defaults', () => {
  it('resolves the dark theme with default margins and strokes', () => {
    const resolved = resolveOptions();

    expect(resolved.theme.backgroundColor).toBe(darkTheme.backgroundColor);
    expect(resolved.palette).toEqual(Array.from(defaultPalette));
    expect(resolved.margin).toEqual({ left: 60, right: 20, top: 40, bottom: 40 });
    expect(resolved.gridLines).toEqual({ show: true, width: 1, color: 'rgba(255,255,255,0.15)' });
    expect(resolved.frame).toEqual({ show: true, width: 1, color: 'rgba(255,255,255,0.5)' });
  });

  it('does not share the palette with the theme constants', () => {
    const resolved = resolveOptions();
    expect(resolved.palette).not.toBe(darkTheme.colorPalette);
  });
});

describe('OptionResolver - theme', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('selects the light theme by name', () => {
    const resolved = resolveOptions({ theme: 'light' });
    expect(resolved.theme.backgroundColor).toBe('#ffffff');
    expect(resolved.palette).toEqual(lightTheme.colorPalette);
    expect(resolved.frame.color).toBe('rgba(0,0,0,0.6)');
  });

  it('merges a partial theme over the dark theme', () => {
    const resolved = resolveOptions({ theme: { backgroundColor: ' #000 ', colorPalette: ['red', ' ', 'blue'] } });
    expect(resolved.theme.backgroundColor).toBe('#000');
    expect(resolved.theme.axisLineColor).toBe(darkTheme.axisLineColor);
    expect(resolved.palette).toEqual(['red', 'blue']);
  });

  it('warns about and ignores an invalid theme color', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const resolved = resolveOptions({ theme: { gridLineColor: 'chartreuse-ish' } });

    expect(resolved.theme.gridLineColor).toBe(darkTheme.gridLineColor);
    expect(warnSpy).toHaveBeenCalledWith('OptionResolver: ignoring invalid gridLineColor:', 'chartreuse-ish');
  });
});

describe('OptionResolver - palette', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('a non-empty palette overrides the theme palette', () => {
    const resolved = resolveOptions({ theme: 'light', palette: ['#123456'] });
    expect(resolved.palette).toEqual(['#123456']);
    expect(resolved.theme.colorPalette).toEqual(['#123456']);
  });

  it('an empty palette falls back to the theme palette', () => {
    const resolved = resolveOptions({ palette: ['', '   '] });
    expect(resolved.palette).toEqual(darkTheme.colorPalette);
  });

  it('drops palette entries that are not colors', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const resolved = resolveOptions({ palette: ['notacolor', ' #abc '] });

    expect(resolved.palette).toEqual(['#abc']);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledWith('OptionResolver: ignoring invalid palette entry:', 'notacolor');
  });

  it('falls back to the theme palette when no entry is a color', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const resolved = resolveOptions({ palette: ['notacolor'] });
    expect(resolved.palette).toEqual(darkTheme.colorPalette);
  });
});

describe('OptionResolver - margins and strokes', () => {
  it('clamps negative margins and zeroes non-finite ones', () => {
    const resolved = resolveOptions({ margin: { left: -10, top: Number.NaN, right: 5 } });
    expect(resolved.margin).toEqual({ left: 0, right: 5, top: 0, bottom: 40 });
  });

  it('keeps the default stroke width for a non-positive width', () => {
    const resolved = resolveOptions({ gridLines: { width: 0 }, frame: { width: 3, show: false } });
    expect(resolved.gridLines.width).toBe(1);
    expect(resolved.frame).toEqual({ show: false, width: 3, color: darkTheme.axisLineColor });
  });

  it('uses an explicit grid line color', () => {
    expect(resolveOptions({ gridLines: { color: 'gray' } }).gridLines.color).toBe('gray');
  });
});

describe('style resolution', () => {
  it('fills unset line style fields', () => {
    expect(resolveLineStyle({ width: 3 }, '#abcdef')).toEqual({ color: '#abcdef', width: 3, dash: [], opacity: 1 });
  });

  it('keeps an explicit line color over the fallback', () => {
    expect(resolveLineStyle({ color: 'red' }, '#abcdef').color).toBe('red');
  });

  it('fills unset point style fields', () => {
    expect(resolvePointStyle({ symbol: 'square' }, 'blue')).toEqual({
      color: 'blue',
      radius: 3,
      symbol: 'square',
      opacity: 1,
    });
  });
});
