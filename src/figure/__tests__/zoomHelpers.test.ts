/**
 * Tests for zoom helper utilities.
 * Covers percent windows over an axis home range and the conversions between them.
 */

import { describe, it, expect } from 'vitest';
import {
  computeVisibleDomain,
  isFullSpanZoom,
  computeBufferedDomain,
  domainValueToPercent,
  percentToDomainValue,
  calculateZoomSpan,
  normalizeZoomRange,
} from '../zoomHelpers';

describe('computeVisibleDomain', () => {
  it('returns the home range when zoom is null', () => {
    expect(computeVisibleDomain({ min: 0, max: 1000 }, null)).toEqual({ min: 0, max: 1000, spanFraction: 1 });
  });

  it('returns the home range when zoom is undefined', () => {
    expect(computeVisibleDomain({ min: 0, max: 1000 })).toEqual({ min: 0, max: 1000, spanFraction: 1 });
  });

  it('computes a centered half window', () => {
    expect(computeVisibleDomain({ min: 0, max: 1000 }, { start: 25, end: 75 })).toEqual({
      min: 250,
      max: 750,
      spanFraction: 0.5,
    });
  });

  it('handles ranges below zero', () => {
    const result = computeVisibleDomain({ min: -500, max: 500 }, { start: 0, end: 50 });
    expect(result.min).toBe(-500);
    expect(result.max).toBe(0);
  });

  it('leaves a zero-span range alone', () => {
    expect(computeVisibleDomain({ min: 100, max: 100 }, { start: 25, end: 75 })).toEqual({
      min: 100,
      max: 100,
      spanFraction: 1,
    });
  });

  it('leaves a non-finite span alone', () => {
    const result = computeVisibleDomain({ min: 0, max: Infinity }, { start: 25, end: 75 });
    expect(result.max).toBe(Infinity);
    expect(result.spanFraction).toBe(1);
  });
});

describe('isFullSpanZoom', () => {
  it('treats a missing window as full span', () => {
    expect(isFullSpanZoom(null)).toBe(true);
    expect(isFullSpanZoom(undefined)).toBe(true);
  });

  it('accepts 0-100 with a half-percent tolerance', () => {
    expect(isFullSpanZoom({ start: 0, end: 100 })).toBe(true);
    expect(isFullSpanZoom({ start: 0.5, end: 99.5 })).toBe(true);
    expect(isFullSpanZoom({ start: 0.6, end: 100 })).toBe(false);
    expect(isFullSpanZoom({ start: 0, end: 99.4 })).toBe(false);
  });

  it('rejects partial windows', () => {
    expect(isFullSpanZoom({ start: 25, end: 75 })).toBe(false);
    expect(isFullSpanZoom({ start: 50, end: 100 })).toBe(false);
  });

  it('treats non-finite edges as full span', () => {
    expect(isFullSpanZoom({ start: NaN, end: 100 })).toBe(true);
    expect(isFullSpanZoom({ start: 0, end: Infinity })).toBe(true);
  });
});

describe('normalizeZoomRange', () => {
  it('orders a reversed window', () => {
    expect(normalizeZoomRange({ start: 80, end: 20 })).toEqual({ start: 20, end: 80 });
  });

  it('clamps into 0-100', () => {
    expect(normalizeZoomRange({ start: -20, end: 140 })).toEqual({ start: 0, end: 100 });
  });

  it('replaces non-finite edges with the full-span edge', () => {
    expect(normalizeZoomRange({ start: NaN, end: 40 })).toEqual({ start: 0, end: 40 });
    expect(normalizeZoomRange({ start: 10, end: Infinity })).toEqual({ start: 10, end: 100 });
  });
});

describe('computeBufferedDomain', () => {
  it('pads by 10% of the span by default', () => {
    expect(computeBufferedDomain({ min: 100, max: 200 })).toEqual({ min: 90, max: 210 });
  });

  it('uses the absolute value of the buffer', () => {
    expect(computeBufferedDomain({ min: 100, max: 200 }, -0.2)).toEqual({ min: 80, max: 220 });
  });

  it('leaves a zero-span domain alone', () => {
    expect(computeBufferedDomain({ min: 50, max: 50 }, 0.1)).toEqual({ min: 50, max: 50 });
  });
});

describe('percent conversions', () => {
  it('maps domain values to percent of the home range', () => {
    expect(domainValueToPercent(500, { min: 0, max: 1000 })).toBe(50);
    expect(domainValueToPercent(0, { min: -500, max: 500 })).toBe(50);
    expect(domainValueToPercent(1500, { min: 0, max: 1000 })).toBe(150);
    expect(domainValueToPercent(100, { min: 50, max: 50 })).toBe(0);
  });

  it('maps percent back to domain values', () => {
    expect(percentToDomainValue(50, { min: -500, max: 500 })).toBe(0);
    expect(percentToDomainValue(150, { min: 0, max: 1000 })).toBe(1500);
    expect(percentToDomainValue(50, { min: 100, max: 100 })).toBe(100);
  });
});

describe('calculateZoomSpan', () => {
  it('returns the window size in percent of the base', () => {
    expect(calculateZoomSpan({ min: 250, max: 750 }, { min: 0, max: 1000 })).toBe(50);
    expect(calculateZoomSpan({ min: 0, max: 250 }, { min: 0, max: 1000 })).toBe(25);
  });

  it('caps at 100', () => {
    expect(calculateZoomSpan({ min: -500, max: 1500 }, { min: 0, max: 1000 })).toBe(100);
  });

  it('returns 100 for a zero base span and 0 for a reversed window', () => {
    expect(calculateZoomSpan({ min: 100, max: 200 }, { min: 50, max: 50 })).toBe(100);
    expect(calculateZoomSpan({ min: 750, max: 250 }, { min: 0, max: 1000 })).toBe(0);
  });
});
