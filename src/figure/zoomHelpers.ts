/**
 * Zoom helper utilities for domain calculations and zoom state checks.
 *
 * Pure functions converting percent-space zoom windows [0-100] into
 * domain coordinates relative to an axis' home range, and back.
 * Used by `AxesModel.zoomTo` for programmatic zoom.
 *
 * @module zoomHelpers
 */

/**
 * Percent-space window over a base domain. `start` and `end` are in [0, 100].
 */
export interface ZoomRange {
  readonly start: number;
  readonly end: number;
}

/**
 * Domain boundaries with min and max values.
 */
export interface DomainBounds {
  readonly min: number;
  readonly max: number;
}

/**
 * Visible domain with the fraction of the base domain it covers.
 */
export interface VisibleDomain extends DomainBounds {
  readonly spanFraction: number;
}

/**
 * Computes the visible domain from a base domain and zoom range.
 *
 * Returns the full base domain when zoom is null/undefined, or when the base
 * domain has zero or non-finite span.
 *
 * @example
 * ```ts
 * computeVisibleDomain({ min: 0, max: 1000 }, { start: 25, end: 75 });
 * // { min: 250, max: 750, spanFraction: 0.5 }
 * ```
 */
export function computeVisibleDomain(
  baseDomain: DomainBounds,
  zoomRange?: ZoomRange | null
): VisibleDomain {
  if (!zoomRange) {
    return { ...baseDomain, spanFraction: 1 };
  }

  const span = baseDomain.max - baseDomain.min;
  if (!Number.isFinite(span) || span === 0) {
    return { ...baseDomain, spanFraction: 1 };
  }

  const start = zoomRange.start;
  const end = zoomRange.end;

  return {
    min: baseDomain.min + (start / 100) * span,
    max: baseDomain.min + (end / 100) * span,
    spanFraction: (end - start) / 100,
  };
}

/**
 * Checks if a zoom range represents a full-span (unzoomed) view.
 *
 * A 0.5% tolerance absorbs floating-point drift at the edges.
 *
 * @example
 * ```ts
 * isFullSpanZoom(null);                        // true
 * isFullSpanZoom({ start: -0.1, end: 100.1 }); // true
 * isFullSpanZoom({ start: 25, end: 75 });      // false
 * ```
 */
export function isFullSpanZoom(zoomRange: ZoomRange | null | undefined): boolean {
  if (zoomRange == null) return true;

  const { start, end } = zoomRange;
  if (!Number.isFinite(start) || !Number.isFinite(end)) return true;

  const TOLERANCE = 0.5;
  return start <= TOLERANCE && end >= 100 - TOLERANCE;
}

/**
 * Widens a domain by a fraction of its span on each side.
 *
 * @example
 * ```ts
 * computeBufferedDomain({ min: 100, max: 200 }, 0.1); // { min: 90, max: 210 }
 * ```
 */
export function computeBufferedDomain(
  visibleDomain: DomainBounds,
  bufferPercent: number = 0.1
): DomainBounds {
  const span = visibleDomain.max - visibleDomain.min;
  if (!Number.isFinite(span) || span <= 0) {
    return { ...visibleDomain };
  }

  const buffer = span * Math.abs(bufferPercent);
  return {
    min: visibleDomain.min - buffer,
    max: visibleDomain.max + buffer,
  };
}

/**
 * Converts a domain coordinate to percent-space relative to the base domain.
 * Returns 0 for zero or non-finite spans.
 */
export function domainValueToPercent(value: number, baseDomain: DomainBounds): number {
  const span = baseDomain.max - baseDomain.min;
  if (!Number.isFinite(span) || span === 0) return 0;

  return ((value - baseDomain.min) / span) * 100;
}

/**
 * Inverse of `domainValueToPercent`.
 */
export function percentToDomainValue(percent: number, baseDomain: DomainBounds): number {
  const span = baseDomain.max - baseDomain.min;
  return baseDomain.min + (percent / 100) * span;
}

/**
 * Calculates the zoom span (in percent) of a window domain over a base domain.
 */
export function calculateZoomSpan(windowDomain: DomainBounds, baseDomain: DomainBounds): number {
  const baseSpan = baseDomain.max - baseDomain.min;
  const windowSpan = windowDomain.max - windowDomain.min;

  if (!Number.isFinite(baseSpan) || baseSpan === 0) return 100;
  if (!Number.isFinite(windowSpan) || windowSpan < 0) return 0;

  return Math.min(100, (windowSpan / baseSpan) * 100);
}

/**
 * Orders and clamps a zoom window into [0, 100].
 */
export function normalizeZoomRange(zoomRange: ZoomRange): ZoomRange {
  const a = Number.isFinite(zoomRange.start) ? zoomRange.start : 0;
  const b = Number.isFinite(zoomRange.end) ? zoomRange.end : 100;
  const lo = Math.min(100, Math.max(0, Math.min(a, b)));
  const hi = Math.min(100, Math.max(0, Math.max(a, b)));
  return { start: lo, end: hi };
}
