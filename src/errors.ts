/**
 * Error types thrown by the plotting core.
 *
 * Construction errors are raised while building model values (ranges, grids, styles),
 * never from inside a render pass. A model instance that exists is always valid.
 */

export type PlotErrorCode = 'INVALID_RANGE' | 'INVALID_GRID' | 'INVALID_STYLE' | 'LOCK_CONFLICT';

export class PlotError extends Error {
  readonly code: PlotErrorCode;

  constructor(message: string, code: PlotErrorCode) {
    super(message);
    this.name = 'PlotError';
    this.code = code;
  }
}

/**
 * Base class for every error raised while constructing a model value.
 */
export class ConstructionError extends PlotError {
  constructor(message: string, code: PlotErrorCode) {
    super(message, code);
    this.name = 'ConstructionError';
  }
}

export class InvalidRangeError extends ConstructionError {
  constructor(message: string) {
    super(message, 'INVALID_RANGE');
    this.name = 'InvalidRangeError';
  }
}

export class InvalidGridError extends ConstructionError {
  constructor(message: string) {
    super(message, 'INVALID_GRID');
    this.name = 'InvalidGridError';
  }
}

export class InvalidStyleError extends ConstructionError {
  constructor(message: string) {
    super(message, 'INVALID_STYLE');
    this.name = 'InvalidStyleError';
  }
}

/**
 * Raised when a shared handle is written while another reader or writer holds it.
 */
export class LockError extends PlotError {
  constructor(message: string) {
    super(message, 'LOCK_CONFLICT');
    this.name = 'LockError';
  }
}
