export type LightingErrorCode = 'InvalidDimensions' | 'OutOfBounds' | 'InvalidConfig';

/**
 * Base class for failures raised by the lighting engine.
 * `code` is stable and meant for programmatic handling by callers.
 */
export class LightingError extends Error {
  constructor(
    message: string,
    public readonly code: LightingErrorCode,
  ) {
    super(message);
    this.name = 'LightingError';
  }
}

/** Zero-sized grid, or a buffer whose length does not match its shape. */
export class InvalidDimensionsError extends LightingError {
  constructor(detail: string) {
    super(detail, 'InvalidDimensions');
    this.name = 'InvalidDimensionsError';
  }
}

/** Light source outside the grid, or at a non-finite position. */
export class OutOfBoundsError extends LightingError {
  constructor(detail: string) {
    super(detail, 'OutOfBounds');
    this.name = 'OutOfBoundsError';
  }
}

export class ConfigError extends LightingError {
  constructor(detail: string) {
    super(detail, 'InvalidConfig');
    this.name = 'ConfigError';
  }
}
