/**
 * Error types
 *
 * Every failure the library raises is a CliImageError carrying a stable code.
 * Only the CLI translates these into messages and exit codes.
 */

export type CliImageErrorCode =
  | 'DECODE_FAILURE'
  | 'RESIZE_FAILURE'
  | 'INVALID_COLOR_FORMAT'
  | 'INVALID_INPUT'
  | 'UNSUPPORTED_PROJECTION'
  | 'MISSING_DIMENSIONS'
  | 'UNSUPPORTED_ENGINE'
  | 'INVALID_CONFIGURATION';

export class CliImageError extends Error {
  readonly code: CliImageErrorCode;

  constructor(code: CliImageErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Bytes or file are not a readable GIF, PNG or JPEG image
 */
export class DecodeFailureError extends CliImageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DECODE_FAILURE', message, options);
  }
}

/**
 * Backend could not scale the image to the requested width
 */
export class ResizeFailureError extends CliImageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RESIZE_FAILURE', message, options);
  }
}

export class InvalidColorFormatError extends CliImageError {
  constructor(color: string) {
    super('INVALID_COLOR_FORMAT', `Unexpected color given "${color}".`);
  }
}

/**
 * Color-space conversion received a malformed channel map
 */
export class InvalidInputError extends CliImageError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
  }
}

export class UnsupportedProjectionError extends CliImageError {
  constructor(projection: string) {
    super('UNSUPPORTED_PROJECTION', `Invalid projection "${projection}" given.`);
  }
}

export class MissingDimensionsError extends CliImageError {
  constructor() {
    super('MISSING_DIMENSIONS', 'Spherical coordinates require width and height.');
  }
}

export class UnsupportedEngineError extends CliImageError {
  constructor(engine: string) {
    super('UNSUPPORTED_ENGINE', `Unsupported engine type "${engine}".`);
  }
}

export class InvalidConfigurationError extends CliImageError {
  constructor(message: string) {
    super('INVALID_CONFIGURATION', message);
  }
}
