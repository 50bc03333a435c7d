/**
 * Numeric helpers shared by the color and projection math
 */

/** Sentinel precision: leave values unrounded */
export const PRECISION_NONE = -1;

/**
 * Round half away from zero to the given number of decimals
 */
export function roundHalfAwayFromZero(value: number, decimals: number = 0): number {
  const factor = 10 ** decimals;
  // nudge by one epsilon so decimal ties such as 1.005 round up
  const rounded = (Math.sign(value) * Math.round(Math.abs(value) * factor * (1 + Number.EPSILON))) / factor;
  // normalize -0
  return rounded === 0 ? 0 : rounded;
}

/**
 * Apply an optional precision; PRECISION_NONE returns the value untouched
 */
export function applyPrecision(value: number, precision: number): number {
  if (precision === PRECISION_NONE) {
    return value;
  }
  return roundHalfAwayFromZero(value, precision);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export function degreesToRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}

export function radiansToDegrees(radians: number): number {
  return radians * (180 / Math.PI);
}
