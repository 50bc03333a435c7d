/**
 * Color-space constants
 * Process-wide immutable tables: transform matrix, white point, channel ranges
 */

import type { Matrix3x3 } from '../utils/matrix.js';

export const VALUE_HASH = '#';

/** Linearization threshold of the sRGB transfer curve */
export const SRGB_LINEAR_THRESHOLD = 0.03928;

/* http://www.brucelindbloom.com/index.html?Eqn_RGB_XYZ_Matrix.html (sRGB → XYZ) */
export const MATRIX_SRGB_XYZ: Matrix3x3 = [
  [0.4124564, 0.3575761, 0.1804375],
  [0.2126729, 0.7151522, 0.072175],
  [0.0193339, 0.119192, 0.9503041],
];

/* https://en.wikipedia.org/wiki/Illuminant_D65#Definition */
export const WHITE_POINT_D65 = {
  x: 0.95047,
  y: 1,
  z: 1.08883,
} as const;

/** Lab companding threshold (6/29)^3 */
export const LAB_EPSILON = 216 / 24389;

export const RGB_RANGE = { min: 0, max: 255 } as const;

export const LAB_RANGES = {
  L: { min: 0, max: 100 },
  a: { min: -128, max: 127 },
  b: { min: -128, max: 127 },
} as const;

export const CHANNELS_RGB = ['r', 'g', 'b'] as const;
export const CHANNELS_SRGB = ['r', 'g', 'b'] as const;
export const CHANNELS_XYZ = ['x', 'y', 'z'] as const;
