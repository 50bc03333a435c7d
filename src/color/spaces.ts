/**
 * Color-space conversions: RGB → sRGB → XYZ → Lab
 *
 * Every function takes an optional precision (decimal places, half away from
 * zero); PRECISION_NONE leaves results unrounded.
 */

import { applyPrecision, clamp, PRECISION_NONE } from '../utils/math.js';
import { multiplyMatrixVector } from '../utils/matrix.js';
import { LAB_EPSILON, LAB_RANGES, MATRIX_SRGB_XYZ, SRGB_LINEAR_THRESHOLD, WHITE_POINT_D65 } from './constants.js';
import { intToRgbArray } from './hex.js';
import type { Lab, Rgb, Srgb, Xyz } from './types.js';
import { assertChannelValue, assertRgb, assertSrgb, assertXyz } from './validate.js';

/**
 * Single channel: 8-bit value → linear sRGB in [0, 1]
 */
export function rgbToSrgb(value: number, precision: number = PRECISION_NONE): number {
  assertChannelValue(value);

  const normalized = value / 255;
  const srgb = normalized <= SRGB_LINEAR_THRESHOLD
    ? normalized / 12.92
    : ((normalized + 0.055) / 1.055) ** 2.4;

  return applyPrecision(srgb, precision);
}

/**
 * Lab companding function f(t)
 */
export function xyzToLab(value: number, precision: number = PRECISION_NONE): number {
  const lab = value > LAB_EPSILON ? Math.cbrt(value) : (841 * value) / 108 + 4 / 29;
  return applyPrecision(lab, precision);
}

export function rgbArrayToSrgbArray(rgb: Rgb, precision: number = PRECISION_NONE): Srgb {
  assertRgb(rgb);

  return {
    r: rgbToSrgb(rgb.r, precision),
    g: rgbToSrgb(rgb.g, precision),
    b: rgbToSrgb(rgb.b, precision),
  };
}

export function srgbArrayToXyzArray(srgb: Srgb, precision: number = PRECISION_NONE): Xyz {
  assertSrgb(srgb);

  const [x, y, z] = multiplyMatrixVector(MATRIX_SRGB_XYZ, [srgb.r, srgb.g, srgb.b]);

  return {
    x: applyPrecision(x, precision),
    y: applyPrecision(y, precision),
    z: applyPrecision(z, precision),
  };
}

/**
 * XYZ (D65) → Lab, clamped to L ∈ [0, 100] and a, b ∈ [-128, 127]
 */
export function xyzArrayToLabArray(xyz: Xyz, precision: number = PRECISION_NONE): Lab {
  assertXyz(xyz);

  const fx = xyzToLab(xyz.x / WHITE_POINT_D65.x);
  const fy = xyzToLab(xyz.y / WHITE_POINT_D65.y);
  const fz = xyzToLab(xyz.z / WHITE_POINT_D65.z);

  const lightness = clamp(116 * fy - 16, LAB_RANGES.L.min, LAB_RANGES.L.max);
  const a = clamp(500 * (fx - fy), LAB_RANGES.a.min, LAB_RANGES.a.max);
  const b = clamp(200 * (fy - fz), LAB_RANGES.b.min, LAB_RANGES.b.max);

  return {
    L: applyPrecision(lightness, precision),
    a: applyPrecision(a, precision),
    b: applyPrecision(b, precision),
  };
}

export function intToLabArray(color: number, precision: number = PRECISION_NONE): Lab {
  return xyzArrayToLabArray(srgbArrayToXyzArray(rgbArrayToSrgbArray(intToRgbArray(color))), precision);
}
