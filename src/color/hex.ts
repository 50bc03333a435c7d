/**
 * Integer, hex and pixel conversions
 *
 * Examples:
 *   255 → #0000FF
 *   255*256*256 + 255*256 + 255 → #FFFFFF
 *   128*256*256 + 0*256 + 128 → #800080
 */

import { InvalidColorFormatError } from '../errors.js';
import { VALUE_HASH } from './constants.js';
import type { Rgb, RgbaPixel } from './types.js';
import { assertChannelValue, assertRgb } from './validate.js';

const HEX_DIGITS = /^[0-9a-f]+$/i;

function applyCase(value: string, lowercase: boolean): string {
  return lowercase ? value.toLowerCase() : value;
}

/**
 * Single channel: 0..255 → two hex digits
 */
export function rgbToHex(value: number, lowercase: boolean = false): string {
  assertChannelValue(value);
  return applyCase(value.toString(16).toUpperCase().padStart(2, '0'), lowercase);
}

export function rgbsToInt(red: number, green: number, blue: number): number {
  return red * 256 * 256 + green * 256 + blue;
}

export function rgbsToHex(
  red: number,
  green: number,
  blue: number,
  prependHash: boolean = true,
  lowercase: boolean = false
): string {
  return intToHex(rgbsToInt(red, green, blue), prependHash, lowercase);
}

/**
 * Zero-padded to six digits; values carrying alpha above bit 24 keep their extra digits
 */
export function intToHex(color: number, prependHash: boolean = true, lowercase: boolean = false): string {
  const digits = color.toString(16).toUpperCase().padStart(6, '0');
  return applyCase((prependHash ? VALUE_HASH : '') + digits, lowercase);
}

export function intToRgbArray(color: number): Rgb {
  return {
    r: (color >> 16) & 0xff,
    g: (color >> 8) & 0xff,
    b: color & 0xff,
  };
}

/**
 * @throws InvalidColorFormatError when anything but hex digits follows the hash
 */
export function hexToInt(color: string): number {
  const digits = color.replace(/^#+/, '');

  if (!HEX_DIGITS.test(digits)) {
    throw new InvalidColorFormatError(color);
  }

  return parseInt(digits, 16);
}

export function hexToRgbArray(color: string): Rgb {
  return intToRgbArray(hexToInt(color));
}

export function rgbArrayToInt(rgb: Rgb): number {
  assertRgb(rgb);
  return rgbsToInt(rgb.r, rgb.g, rgb.b);
}

export function rgbArrayToHex(rgb: Rgb, prependHash: boolean = true, lowercase: boolean = false): string {
  return intToHex(rgbArrayToInt(rgb), prependHash, lowercase);
}

/**
 * Packed-pixel backend: 0xAARRGGBB where AA is a 7-bit alpha (0 opaque, 127 transparent).
 * Opaque pixels give "#RRGGBB", translucent ones "#ARRGGBB" (alpha 1-15) or "#AARRGGBB".
 */
export function packedPixelToHex(packed: number, prependHash: boolean = true, lowercase: boolean = false): string {
  return intToHex(packed, prependHash, lowercase);
}

/**
 * RGBA-buffer backend: alpha is dropped, digits are lowercase unless asked otherwise
 */
export function rgbaPixelToHex(pixel: RgbaPixel, prependHash: boolean = true, lowercase: boolean = true): string {
  const digits = [pixel.r, pixel.g, pixel.b].map(channel => channel.toString(16).padStart(2, '0')).join('');
  const hex = (prependHash ? VALUE_HASH : '') + digits;
  return lowercase ? hex : hex.toUpperCase();
}
