/**
 * Half-block cell formatting
 *
 * One terminal cell shows two stacked pixels: the upper half block takes the
 * top color as foreground and the bottom color as background.
 */

import { hexToRgbArray } from '../color/hex.js';
import { InvalidColorFormatError } from '../errors.js';
import { background, foreground, LOWER_HALF_BLOCK, RESET, UPPER_HALF_BLOCK } from './ansi.js';

export const TRANSPARENT = 'transparent';

export const DEFAULT_TRANSPARENT_COLOR = '#000000';

// packed alpha below 0x10 prints as a single digit
const ALPHA_HEX = /^#?[0-9a-f]{1,2}([0-9a-f]{6})$/i;
const RGB_HEX = /^#?([0-9a-f]{6})$/i;

export interface CellOptions {
  /** Color rendered as transparent (default #000000) */
  transparentColor?: string;
  /** Number of identical cells to emit */
  repeat?: number;
}

/**
 * Normalize a color tag to "#RRGGBB" or TRANSPARENT
 *
 * - "transparent" passes through
 * - 7 or 8-digit values (alpha first) keep their trailing six digits
 * - the transparent sentinel (compared case-insensitively) maps to TRANSPARENT
 *
 * @throws InvalidColorFormatError for anything else
 */
export function translateColor(color: string, transparentColor: string = DEFAULT_TRANSPARENT_COLOR): string {
  if (color === TRANSPARENT) {
    return TRANSPARENT;
  }

  const match = ALPHA_HEX.exec(color) ?? RGB_HEX.exec(color);

  if (!match) {
    throw new InvalidColorFormatError(color);
  }

  const normalized = `#${match[1]}`;

  if (normalized.toLowerCase() === `#${transparentColor.replace(/^#/, '')}`.toLowerCase()) {
    return TRANSPARENT;
  }

  return normalized;
}

/**
 * Format one cell from a top and bottom color; a null bottom repeats the top
 */
export function get1x2Pixel(colorTop: string, colorBottom: string | null = null, options: CellOptions = {}): string {
  const { transparentColor = DEFAULT_TRANSPARENT_COLOR, repeat = 1 } = options;

  const top = translateColor(colorTop, transparentColor);
  const bottom = translateColor(colorBottom ?? colorTop, transparentColor);

  if (top === TRANSPARENT && bottom === TRANSPARENT) {
    return ' '.repeat(repeat);
  }

  if (top === TRANSPARENT) {
    return foreground(hexToRgbArray(bottom)) + LOWER_HALF_BLOCK.repeat(repeat) + RESET;
  }

  if (bottom === TRANSPARENT) {
    return foreground(hexToRgbArray(top)) + UPPER_HALF_BLOCK.repeat(repeat) + RESET;
  }

  return foreground(hexToRgbArray(top)) + background(hexToRgbArray(bottom)) + UPPER_HALF_BLOCK.repeat(repeat) + RESET;
}
