/**
 * ANSI truecolor escape sequences and half-block glyphs
 */

import type { Rgb } from '../color/types.js';

export const UPPER_HALF_BLOCK = '▀';
export const LOWER_HALF_BLOCK = '▄';

export const RESET = '\x1b[0m';

export function foreground(rgb: Rgb): string {
  return `\x1b[38;2;${rgb.r};${rgb.g};${rgb.b}m`;
}

export function background(rgb: Rgb): string {
  return `\x1b[48;2;${rgb.r};${rgb.g};${rgb.b}m`;
}
