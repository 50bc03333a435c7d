/**
 * Terminal renderer
 *
 * Walks the image two rows at a time and emits one line per pair. An odd
 * final row is dropped: the line count is floor(height / 2).
 * Output is rebuilt on every call.
 */

import type { ImageSource } from '../engine/types.js';
import { get1x2Pixel, TRANSPARENT } from './halfBlock.js';
import type { MarkerOverlay } from './markers.js';

export interface RenderOptions {
  /** Color rendered as transparent (default #000000) */
  transparentColor?: string;
}

/**
 * Render an image to terminal lines
 *
 * @param image - Resized pixel source
 * @param markers - Overlay consulted read-only; marker colors replace pixel colors
 * @returns One string per output row
 */
export function renderLines(image: ImageSource, markers: MarkerOverlay, options: RenderOptions = {}): string[] {
  const { width, height } = image;
  const lineCount = Math.floor(height / 2);
  const lines: string[] = [];

  for (let lineY = 0; lineY < lineCount; lineY++) {
    const rowTop = 2 * lineY;
    const rowBottom = 2 * lineY + 1;
    let line = '';

    for (let cellX = 0; cellX < width; cellX++) {
      const colorTop = image.colorAt(cellX, rowTop);
      const colorBottom = rowBottom < height ? image.colorAt(cellX, rowBottom) : TRANSPARENT;

      line += get1x2Pixel(
        markers.colorAt(cellX, rowTop) ?? colorTop,
        markers.colorAt(cellX, rowBottom) ?? colorBottom,
        options
      );
    }

    lines.push(line);
  }

  return lines;
}

export function renderString(image: ImageSource, markers: MarkerOverlay, options: RenderOptions = {}): string {
  return renderLines(image, markers, options).join('\n');
}
