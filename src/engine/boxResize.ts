/**
 * Box filter resampling
 *
 * Each target pixel is the area-weighted mean of the source pixels it covers.
 * Channels (alpha included) are averaged independently and rounded.
 */

import type { RawImage } from './raw.js';

interface Contribution {
  index: number;
  weight: number;
}

/**
 * Source indices and weights covering each target index along one axis
 */
export function boxContributions(sourceSize: number, targetSize: number): Contribution[][] {
  const scale = sourceSize / targetSize;
  const contributions: Contribution[][] = [];

  for (let target = 0; target < targetSize; target++) {
    const start = target * scale;
    const end = start + scale;
    const last = Math.min(Math.ceil(end), sourceSize);
    const row: Contribution[] = [];

    for (let source = Math.floor(start); source < last; source++) {
      const overlap = Math.min(end, source + 1) - Math.max(start, source);
      if (overlap > 0) {
        row.push({ index: source, weight: overlap / scale });
      }
    }

    contributions.push(row);
  }

  return contributions;
}

export function boxResize(image: RawImage, width: number, height: number): RawImage {
  const { channels } = image;
  const columns = boxContributions(image.width, width);
  const rows = boxContributions(image.height, height);
  const data = new Uint8Array(width * height * channels);
  const sums = new Float64Array(channels);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      sums.fill(0);

      for (const row of rows[y]) {
        for (const column of columns[x]) {
          const weight = row.weight * column.weight;
          const offset = (row.index * image.width + column.index) * channels;
          for (let channel = 0; channel < channels; channel++) {
            sums[channel] += image.data[offset + channel] * weight;
          }
        }
      }

      const target = (y * width + x) * channels;
      for (let channel = 0; channel < channels; channel++) {
        data[target + channel] = Math.min(255, Math.max(0, Math.round(sums[channel])));
      }
    }
  }

  return { data, width, height, channels };
}
