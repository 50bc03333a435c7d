/**
 * sharp engine
 *
 * Decodes with libvips, box-averages with boxResize and reads colors straight
 * from the RGBA buffer (lowercase "#rrggbb", alpha dropped).
 */

import { boxResize } from './boxResize.js';
import { decodeRgba, readImageMetadata, targetHeight } from './raw.js';
import { RgbaImageSource } from './sources.js';
import type { Engine, ImageInput, ImageSource } from './types.js';

export class SharpEngine implements Engine {
  readonly type = 'sharp' as const;

  async load(input: ImageInput, width: number): Promise<ImageSource> {
    const metadata = await readImageMetadata(input);
    const height = targetHeight(width, metadata.width, metadata.height);
    const decoded = await decodeRgba(input);

    return new RgbaImageSource(boxResize(decoded, width, height));
  }
}
