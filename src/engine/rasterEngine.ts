/**
 * Raster engine
 *
 * libvips only decodes; the downsample is the box filter in boxResize.ts and
 * pixels are kept as packed integers with a 7-bit alpha.
 */

import { boxResize } from './boxResize.js';
import { decodeRgba, readImageMetadata, targetHeight } from './raw.js';
import { PackedImageSource } from './sources.js';
import type { Engine, ImageInput, ImageSource } from './types.js';

export class RasterEngine implements Engine {
  readonly type = 'raster' as const;

  async load(input: ImageInput, width: number): Promise<ImageSource> {
    const metadata = await readImageMetadata(input);
    const height = targetHeight(width, metadata.width, metadata.height);
    const decoded = await decodeRgba(input);

    return PackedImageSource.fromRaw(boxResize(decoded, width, height));
  }
}
