/**
 * Pixel grids behind the ImageSource contract, one per pixel representation
 */

import { packedPixelToHex, rgbaPixelToHex } from '../color/hex.js';
import { InvalidInputError } from '../errors.js';
import type { RawImage } from './raw.js';
import type { ImageSource } from './types.js';

function assertInBounds(source: ImageSource, x: number, y: number): void {
  if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= source.width || y >= source.height) {
    throw new InvalidInputError(`Unable to get pixel (${x}, ${y}) from ${source.width}x${source.height} image.`);
  }
}

/**
 * Interleaved RGBA buffer; colors come out as lowercase "#rrggbb"
 */
export class RgbaImageSource implements ImageSource {
  readonly width: number;
  readonly height: number;
  private readonly data: Uint8Array;
  private readonly channels: number;

  constructor(image: RawImage) {
    if (image.channels < 3) {
      throw new InvalidInputError(`Expected at least 3 channels, got ${image.channels}.`);
    }
    this.width = image.width;
    this.height = image.height;
    this.data = image.data;
    this.channels = image.channels;
  }

  colorAt(x: number, y: number): string {
    assertInBounds(this, x, y);
    const offset = (y * this.width + x) * this.channels;
    return rgbaPixelToHex({
      r: this.data[offset],
      g: this.data[offset + 1],
      b: this.data[offset + 2],
      alpha: this.channels > 3 ? this.data[offset + 3] : 255,
    });
  }
}

/** Largest value of the 7-bit alpha stored in bits 24-30 */
export const PACKED_ALPHA_TRANSPARENT = 127;

/**
 * Pack RGBA into 0xAARRGGBB with a 7-bit alpha: 0 opaque, 127 fully transparent
 */
export function packRgba(red: number, green: number, blue: number, alpha: number): number {
  const packedAlpha = PACKED_ALPHA_TRANSPARENT - (alpha >> 1);
  return packedAlpha * 0x1000000 + red * 0x10000 + green * 0x100 + blue;
}

/**
 * One packed integer per pixel; colors come out as "#RRGGBB" or "#AARRGGBB"
 */
export class PackedImageSource implements ImageSource {
  readonly width: number;
  readonly height: number;
  private readonly pixels: Uint32Array;

  constructor(pixels: Uint32Array, width: number, height: number) {
    if (pixels.length !== width * height) {
      throw new InvalidInputError(`Expected ${width * height} pixels, got ${pixels.length}.`);
    }
    this.width = width;
    this.height = height;
    this.pixels = pixels;
  }

  static fromRaw(image: RawImage): PackedImageSource {
    const pixels = new Uint32Array(image.width * image.height);
    for (let index = 0; index < pixels.length; index++) {
      const offset = index * image.channels;
      const alpha = image.channels > 3 ? image.data[offset + 3] : 255;
      pixels[index] = packRgba(image.data[offset], image.data[offset + 1], image.data[offset + 2], alpha);
    }
    return new PackedImageSource(pixels, image.width, image.height);
  }

  colorAt(x: number, y: number): string {
    assertInBounds(this, x, y);
    return packedPixelToHex(this.pixels[y * this.width + x]);
  }
}
