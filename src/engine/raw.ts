/**
 * Raw pixel buffers and the sharp decode step both engines share
 */

import sharp from 'sharp';
import { DecodeFailureError, ResizeFailureError } from '../errors.js';
import type { ImageInput } from './types.js';

/** Interleaved 8-bit pixels, row-major */
export interface RawImage {
  data: Uint8Array;
  width: number;
  height: number;
  channels: number;
}

export interface ImageMetadata {
  width: number;
  height: number;
  format: SupportedFormat;
}

export type SupportedFormat = 'gif' | 'png' | 'jpeg';

const SUPPORTED_FORMATS: readonly string[] = ['gif', 'png', 'jpeg'];

function isSupportedFormat(format: string | undefined): format is SupportedFormat {
  return format !== undefined && SUPPORTED_FORMATS.includes(format);
}

function describeInput(input: ImageInput): string {
  return typeof input === 'string' ? `"${input}"` : `buffer (${input.length} bytes)`;
}

/**
 * Read dimensions and format without decoding pixels
 *
 * @throws DecodeFailureError for unreadable input or formats other than GIF, PNG, JPEG
 */
export async function readImageMetadata(input: ImageInput): Promise<ImageMetadata> {
  let metadata: sharp.Metadata;

  try {
    metadata = await sharp(input).metadata();
  } catch (error) {
    throw new DecodeFailureError(`Unable to load image from ${describeInput(input)}.`, { cause: error });
  }

  const { format, width, height } = metadata;

  if (!isSupportedFormat(format)) {
    throw new DecodeFailureError(`Unsupported image type "${format ?? 'unknown'}" in ${describeInput(input)}.`);
  }

  if (!width || !height) {
    throw new DecodeFailureError(`Unable to get image dimensions from ${describeInput(input)}.`);
  }

  return { width, height, format };
}

/**
 * Height that keeps the aspect ratio at the requested width
 *
 * @throws ResizeFailureError when width is not a positive integer
 */
export function targetHeight(width: number, sourceWidth: number, sourceHeight: number): number {
  if (!Number.isInteger(width) || width <= 0) {
    throw new ResizeFailureError(`Unable to resize given image to width ${width}.`);
  }

  const aspectRatio = sourceWidth / sourceHeight;
  return Math.max(1, Math.round(width / aspectRatio));
}

/**
 * Decode to RGBA at the original size
 */
export async function decodeRgba(input: ImageInput): Promise<RawImage> {
  try {
    const { data, info } = await sharp(input).ensureAlpha().raw().toBuffer({ resolveWithObject: true });
    return { data, width: info.width, height: info.height, channels: info.channels };
  } catch (error) {
    throw new DecodeFailureError(`Unable to decode image from ${describeInput(input)}.`, { cause: error });
  }
}
