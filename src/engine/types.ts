/**
 * Engine contract
 *
 * An engine turns an image path or buffer into a resized pixel grid. The
 * renderer only sees the ImageSource side of it.
 */

export type EngineType = 'sharp' | 'raster';

export type ImageInput = string | Buffer;

/**
 * Resized pixel grid borrowed by the renderer for one pass
 */
export interface ImageSource {
  readonly width: number;
  readonly height: number;
  /** Hex color tag: "#RRGGBB", or "#AARRGGBB" when the backend carries alpha */
  colorAt(x: number, y: number): string;
}

export interface Engine {
  readonly type: EngineType;
  /**
   * Decode and scale to the target width, preserving aspect ratio
   */
  load(input: ImageInput, width: number): Promise<ImageSource>;
}
