/**
 * CliImage
 *
 * Owns one resized image and its marker overlay. Loading is asynchronous
 * (decoding runs in libvips); rendering is synchronous and rebuilt on every call.
 */

import { hexToInt } from './color/hex.js';
import { intToLabArray } from './color/spaces.js';
import type { Lab } from './color/types.js';
import { DEFAULT_CONFIG, parsePrecision, parseTransparentColor } from './config.js';
import { createEngine } from './engine/index.js';
import type { ImageInput, ImageSource } from './engine/types.js';
import { KAVRAYSKIY_VII } from './projection/kavrayskiy.js';
import { sphericalPoint } from './projection/point.js';
import type { Point } from './projection/types.js';
import { MarkerOverlay } from './render/markers.js';
import type { MarkerPoints } from './render/markers.js';
import { renderLines } from './render/renderLines.js';
import { debug, warn } from './utils/debug.js';
import { time, timeAsync } from './utils/timing.js';

export interface CliImageOptions {
  /** Target width in columns (default 80) */
  width?: number;
  /** sharp | raster (default sharp) */
  engine?: string;
  /** Color rendered as transparent (default #000000) */
  transparentColor?: string;
  /** Decimals for getLabAt, -1 = unrounded (default) */
  precision?: number;
}

interface RenderSettings {
  transparentColor: string;
  precision: number;
}

function resolveSettings(options: CliImageOptions): RenderSettings {
  return {
    transparentColor: parseTransparentColor(options.transparentColor ?? DEFAULT_CONFIG.transparentColor),
    precision: parsePrecision(options.precision ?? DEFAULT_CONFIG.precision),
  };
}

export class CliImage {
  private readonly markers = new MarkerOverlay();

  private constructor(
    private readonly source: ImageSource,
    private readonly settings: RenderSettings
  ) {}

  /**
   * Decode and resize an image file or buffer
   *
   * @throws UnsupportedEngineError before any decoding for unknown engines
   * @throws DecodeFailureError for unreadable or non GIF/PNG/JPEG input
   * @throws ResizeFailureError when the width cannot be produced
   */
  static async create(input: ImageInput, options: CliImageOptions = {}): Promise<CliImage> {
    const engine = createEngine(options.engine ?? DEFAULT_CONFIG.engine);
    const settings = resolveSettings(options);
    const width = options.width ?? DEFAULT_CONFIG.width;

    const source = await timeAsync(() => engine.load(input, width), `${engine.type} engine load`);
    debug(`Loaded image with ${engine.type} engine`, { width: source.width, height: source.height });

    return new CliImage(source, settings);
  }

  static fromPath(path: string, options: CliImageOptions = {}): Promise<CliImage> {
    return CliImage.create(path, options);
  }

  static fromBuffer(buffer: Buffer, options: CliImageOptions = {}): Promise<CliImage> {
    return CliImage.create(buffer, options);
  }

  /**
   * Wrap an already resized pixel source (custom backends, in-memory grids)
   */
  static fromSource(source: ImageSource, options: Omit<CliImageOptions, 'width' | 'engine'> = {}): CliImage {
    return new CliImage(source, resolveSettings(options));
  }

  get width(): number {
    return this.source.width;
  }

  get height(): number {
    return this.source.height;
  }

  getColorAt(x: number, y: number): string {
    return this.source.colorAt(x, y);
  }

  /**
   * CIE Lab of a resized pixel, rounded to the configured precision
   */
  getLabAt(x: number, y: number): Lab {
    return intToLabArray(hexToInt(this.source.colorAt(x, y)), this.settings.precision);
  }

  getPoints(): Map<string, Point> {
    return new Map(this.markers.entries());
  }

  /**
   * Replace all markers. Tags are validated when a marker lands on a rendered cell.
   */
  setPoints(points: MarkerPoints): this {
    this.markers.replaceAll(points);
    return this;
  }

  addCoordinate(color: string, point: Point): this {
    this.markers.set(color, point);
    return this;
  }

  /**
   * Add a marker at a geographic coordinate, projected onto the resized image
   */
  addCoordinateSpherical(color: string, latitude: number, longitude: number, projection: string = KAVRAYSKIY_VII): this {
    const point = sphericalPoint(latitude, longitude, { projection, width: this.width, height: this.height });

    if (point.x < 0 || point.y < 0 || point.x >= this.width || point.y >= this.height) {
      warn(`Marker ${color} at ${latitude},${longitude} falls outside the image`, point);
    }

    this.markers.set(color, point);
    return this;
  }

  getAsciiLines(): string[] {
    return time(
      () => renderLines(this.source, this.markers, { transparentColor: this.settings.transparentColor }),
      'render'
    );
  }

  getAsciiString(): string {
    return this.getAsciiLines().join('\n');
  }
}
