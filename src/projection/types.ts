/**
 * Projection types
 */

/**
 * Planar point in image pixel space.
 * Floats are kept as given; cells are matched by truncating to integers.
 */
export interface Point {
  x: number;
  y: number;
}

export interface SphericalPointOptions {
  /** Defaults to kavrayskiy-vii */
  projection?: string;
  /** Target raster width in pixels */
  width?: number;
  /** Target raster height in pixels */
  height?: number;
}
