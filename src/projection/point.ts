/**
 * Point construction
 *
 * Cartesian points are taken as-is; spherical points are projected onto the
 * target raster. Returned points are new objects; inputs are never mutated.
 */

import { InvalidInputError, MissingDimensionsError, UnsupportedProjectionError } from '../errors.js';
import { KAVRAYSKIY_VII, projectKavrayskiyVii } from './kavrayskiy.js';
import type { Point, SphericalPointOptions } from './types.js';

export function cartesianPoint(x: number, y: number): Point {
  return { x, y };
}

/**
 * Project a geographic coordinate to a pixel point
 *
 * @throws MissingDimensionsError when width or height is absent
 * @throws UnsupportedProjectionError for any projection but kavrayskiy-vii
 */
export function sphericalPoint(latitude: number, longitude: number, options: SphericalPointOptions = {}): Point {
  const { projection = KAVRAYSKIY_VII, width, height } = options;

  if (width === undefined || height === undefined) {
    throw new MissingDimensionsError();
  }

  return project(latitude, longitude, width, height, projection);
}

/**
 * Dispatch on projection name
 */
export function project(
  latitude: number,
  longitude: number,
  width: number,
  height: number,
  projection: string = KAVRAYSKIY_VII
): Point {
  switch (projection) {
    case KAVRAYSKIY_VII:
      return projectKavrayskiyVii(latitude, longitude, width, height);
    default:
      throw new UnsupportedProjectionError(projection);
  }
}

/**
 * General constructor mirroring both coordinate systems
 */
export function createPoint(
  x: number,
  y: number,
  coordinateSystem: string = 'cartesian',
  projection: string = 'none',
  width?: number,
  height?: number
): Point {
  switch (coordinateSystem) {
    case 'cartesian':
      return cartesianPoint(x, y);
    case 'spherical':
      return sphericalPoint(x, y, { projection, width, height });
    default:
      throw new InvalidInputError(`Invalid coordinate system "${coordinateSystem}".`);
  }
}
