/**
 * Kavrayskiy VII projection
 *
 * https://en.wikipedia.org/wiki/Kavrayskiy_VII_projection
 *
 * Scale and centering constants are tuned for equirectangular-style world map
 * rasters and belong to this projection only.
 */

import { degreesToRadians, radiansToDegrees, roundHalfAwayFromZero } from '../utils/math.js';
import type { Point } from './types.js';

export const KAVRAYSKIY_VII = 'kavrayskiy-vii' as const;

const MAP_SCALE_X = 1.42;
const MAP_SCALE_Y = 1.25;
const MAP_SHIFT_X = 0.17;
const MAP_SHIFT_Y = 0.01;

/**
 * Project latitude/longitude (degrees) onto a width × height raster
 *
 * @returns Integer pixel position (may fall outside the raster)
 */
export function projectKavrayskiyVii(latitude: number, longitude: number, width: number, height: number): Point {
  const widthMap = width * MAP_SCALE_X;
  const heightMap = height * MAP_SCALE_Y;

  const xMove = -widthMap * MAP_SHIFT_X;
  const yMove = -heightMap * MAP_SHIFT_Y;

  const widthDegree = widthMap / 360;
  const heightDegree = heightMap / 180;

  const pointXMiddle = widthMap / 2 + xMove;
  const pointYMiddle = heightMap / 2 + yMove;

  const latitudeRadian = degreesToRadians(latitude);
  const longitudeRadian = degreesToRadians(longitude);

  const compressedLongitude = radiansToDegrees(
    ((3 * longitudeRadian) / 2) * Math.sqrt(1 / 3 - (latitudeRadian / Math.PI) ** 2)
  );

  return {
    x: roundHalfAwayFromZero(pointXMiddle + compressedLongitude * widthDegree),
    y: roundHalfAwayFromZero(pointYMiddle - latitude * heightDegree),
  };
}
