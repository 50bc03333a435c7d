/**
 * ansi-image-map
 *
 * Renders raster images as truecolor half-block terminal text with optional
 * map markers projected from latitude/longitude.
 */

export { CliImage } from './cliImage.js';
export type { CliImageOptions } from './cliImage.js';
export * from './config.js';
export * from './errors.js';
export * from './color/index.js';
export * from './projection/index.js';
export * from './render/index.js';
export * from './engine/index.js';
export { PRECISION_NONE, roundHalfAwayFromZero } from './utils/math.js';
