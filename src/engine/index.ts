/**
 * Engine Module Index
 */

import { UnsupportedEngineError } from '../errors.js';
import { RasterEngine } from './rasterEngine.js';
import { SharpEngine } from './sharpEngine.js';
import type { Engine, EngineType } from './types.js';

export * from './types.js';
export * from './raw.js';
export * from './boxResize.js';
export * from './sources.js';
export { RasterEngine } from './rasterEngine.js';
export { SharpEngine } from './sharpEngine.js';

export const ENGINE_TYPES: readonly EngineType[] = ['sharp', 'raster'];

export function isEngineType(value: string): value is EngineType {
  return ENGINE_TYPES.some(type => type === value);
}

/**
 * @throws UnsupportedEngineError for unknown engine tags
 */
export function createEngine(type: string): Engine {
  if (!isEngineType(type)) {
    throw new UnsupportedEngineError(type);
  }

  switch (type) {
    case 'sharp':
      return new SharpEngine();
    case 'raster':
      return new RasterEngine();
  }
}
