/**
 * Configuration
 *
 * Defaults for the facade and the environment mapping used by the CLI:
 *   CLI_IMAGE_WIDTH              target columns (positive integer, default 80)
 *   CLI_IMAGE_ENGINE             sharp | raster (default sharp)
 *   CLI_IMAGE_TRANSPARENT_COLOR  rendered as transparent (default #000000)
 *   CLI_IMAGE_PRECISION          decimals for color-space output, -1 = unrounded
 *   CLI_IMAGE_DEBUG              enables [DEBUG] logging
 */

import { isEngineType } from './engine/index.js';
import type { EngineType } from './engine/types.js';
import { InvalidConfigurationError } from './errors.js';
import { DEFAULT_TRANSPARENT_COLOR } from './render/halfBlock.js';
import { PRECISION_NONE } from './utils/math.js';

export interface CliImageConfig {
  width: number;
  engine: EngineType;
  transparentColor: string;
  precision: number;
}

export const DEFAULT_CONFIG: Readonly<CliImageConfig> = {
  width: 80,
  engine: 'sharp',
  transparentColor: DEFAULT_TRANSPARENT_COLOR,
  precision: PRECISION_NONE,
};

const HEX_COLOR = /^#?[0-9a-f]{6}$/i;

export function parseWidth(value: string | number): number {
  const width = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isInteger(width) || width <= 0) {
    throw new InvalidConfigurationError(`Width must be a positive integer, got "${value}".`);
  }
  return width;
}

export function parseEngine(value: string): EngineType {
  const engine = value.trim();
  if (!isEngineType(engine)) {
    throw new InvalidConfigurationError(`Engine must be one of sharp, raster; got "${value}".`);
  }
  return engine;
}

export function parseTransparentColor(value: string): string {
  const color = value.trim();
  if (!HEX_COLOR.test(color)) {
    throw new InvalidConfigurationError(`Transparent color must be a 6-digit hex color, got "${value}".`);
  }
  return color.startsWith('#') ? color : `#${color}`;
}

export function parsePrecision(value: string | number): number {
  const precision = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isInteger(precision) || precision < PRECISION_NONE) {
    throw new InvalidConfigurationError(`Precision must be an integer >= -1, got "${value}".`);
  }
  return precision;
}

function readVariable(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Build a config from environment variables, falling back to DEFAULT_CONFIG
 *
 * @throws InvalidConfigurationError for malformed values
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliImageConfig {
  const width = readVariable(env, 'CLI_IMAGE_WIDTH');
  const engine = readVariable(env, 'CLI_IMAGE_ENGINE');
  const transparentColor = readVariable(env, 'CLI_IMAGE_TRANSPARENT_COLOR');
  const precision = readVariable(env, 'CLI_IMAGE_PRECISION');

  return {
    width: width === undefined ? DEFAULT_CONFIG.width : parseWidth(width),
    engine: engine === undefined ? DEFAULT_CONFIG.engine : parseEngine(engine),
    transparentColor:
      transparentColor === undefined ? DEFAULT_CONFIG.transparentColor : parseTransparentColor(transparentColor),
    precision: precision === undefined ? DEFAULT_CONFIG.precision : parsePrecision(precision),
  };
}
