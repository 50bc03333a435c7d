/**
 * Command-line arguments
 *
 *   ansi-image-map <path-input> [path-output] [--width N] [--engine sharp|raster]
 *                  [--transparent #RRGGBB] [--marker #RRGGBB:lat,lon]...
 */

import { parseArgs } from 'util';
import { parseEngine, parseTransparentColor, parseWidth } from '../config.js';
import type { CliImageConfig } from '../config.js';
import { InvalidConfigurationError } from '../errors.js';

export interface SphericalMarker {
  color: string;
  latitude: number;
  longitude: number;
}

export interface CliArguments {
  pathInput?: string;
  pathOutput?: string;
  config: CliImageConfig;
  markers: SphericalMarker[];
}

const MARKER_PATTERN = /^(#?[0-9a-f]{6}):(-?\d+(?:\.\d+)?),(-?\d+(?:\.\d+)?)$/i;

/**
 * Parse "#RRGGBB:latitude,longitude"
 */
export function parseMarker(value: string): SphericalMarker {
  const match = MARKER_PATTERN.exec(value.trim());

  if (!match) {
    throw new InvalidConfigurationError(`Marker must look like "#ff0000:40.71,-74.01", got "${value}".`);
  }

  const [, color, latitude, longitude] = match;

  return {
    color: color.startsWith('#') ? color : `#${color}`,
    latitude: Number(latitude),
    longitude: Number(longitude),
  };
}

/**
 * Merge argv over the environment-derived config
 */
export function parseCliArguments(argv: string[], defaults: CliImageConfig): CliArguments {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      width: { type: 'string', short: 'w' },
      engine: { type: 'string', short: 'e' },
      transparent: { type: 'string', short: 't' },
      marker: { type: 'string', short: 'm', multiple: true },
    },
  });

  const [pathInput, pathOutput] = positionals;

  return {
    pathInput,
    pathOutput,
    config: {
      ...defaults,
      width: values.width === undefined ? defaults.width : parseWidth(values.width),
      engine: values.engine === undefined ? defaults.engine : parseEngine(values.engine),
      transparentColor:
        values.transparent === undefined ? defaults.transparentColor : parseTransparentColor(values.transparent),
    },
    markers: (values.marker ?? []).map(parseMarker),
  };
}
