#!/usr/bin/env node
/**
 * ansi-image-map CLI
 * Prints an image as half-block terminal text, optionally saving it to a file
 */

import 'dotenv/config';
import { existsSync } from 'fs';
import { writeFile } from 'fs/promises';
import { CliImage } from '../cliImage.js';
import { loadConfig } from '../config.js';
import { CliImageError } from '../errors.js';
import { error } from '../utils/debug.js';
import { parseCliArguments } from './args.js';

const EXIT_SUCCESS = 0;
const EXIT_INVALID = 2;

async function main(argv: string[]): Promise<number> {
  const { pathInput, pathOutput, config, markers } = parseCliArguments(argv, loadConfig());

  if (pathInput === undefined) {
    error('No image path given.');
    return EXIT_INVALID;
  }

  if (!existsSync(pathInput)) {
    error(`Unable to find given file "${pathInput}".`);
    return EXIT_INVALID;
  }

  const image = await CliImage.fromPath(pathInput, config);

  for (const marker of markers) {
    image.addCoordinateSpherical(marker.color, marker.latitude, marker.longitude);
  }

  const output = image.getAsciiString();
  console.log(output);

  if (pathOutput !== undefined) {
    await writeFile(pathOutput, output, 'utf-8');
    console.log('---');
    console.log(`Image saved to "${pathOutput}".`);
    console.log('---');
  }

  return EXIT_SUCCESS;
}

main(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch((caught: unknown) => {
    if (caught instanceof CliImageError) {
      error(`${caught.code}: ${caught.message}`);
    } else {
      error('Unexpected failure', caught);
    }
    process.exitCode = EXIT_INVALID;
  });
