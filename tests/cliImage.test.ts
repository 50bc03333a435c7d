/**
 * End-to-end tests for the CliImage facade
 */

import { describe, it, expect, jest } from '@jest/globals';
import { CliImage } from '../src/cliImage.js';
import { DecodeFailureError, InvalidConfigurationError, UnsupportedEngineError } from '../src/errors.js';
import { GridSource } from './helpers/gridSource.js';
import { cell, encodePng, solidPixels } from './helpers/images.js';

const NAVY: [number, number, number] = [10, 20, 80];

describe('CliImage.create', () => {
  it('should reject unknown engines before decoding', async () => {
    await expect(CliImage.create(Buffer.from('garbage'), { engine: 'imagick' })).rejects.toThrow(UnsupportedEngineError);
  });

  it('should surface decode failures', async () => {
    await expect(CliImage.fromBuffer(Buffer.from('garbage'), { engine: 'raster' })).rejects.toThrow(DecodeFailureError);
  });

  it('should validate the transparent color option', async () => {
    const png = await encodePng(2, 2, solidPixels(2, 2, [0, 0, 0, 255]));
    await expect(CliImage.fromBuffer(png, { transparentColor: 'black' })).rejects.toThrow(InvalidConfigurationError);
  });

  it('should render a small image byte for byte', async () => {
    const png = await encodePng(2, 4, [
      [255, 0, 0, 255],
      [0, 0, 0, 255],
      [0, 255, 0, 255],
      [0, 0, 0, 0],
      [0, 0, 255, 255],
      [255, 255, 255, 255],
      [255, 255, 0, 255],
      [0, 0, 0, 0],
    ]);
    const image = await CliImage.fromBuffer(png, { width: 2, engine: 'raster' });

    expect(image.width).toBe(2);
    expect(image.height).toBe(4);
    expect(image.getAsciiString()).toBe(
      cell([255, 0, 0], [0, 255, 0]) + ' ' + '\n' +
      cell([0, 0, 255], [255, 255, 0]) + '\x1b[38;2;255;255;255m▀\x1b[0m'
    );
  });
});

describe('CliImage translucency', () => {
  it('should render nearly opaque pixels under the raster engine', async () => {
    const png = await encodePng(1, 2, [
      [200, 10, 10, 240],
      [10, 200, 10, 255],
    ]);
    const image = await CliImage.fromBuffer(png, { width: 1, engine: 'raster' });

    expect(image.getAsciiString()).toBe(cell([200, 10, 10], [10, 200, 10]));
  });
});

describe('CliImage markers', () => {
  async function navyWorld(): Promise<CliImage> {
    const png = await encodePng(160, 80, solidPixels(160, 80, [...NAVY, 255]));
    return CliImage.fromBuffer(png, { width: 80, engine: 'raster' });
  }

  it('should render a uniform map without markers', async () => {
    const image = await navyWorld();
    const lines = image.getAsciiLines();

    expect(lines).toHaveLength(20);
    expect(new Set(lines)).toEqual(new Set([cell(NAVY, NAVY).repeat(80)]));
  });

  it('should project spherical markers with the resized dimensions', async () => {
    const image = await navyWorld()
      .then(loaded => loaded
        .addCoordinateSpherical('#ff0000', 40.71, -74.01)
        .addCoordinateSpherical('#00ff00', 59.91, 10.75)
        .addCoordinateSpherical('#0000ff', 0, 0));

    expect(image.getPoints()).toEqual(new Map([
      ['#ff0000', { x: 19, y: 13 }],
      ['#00ff00', { x: 40, y: 8 }],
      ['#0000ff', { x: 37, y: 25 }],
    ]));

    const base = cell(NAVY, NAVY);
    const lines = image.getAsciiLines();

    // row 13 is the bottom half of line 6
    expect(lines[6]).toBe(base.repeat(19) + cell(NAVY, [255, 0, 0]) + base.repeat(60));
    // row 8 is the top half of line 4
    expect(lines[4]).toBe(base.repeat(40) + cell([0, 255, 0], NAVY) + base.repeat(39));
    // row 25 is the bottom half of line 12
    expect(lines[12]).toBe(base.repeat(37) + cell(NAVY, [0, 0, 255]) + base.repeat(42));
    expect(lines[0]).toBe(base.repeat(80));
  });

  it('should rebuild the output on every call', async () => {
    const image = await navyWorld();
    const before = image.getAsciiString();

    image.addCoordinate('#ffffff', { x: 0, y: 0 });
    const after = image.getAsciiString();

    expect(after).not.toBe(before);
    expect(after.startsWith(cell([255, 255, 255], NAVY))).toBe(true);
  });

  it('should warn when a marker projects outside the image', async () => {
    const image = await navyWorld();
    const spy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    image.addCoordinateSpherical('#ffffff', 90, 0);

    expect(spy).toHaveBeenCalledWith('[WARN] Marker #ffffff at 90,0 falls outside the image', { x: 37, y: -1 });
    spy.mockRestore();
  });

  it('should replace markers with setPoints', async () => {
    const image = await navyWorld();
    image.addCoordinate('#ffffff', { x: 0, y: 0 });
    image.setPoints({ '#ff0000': { x: 1, y: 1 } });

    expect(image.getPoints()).toEqual(new Map([['#ff0000', { x: 1, y: 1 }]]));
  });
});

describe('CliImage.fromSource', () => {
  it('should wrap an in-memory source', () => {
    const image = CliImage.fromSource(new GridSource([['#FFFFFF'], ['#FFFFFF']]), { transparentColor: '#FFFFFF' });
    expect(image.getAsciiLines()).toEqual([' ']);
  });

  it('should report Lab values with the configured precision', () => {
    const image = CliImage.fromSource(new GridSource([['#FF0000']]), { precision: 2 });
    expect(image.getLabAt(0, 0)).toEqual({ L: 53.24, a: 80.09, b: 67.2 });
    expect(image.getColorAt(0, 0)).toBe('#FF0000');
  });

  it('should ignore alpha digits when computing Lab', () => {
    const image = CliImage.fromSource(new GridSource([['#7FFF0000']]), { precision: 2 });
    expect(image.getLabAt(0, 0)).toEqual({ L: 53.24, a: 80.09, b: 67.2 });
  });
});
