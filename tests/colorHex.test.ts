/**
 * Unit tests for integer / hex / pixel color conversions
 */

import { describe, it, expect } from '@jest/globals';
import {
  hexToInt,
  hexToRgbArray,
  intToHex,
  intToRgbArray,
  packedPixelToHex,
  rgbaPixelToHex,
  rgbArrayToHex,
  rgbArrayToInt,
  rgbsToHex,
  rgbsToInt,
  rgbToHex,
} from '../src/color/hex.js';
import { InvalidColorFormatError, InvalidInputError } from '../src/errors.js';

const SAMPLE_COLORS = [0, 1, 255, 256, 65535, 0x123456, 0x800080, 0xabcdef, 0xfffffe, 16777215];

describe('rgbToHex', () => {
  it('should pad single channels to two uppercase digits', () => {
    expect(rgbToHex(0)).toBe('00');
    expect(rgbToHex(10)).toBe('0A');
    expect(rgbToHex(255)).toBe('FF');
  });

  it('should lowercase on request', () => {
    expect(rgbToHex(171, true)).toBe('ab');
  });

  it('should reject values outside 0..255', () => {
    expect(() => rgbToHex(256)).toThrow(InvalidInputError);
    expect(() => rgbToHex(-1)).toThrow(InvalidInputError);
    expect(() => rgbToHex(1.5)).toThrow(InvalidInputError);
  });
});

describe('intToHex', () => {
  it('should zero-pad to six digits with a hash', () => {
    expect(intToHex(255)).toBe('#0000FF');
    expect(intToHex(255 * 256 * 256 + 255 * 256 + 255)).toBe('#FFFFFF');
    expect(intToHex(128 * 256 * 256 + 128)).toBe('#800080');
  });

  it('should honor prependHash and lowercase', () => {
    expect(intToHex(0xabcdef, false)).toBe('ABCDEF');
    expect(intToHex(0xabcdef, true, true)).toBe('#abcdef');
  });

  it('should keep alpha digits above 24 bits', () => {
    expect(intToHex(0x7f000000)).toBe('#7F000000');
  });

  it('should round-trip through hexToInt', () => {
    for (const color of SAMPLE_COLORS) {
      expect(hexToInt(intToHex(color))).toBe(color);
      expect(hexToInt(intToHex(color, false, true))).toBe(color);
    }
  });
});

describe('hexToInt', () => {
  it('should parse with or without hash', () => {
    expect(hexToInt('#800080')).toBe(128 * 256 * 256 + 128);
    expect(hexToInt('ff0000')).toBe(0xff0000);
  });

  it('should reject non-hex input', () => {
    expect(() => hexToInt('#zz0000')).toThrow(InvalidColorFormatError);
    expect(() => hexToInt('#')).toThrow(InvalidColorFormatError);
  });
});

describe('intToRgbArray / rgbsToInt', () => {
  it('should extract channels by bit shifting', () => {
    expect(intToRgbArray(0x123456)).toEqual({ r: 0x12, g: 0x34, b: 0x56 });
    expect(hexToRgbArray('#FF8000')).toEqual({ r: 255, g: 128, b: 0 });
  });

  it('should ignore alpha bits', () => {
    expect(intToRgbArray(0x7f102030)).toEqual({ r: 0x10, g: 0x20, b: 0x30 });
  });

  it('should recompose the original integer', () => {
    for (const color of SAMPLE_COLORS) {
      const { r, g, b } = intToRgbArray(color);
      expect(rgbsToInt(r, g, b)).toBe(color);
      expect(rgbArrayToInt({ r, g, b })).toBe(color);
    }
  });

  it('should format rgb triples as hex', () => {
    expect(rgbsToHex(18, 52, 86)).toBe('#123456');
    expect(rgbArrayToHex({ r: 1, g: 2, b: 3 }, false, true)).toBe('010203');
  });

  it('should validate rgb maps', () => {
    const withAlpha = { r: 1, g: 2, b: 3, a: 4 };
    expect(() => rgbArrayToInt(withAlpha)).toThrow(InvalidInputError);
    expect(() => rgbArrayToInt({ r: 1, g: 2, b: 300 })).toThrow(InvalidInputError);
  });
});

describe('pixel decoders', () => {
  it('should format packed pixels as 6 or 8 uppercase digits', () => {
    expect(packedPixelToHex(0x00ff8000)).toBe('#FF8000');
    expect(packedPixelToHex(0x7f000000)).toBe('#7F000000');
  });

  it('should format rgba pixels as lowercase and drop alpha', () => {
    expect(rgbaPixelToHex({ r: 255, g: 128, b: 0, alpha: 10 })).toBe('#ff8000');
    expect(rgbaPixelToHex({ r: 1, g: 2, b: 3, alpha: 255 }, false)).toBe('010203');
  });

  it('should agree on the trailing six digits for identical opaque colors', () => {
    const packed = packedPixelToHex(0x00abcdef);
    const rgba = rgbaPixelToHex({ r: 0xab, g: 0xcd, b: 0xef, alpha: 255 });
    expect(packed.toLowerCase()).toBe(rgba);
  });
});
