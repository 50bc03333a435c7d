/**
 * Unit tests for color normalization and half-block cell formatting
 */

import { describe, it, expect } from '@jest/globals';
import { InvalidColorFormatError } from '../src/errors.js';
import { get1x2Pixel, translateColor, TRANSPARENT } from '../src/render/halfBlock.js';

describe('translateColor', () => {
  it('should keep six-digit colors and add a missing hash', () => {
    expect(translateColor('#ff0000')).toBe('#ff0000');
    expect(translateColor('AbCdEf')).toBe('#AbCdEf');
  });

  it('should reduce eight-digit colors to their trailing six digits', () => {
    expect(translateColor('#7Fff0000')).toBe('#ff0000');
    expect(translateColor('00123456')).toBe('#123456');
  });

  it('should map the transparent sentinel to transparent', () => {
    expect(translateColor('#000000')).toBe(TRANSPARENT);
    expect(translateColor('#7F000000')).toBe(TRANSPARENT);
    expect(translateColor(TRANSPARENT)).toBe(TRANSPARENT);
  });

  it('should use a configured sentinel case-insensitively', () => {
    expect(translateColor('#000000', '#FFFFFF')).toBe('#000000');
    expect(translateColor('#ffffff', 'FFFFFF')).toBe(TRANSPARENT);
  });

  it('should reduce seven-digit colors with a one-digit alpha', () => {
    expect(translateColor('#7C80A0A')).toBe('#C80A0A');
    expect(translateColor('F000000')).toBe(TRANSPARENT);
  });

  it('should reject anything but 6 to 8 hex digits', () => {
    for (const color of ['#fff', 'red', '#12345', '#123456789', '#gggggg', '', '##123456']) {
      expect(() => translateColor(color)).toThrow(InvalidColorFormatError);
    }
  });
});

describe('get1x2Pixel', () => {
  it('should return a blank for two transparent halves', () => {
    expect(get1x2Pixel('#000000', null)).toBe(' ');
    expect(get1x2Pixel('#000000', '#000000', { repeat: 3 })).toBe('   ');
  });

  it('should repeat the top color when bottom is null', () => {
    expect(get1x2Pixel('#FF0000')).toBe('\x1b[38;2;255;0;0m\x1b[48;2;255;0;0m▀\x1b[0m');
  });

  it('should draw a lower half block when only the bottom is colored', () => {
    expect(get1x2Pixel(TRANSPARENT, '#00FF00')).toBe('\x1b[38;2;0;255;0m▄\x1b[0m');
  });

  it('should draw an upper half block when only the top is colored', () => {
    expect(get1x2Pixel('#0000ff', '#000000', { repeat: 2 })).toBe('\x1b[38;2;0;0;255m▀▀\x1b[0m');
  });

  it('should combine foreground and background for two colors', () => {
    expect(get1x2Pixel('#102030', '#405060')).toBe('\x1b[38;2;16;32;48m\x1b[48;2;64;80;96m▀\x1b[0m');
  });

  it('should honor a configured transparent color', () => {
    expect(get1x2Pixel('#FFFFFF', '#000000', { transparentColor: '#FFFFFF' })).toBe('\x1b[38;2;0;0;0m▄\x1b[0m');
  });

  it('should reject malformed colors', () => {
    expect(() => get1x2Pixel('#FF00', '#000000')).toThrow(InvalidColorFormatError);
  });
});
