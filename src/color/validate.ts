/**
 * Channel map validation
 * Conversion inputs must carry exactly the expected three keys with numeric values
 */

import { InvalidInputError } from '../errors.js';
import { CHANNELS_RGB, CHANNELS_SRGB, CHANNELS_XYZ, RGB_RANGE } from './constants.js';
import type { Rgb, Srgb, Xyz } from './types.js';

function readChannels(value: unknown, channels: readonly string[], label: string): Map<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new InvalidInputError(`Expected ${label} channel map, got ${Array.isArray(value) ? 'array' : typeof value}.`);
  }

  const entries = new Map<string, unknown>(Object.entries(value));

  for (const channel of channels) {
    if (!entries.has(channel)) {
      throw new InvalidInputError(`Missing color index "${channel}" in ${label} value.`);
    }
  }

  for (const key of entries.keys()) {
    if (!channels.includes(key)) {
      throw new InvalidInputError(`Unexpected color index "${key}" in ${label} value.`);
    }
  }

  return entries;
}

export function assertRgb(value: unknown): asserts value is Rgb {
  const entries = readChannels(value, CHANNELS_RGB, 'rgb');

  for (const channel of CHANNELS_RGB) {
    const channelValue = entries.get(channel);
    if (typeof channelValue !== 'number' || !Number.isInteger(channelValue)) {
      throw new InvalidInputError(`Unexpected value format given for color "${channel}". Integer expected.`);
    }
    if (channelValue < RGB_RANGE.min || channelValue > RGB_RANGE.max) {
      throw new InvalidInputError(`Color "${channel}" out of range: ${channelValue}.`);
    }
  }
}

export function assertSrgb(value: unknown): asserts value is Srgb {
  assertFiniteChannels(value, CHANNELS_SRGB, 'srgb');
}

export function assertXyz(value: unknown): asserts value is Xyz {
  assertFiniteChannels(value, CHANNELS_XYZ, 'xyz');
}

function assertFiniteChannels(value: unknown, channels: readonly string[], label: string): void {
  const entries = readChannels(value, channels, label);

  for (const channel of channels) {
    const channelValue = entries.get(channel);
    if (typeof channelValue !== 'number' || !Number.isFinite(channelValue)) {
      throw new InvalidInputError(`Unexpected value format given for color "${channel}". Float expected.`);
    }
  }
}

/**
 * Single 8-bit channel value
 */
export function assertChannelValue(value: number): void {
  if (!Number.isInteger(value) || value < RGB_RANGE.min || value > RGB_RANGE.max) {
    throw new InvalidInputError(`Channel value must be an integer in [0, 255], got ${value}.`);
  }
}
