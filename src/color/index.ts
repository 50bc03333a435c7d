/**
 * Color Module Index
 *
 * Exports color types, constants and conversions
 */

export * from './types.js';
export * from './constants.js';
export * from './hex.js';
export * from './spaces.js';
export * from './validate.js';
