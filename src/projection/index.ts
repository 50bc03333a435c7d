/**
 * Projection Module Index
 */

export * from './types.js';
export * from './kavrayskiy.js';
export * from './point.js';
