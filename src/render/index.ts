/**
 * Render Module Index
 */

export * from './ansi.js';
export * from './halfBlock.js';
export * from './markers.js';
export * from './renderLines.js';
