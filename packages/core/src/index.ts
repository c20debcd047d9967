/**
 * @framedeck/core
 *
 * Turns a directory of text snippets into a compiled slide deck.
 */

export * from './build/index.js';
export * from './config/index.js';
export * from './render/fragment.js';
export * from './render/template.js';
export * from './snippets/collector.js';
export * from './types/index.js';
export * from './utils/errors.js';
export * from './utils/logger.js';
