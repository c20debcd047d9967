export * from './deck-builder.js';
export * from './engine.js';
export * from './workdir.js';
