export * from './deck-config.js';
