export * from './build.js';
export * from './snippet.js';
