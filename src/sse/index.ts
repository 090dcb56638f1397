export * from './framer.js';
export * from './decoder.js';
