export * from './bridge-errors.js';
