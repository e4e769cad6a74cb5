/**
 * Generator barrel file.
 */
export * from './types.js';
export { DocumentGenerator } from './engine.js';
