/**
 * Data loader barrel file.
 */
export * from './types.js';
export * from './loader.js';
