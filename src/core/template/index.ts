/**
 * Template engine barrel file.
 */
export * from './types.js';
export * from './value.js';
export * from './path.js';
export { tokenize } from './tokenizer.js';
export * from './resolver.js';
export { renderTokens } from './renderer.js';
export { TemplateContext } from './context.js';
export * from './engine.js';
