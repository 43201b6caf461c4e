export * from './categories.js';
export * from './diff-engine.js';
export * from './plan-classifier.js';
export * from './plan-types.js';
export * from './plan-value.js';
export * from './resource-renderer.js';
export * from './value-formatter.js';
