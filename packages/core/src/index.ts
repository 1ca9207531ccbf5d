export * from './types.js';
export * from './model.js';
export * from './timeline.js';
export * from './fingerprints.js';
export * from './labels.js';
export * from './grouping.js';
export * from './form.js';
export * from './catalog.js';
export * from './validation.js';
export * from './analysis.js';
export * from './notation.js';
export * from './contracts.js';
export * from './testHarness.js';
