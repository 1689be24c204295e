export * from './errors.js';
export * from './json.js';
export * from './timestamp.js';
export * from './validation.js';
export * from './layers/index.js';
export * from './run.js';
export * from './step-tree.js';
