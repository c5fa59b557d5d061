// @kiln/core - Reproducible build orchestration engine
// Plans, content-addressed artifact cache, executor, verifier

export const VERSION = '0.3.0';

export * from './types/index.js';
export * from './utils/index.js';
export * from './config/index.js';
export * from './plan/index.js';
export * from './steps/index.js';
export * from './store/index.js';
export * from './tools/index.js';
export * from './verify/index.js';
export * from './engine/index.js';
