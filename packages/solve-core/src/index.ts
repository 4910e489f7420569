export * from './types.js';
export * from './errors.js';
export * from './pattern.js';
export * from './patternIndex.js';
export * from './tokenize.js';
export * from './translation.js';
export * from './solver.js';
export * from './corpus.js';
export * from './store.js';
export * from './extract.js';
