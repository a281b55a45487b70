export * from './threshold.js';
export * from './heuristic-injection.js';
export * from './heuristic-harmful.js';
export * from './lexical-model.js';
export * from './backend-judge.js';
export * from './hybrid.js';
