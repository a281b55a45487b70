export * from './patterns.js';
export * from './regions.js';
export * from './entity-recognizer.js';
export * from './backend-pass.js';
export * from './engine.js';
