export * from './trace.js';
export * from './orchestrator.js';
export * from './response-screening.js';
export * from './shield.js';
