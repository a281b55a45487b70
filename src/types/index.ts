export * from './policy.js';
export * from './detection.js';
export * from './request.js';
export * from './response.js';
export * from './events.js';
