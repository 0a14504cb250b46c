export * from './countries.js';
export * from './health.js';
export * from './sources.js';
