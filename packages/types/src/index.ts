export * from './schemas/index.js';
export * from './types/index.js';
