export * from './schemas/index.js';
export { db, pool, type Database } from './client.js';
export { createdAtColumn, defaultTimestampOptions, instantColumn, updatedAtColumn } from './utils.js';
