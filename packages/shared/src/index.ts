export * from './types.js';
export * from './errors.js';
export * from './scheduling.js';
export * from './db/schema.js';
export * from './db/client.js';
