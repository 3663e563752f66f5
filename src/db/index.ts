export { getDb, closeDb, withTransaction } from './client.js';
export { initializeSchema } from './schema.js';
export * from './types.js';
export * from './events.js';
export * from './projects.js';
export * from './tasks.js';
export * from './dependencies.js';
export * from './comments.js';
export * from './runs.js';
