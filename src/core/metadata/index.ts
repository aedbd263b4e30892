/**
 * Service metadata barrel.
 */
export * from './schema.js';
export * from './client.js';
export * from './options.js';
export type * from './types.js';
