/**
 * Archive materializer barrel.
 */
export * from './materializer.js';
export type * from './types.js';
