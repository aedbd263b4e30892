/**
 * Component selection barrel.
 */
export * from './offered-options.js';
export type * from './types.js';
