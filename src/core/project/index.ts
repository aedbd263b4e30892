/**
 * Project request barrel.
 */
export * from './validation.js';
export * from './request.js';
export type * from './types.js';
