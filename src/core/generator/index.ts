/**
 * Project generator barrel.
 */
export * from './client.js';
export * from './generate.js';
