/**
 * Version interval model barrel.
 */
export * from './semantic-version.js';
export * from './interval.js';
