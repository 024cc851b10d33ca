/**
 * HTTP Boundary
 */

export * from './types.js';
export * from './compliance-query.js';
export * from './health.js';
