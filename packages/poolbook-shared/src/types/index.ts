/**
 * Domain types
 */

export * from './pool/index.js';
export * from './name-registry/index.js';
