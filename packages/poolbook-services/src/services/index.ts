/**
 * Services
 */

export * from './access-control/index.js';
export * from './name-registry/index.js';
export * from './pool-registry/index.js';
export * from './types/index.js';
