/**
 * Service layer input types
 */

export * from './pool-registry/index.js';
