/**
 * @poolbook/shared
 *
 * Shared types and utilities for the poolbook registries
 * Used by the services package and any client of it
 */

// Export all types
export * from './types/index.js';

// Export all utilities
export * from './utils/index.js';

// Export contract ABIs
export * from './abis/index.js';
