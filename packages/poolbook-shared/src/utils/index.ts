/**
 * Utility functions shared by the registries
 */

// EVM utilities
export * from './evm/index.js';

// Pair index keys
export * from './pair-key.js';

// Name length rules
export * from './registry-name.js';
