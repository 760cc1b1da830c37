/**
 * @poolbook/services
 *
 * Registries, their collaborators and the ambient stack (logging, config,
 * errors, events).
 */

export * from './logging/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './events/index.js';
export * from './clients/index.js';
export * from './utils/index.js';
export * from './services/index.js';
