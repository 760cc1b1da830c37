/**
 * Collaborator clients
 */

export * from './swap-engine/index.js';
