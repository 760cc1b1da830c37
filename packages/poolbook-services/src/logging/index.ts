/**
 * Logging utilities
 */

export { createServiceLogger, rootLogger } from './logger.js';
export type { ServiceLogger } from './logger.js';
export { LogPatterns, log } from './patterns.js';
