/**
 * Common Logging Patterns
 *
 * Uniform entry/exit/error lines so every service method logs the same way.
 */

import type { ServiceLogger } from './logger.js';

export const LogPatterns = {
  /**
   * Log method entry (debug)
   */
  methodEntry(
    logger: ServiceLogger,
    method: string,
    params?: Record<string, unknown>
  ): void {
    logger.debug({ method, ...params }, `→ ${method}`);
  },

  /**
   * Log method exit (debug)
   */
  methodExit(
    logger: ServiceLogger,
    method: string,
    result?: Record<string, unknown>
  ): void {
    logger.debug({ method, ...result }, `← ${method}`);
  },

  /**
   * Log method failure (error), with the error serialized under `error`
   */
  methodError(
    logger: ServiceLogger,
    method: string,
    error: Error,
    context?: Record<string, unknown>
  ): void {
    logger.error(
      {
        method,
        error: {
          name: error.name,
          message: error.message,
          stack: error.stack,
        },
        ...context,
      },
      `✗ ${method} failed: ${error.message}`
    );
  },

  /**
   * Log a call out to an on-chain collaborator (debug)
   */
  externalCall(
    logger: ServiceLogger,
    target: string,
    operation: string,
    metadata?: Record<string, unknown>
  ): void {
    logger.debug({ target, operation, ...metadata }, `⇢ ${operation} @ ${target}`);
  },
};

/**
 * Short alias used throughout the services
 */
export const log = LogPatterns;
