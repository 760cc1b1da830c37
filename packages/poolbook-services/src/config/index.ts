/**
 * Configuration exports
 */

export { EvmConfig, SupportedChainId } from './evm.js';
export type { EnvSource } from './evm.js';
