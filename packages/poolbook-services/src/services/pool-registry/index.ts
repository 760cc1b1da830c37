/**
 * Pool Registry
 *
 * Pool records, token discovery and the pair-eligibility index.
 */

export { PoolRegistryService } from './pool-registry-service.js';
export type {
  PoolRegistryServiceDependencies,
  AddPoolResult,
} from './pool-registry-service.js';
export { PairIndex, StagedPairs } from './pair-index.js';
export type { PairContribution } from './pair-index.js';
export { probeTokens, discoverTokens } from './token-discovery.js';
export { PARAMETER_READERS, readAggregateParameters } from './parameter-readers.js';
export type { ParameterReader, ShapedParameters } from './parameter-readers.js';
