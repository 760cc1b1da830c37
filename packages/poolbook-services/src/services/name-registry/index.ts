/**
 * Name Registry
 *
 * Versioned name → component address registry with reverse lookup.
 */

export { NameRegistryService } from './name-registry-service.js';
export type { NameRegistryServiceDependencies } from './name-registry-service.js';
