// ============================================================================
// Name Registry Types
// ============================================================================

import type { Address } from 'viem';

/**
 * Longest accepted registry name, in UTF-8 bytes (a bytes32 on chain)
 */
export const MAX_REGISTRY_NAME_BYTES = 32;

/**
 * One registered version of a name
 */
export interface RegistryEntry {
  name: string;
  address: Address;
  /** Zero-based position in the name's version list */
  version: number;
}

/**
 * Reverse-lookup result for an address
 */
export interface RegistryData {
  name: string;
  version: number;
  /** True when this version is the last one registered under the name */
  isLatest: boolean;
}

/**
 * Persisted state of the name registry
 */
export interface NameRegistrySnapshot {
  /** name → addresses, in version order */
  versions: Record<string, string[]>;
  /** lowercase address → { name, version } */
  reverse: Record<string, { name: string; version: number }>;
}
