import { MAX_REGISTRY_NAME_BYTES } from '../types/name-registry/registry-entry.js';

const encoder = new TextEncoder();

/**
 * UTF-8 length of a name
 */
export function nameByteLength(name: string): number {
  return encoder.encode(name).length;
}

/**
 * A registry or pool name must be non-empty and fit in 32 UTF-8 bytes
 */
export function isValidRegistryName(name: string): boolean {
  const length = nameByteLength(name);
  return length > 0 && length <= MAX_REGISTRY_NAME_BYTES;
}
