/**
 * EVM Address Utilities
 *
 * Validation and normalization helpers for the 20-byte identifiers used for
 * pools, tokens, wrappers and registry entries.
 */

import { getAddress, isAddress, zeroAddress, type Address } from 'viem';

/**
 * The null identifier
 */
export const ZERO_ADDRESS: Address = zeroAddress;

/**
 * Check that a string is a well-formed address (checksum not enforced)
 */
export function isValidAddress(address: string): address is Address {
  return isAddress(address, { strict: false });
}

/**
 * Normalize an address to EIP-55 checksum format
 *
 * @throws Error if the address is malformed
 *
 * @example
 * ```typescript
 * normalizeAddress('0x6b175474e89094c44da98b954eedeac495271d0f');
 * // '0x6B175474E89094C44Da98b954EedeAC495271d0F'
 * ```
 */
export function normalizeAddress(address: string): Address {
  if (!isValidAddress(address)) {
    throw new Error(`Invalid address: ${address}`);
  }
  return getAddress(address);
}

export function isZeroAddress(address: string): boolean {
  return address.toLowerCase() === ZERO_ADDRESS;
}

/**
 * Case-insensitive address comparison
 */
export function sameAddress(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
