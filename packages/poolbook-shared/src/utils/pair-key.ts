/**
 * Pair Keys
 *
 * Keys of the pair-eligibility index. A key identifies an unordered pair of
 * assets: `pairKey(a, b) === pairKey(b, a)`.
 *
 * Format: "{lower}/{higher}" over the lowercase hex of both addresses, so
 * distinct pairs never share a key.
 */

import type { Address } from 'viem';

export type PairKey = `0x${string}/0x${string}`;

export function pairKey(a: Address, b: Address): PairKey {
  const x = a.slice(2).toLowerCase();
  const y = b.slice(2).toLowerCase();
  return x < y ? `0x${x}/0x${y}` : `0x${y}/0x${x}`;
}

