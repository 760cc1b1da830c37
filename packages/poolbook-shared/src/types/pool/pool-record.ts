// ============================================================================
// Pool Record Types
// ============================================================================

import type { Address } from 'viem';

/**
 * Peg category of a pool, stored as the numeric tag used on chain
 */
export const AssetClass = {
  BTC: 0,
  ETH: 1,
  USD: 2,
  OTHER: 3,
} as const;

export type AssetClass = (typeof AssetClass)[keyof typeof AssetClass];

/**
 * Maximum number of tokens a pool (or its deposit wrapper) can expose
 */
export const MAX_POOL_TOKENS = 8;

/**
 * One registered pool.
 *
 * `tokens`, `underlyingTokens` and `lpToken` are discovered from the swap
 * engine at registration time; every other field is supplied by the caller.
 */
export interface PoolRecord {
  poolAddress: Address;
  lpToken: Address;
  assetClass: AssetClass;
  name: string;
  /** Contract implementing the swap engine (equals poolAddress unless proxied) */
  targetAddress: Address;
  tokens: Address[];
  /** Fully unwrapped token set; empty unless the pool has a deposit wrapper */
  underlyingTokens: Address[];
  /** Zero address unless the pool wraps a base pool */
  basePoolAddress: Address;
  /** Zero address unless the pool is fronted by a deposit wrapper */
  depositWrapperAddress: Address;
  /** Opaque ordering key supplied by the administrator */
  externalId: bigint;
  isApproved: boolean;
  isRemoved: boolean;
}

/**
 * JSON representation of a PoolRecord (bigint fields as decimal strings)
 */
export interface PoolRecordJSON {
  poolAddress: string;
  lpToken: string;
  assetClass: AssetClass;
  name: string;
  targetAddress: string;
  tokens: string[];
  underlyingTokens: string[];
  basePoolAddress: string;
  depositWrapperAddress: string;
  externalId: string;
  isApproved: boolean;
  isRemoved: boolean;
}

/**
 * Parameters reported by a swap engine's aggregate-parameter accessor
 */
export interface AggregateParameters {
  initialA: bigint;
  futureA: bigint;
  initialATime: bigint;
  futureATime: bigint;
  swapFee: bigint;
  adminFee: bigint;
  lpToken: Address;
}

/**
 * Accessor shape the parameters were read with
 */
export type ParameterShape = 'standard' | 'guarded';

/**
 * Live balances of a pool, aligned with its stored token order
 */
export interface PoolBalances {
  tokens: Address[];
  balances: bigint[];
}

/**
 * Persisted state of the pool registry, as plain JSON
 */
export interface PoolRegistrySnapshot {
  /** Every record ever added, in index order (removed ones included) */
  records: PoolRecordJSON[];
  /** lowercase pool address → index, active records only */
  addressIndex: Record<string, number>;
  /** name → index, active records only */
  nameIndex: Record<string, number>;
  /** pair key → venue addresses */
  pairs: Record<string, string[]>;
}
