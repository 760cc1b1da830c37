// ============================================================================
// Pool Record Utilities
// ============================================================================

import type { Address } from 'viem';
import { AssetClass, type PoolRecord, type PoolRecordJSON } from './pool-record.js';
import { normalizeAddress } from '../../utils/evm/index.js';

const ASSET_CLASS_NAMES: Record<AssetClass, string> = {
  [AssetClass.BTC]: 'BTC',
  [AssetClass.ETH]: 'ETH',
  [AssetClass.USD]: 'USD',
  [AssetClass.OTHER]: 'OTHER',
};

export function assetClassName(assetClass: AssetClass): string {
  return ASSET_CLASS_NAMES[assetClass];
}

export function isAssetClass(value: unknown): value is AssetClass {
  return Object.values(AssetClass).some((assetClass) => assetClass === value);
}

/**
 * Convert a PoolRecord to its JSON form
 */
export function serializePoolRecord(record: PoolRecord): PoolRecordJSON {
  return {
    poolAddress: record.poolAddress,
    lpToken: record.lpToken,
    assetClass: record.assetClass,
    name: record.name,
    targetAddress: record.targetAddress,
    tokens: [...record.tokens],
    underlyingTokens: [...record.underlyingTokens],
    basePoolAddress: record.basePoolAddress,
    depositWrapperAddress: record.depositWrapperAddress,
    externalId: record.externalId.toString(),
    isApproved: record.isApproved,
    isRemoved: record.isRemoved,
  };
}

/**
 * Rebuild a PoolRecord from its JSON form, normalizing every address
 *
 * @throws Error if an address is malformed or externalId is not an integer
 */
export function deserializePoolRecord(json: PoolRecordJSON): PoolRecord {
  const toAddresses = (list: string[]): Address[] => list.map(normalizeAddress);

  return {
    poolAddress: normalizeAddress(json.poolAddress),
    lpToken: normalizeAddress(json.lpToken),
    assetClass: json.assetClass,
    name: json.name,
    targetAddress: normalizeAddress(json.targetAddress),
    tokens: toAddresses(json.tokens),
    underlyingTokens: toAddresses(json.underlyingTokens),
    basePoolAddress: normalizeAddress(json.basePoolAddress),
    depositWrapperAddress: normalizeAddress(json.depositWrapperAddress),
    externalId: BigInt(json.externalId),
    isApproved: json.isApproved,
    isRemoved: json.isRemoved,
  };
}

/**
 * Deep copy, so callers never hold references into registry state
 */
export function clonePoolRecord(record: PoolRecord): PoolRecord {
  return {
    ...record,
    tokens: [...record.tokens],
    underlyingTokens: [...record.underlyingTokens],
  };
}
