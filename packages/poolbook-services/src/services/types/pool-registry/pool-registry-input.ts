/**
 * Pool Registry Input Schemas
 *
 * Caller-supplied pool data, validated before any collaborator is called.
 * Addresses come out EIP-55 checksummed.
 */

import { z } from 'zod';
import {
  AssetClass,
  MAX_POOL_TOKENS,
  isValidAddress,
  isValidRegistryName,
  normalizeAddress,
} from '@poolbook/shared';

// =============================================================================
// Field Schemas
// =============================================================================

export const addressSchema = z
  .string()
  .refine((value) => isValidAddress(value), { message: 'Invalid address' })
  .transform((value) => normalizeAddress(value));

export const poolNameSchema = z
  .string()
  .refine((value) => isValidRegistryName(value), {
    message: 'Name must be 1 to 32 UTF-8 bytes',
  });

export const assetClassSchema = z.nativeEnum(AssetClass);

/** Accepts a bigint or a non-negative safe integer */
export const externalIdSchema = z
  .union([z.bigint().nonnegative(), z.number().int().nonnegative()])
  .transform((value) => BigInt(value));

const tokenListSchema = z.array(addressSchema).max(MAX_POOL_TOKENS);

// =============================================================================
// addPool
// =============================================================================

export const addPoolInputSchema = z.object({
  poolAddress: addressSchema,
  assetClass: assetClassSchema,
  name: poolNameSchema,
  /** Defaults to poolAddress */
  targetAddress: addressSchema.optional(),
  /** Omitted or zero: the pool has no deposit wrapper */
  depositWrapperAddress: addressSchema.optional(),
  externalId: externalIdSchema,
  isApproved: z.boolean().default(false),
  isRemoved: z.boolean().default(false),
});

/** What callers pass to addPool */
export type AddPoolInput = z.input<typeof addPoolInputSchema>;

/** addPool input after validation */
export type ParsedAddPoolInput = z.output<typeof addPoolInputSchema>;

// =============================================================================
// updatePool
// =============================================================================

/**
 * A complete record, as accepted by updatePool
 */
export const poolRecordSchema = z.object({
  poolAddress: addressSchema,
  lpToken: addressSchema,
  assetClass: assetClassSchema,
  name: poolNameSchema,
  targetAddress: addressSchema,
  tokens: tokenListSchema,
  underlyingTokens: tokenListSchema,
  basePoolAddress: addressSchema,
  depositWrapperAddress: addressSchema,
  externalId: externalIdSchema,
  isApproved: z.boolean(),
  isRemoved: z.boolean(),
});

export type UpdatePoolInput = z.input<typeof poolRecordSchema>;
