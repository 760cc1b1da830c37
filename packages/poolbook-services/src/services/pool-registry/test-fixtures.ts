/**
 * Pool Registry Test Fixtures
 *
 * A three-token USD pool, a wrapped sUSD pool built on top of it, and the
 * deposit wrapper fronting the wrapped pool, all served by an in-memory
 * engine provider.
 */

import type { Address } from 'viem';
import { AssetClass } from '@poolbook/shared';
import type { AggregateParameters, ParameterShape } from '@poolbook/shared';
import { InMemorySwapEngineProvider } from '../../clients/index.js';
import type {
  InMemoryDepositWrapper,
  InMemorySwapEngine,
  InMemorySwapEngineState,
} from '../../clients/index.js';
import { InMemoryDomainEventPublisher } from '../../events/index.js';
import type { DomainEventPublisher } from '../../events/index.js';
import { Role, RoleRegistry } from '../access-control/index.js';
import type { AddPoolInput } from '../types/pool-registry/index.js';
import { PoolRegistryService } from './pool-registry-service.js';

// ===========================================================================
// Accounts
// ===========================================================================

export const POOL_MANAGER: Address = '0x9000000000000000000000000000000000000001';
export const COMMUNITY_MANAGER: Address = '0x9000000000000000000000000000000000000002';
export const STRANGER: Address = '0x9000000000000000000000000000000000000003';
export const ENGINE_OWNER: Address = '0x8000000000000000000000000000000000000001';

// ===========================================================================
// Tokens
// ===========================================================================

export const DAI: Address = '0x1000000000000000000000000000000000000001';
export const USDC: Address = '0x1000000000000000000000000000000000000002';
export const USDT: Address = '0x1000000000000000000000000000000000000003';
export const SUSD: Address = '0x1000000000000000000000000000000000000004';
/** LP token of the USD pool, held by the wrapped pool */
export const USD_LP: Address = '0x1000000000000000000000000000000000000005';
export const SUSD_META_LP: Address = '0x1000000000000000000000000000000000000006';

// ===========================================================================
// Pools
// ===========================================================================

export const USD_POOL: Address = '0x2000000000000000000000000000000000000001';
export const SUSD_META_POOL: Address = '0x2000000000000000000000000000000000000002';
export const SUSD_META_DEPOSIT: Address = '0x3000000000000000000000000000000000000001';

export const ONE: bigint = 10n ** 18n;

export function parametersFor(lpToken: Address): AggregateParameters {
  return {
    initialA: 20000n,
    futureA: 20000n,
    initialATime: 0n,
    futureATime: 0n,
    swapFee: 4000000n,
    adminFee: 5000000000n,
    lpToken,
  };
}

/**
 * Engine state with balances of 1, 2, 3... whole tokens
 */
export function engineState(
  tokens: Address[],
  lpToken: Address,
  parameterShape: ParameterShape | null = 'standard'
): InMemorySwapEngineState {
  return {
    tokens,
    parameterShape,
    parameters: parametersFor(lpToken),
    virtualPrice: ONE,
    amplification: 200n,
    owner: ENGINE_OWNER,
    paused: false,
    balances: tokens.map((_, i) => BigInt(i + 1) * ONE),
  };
}

// ===========================================================================
// Inputs
// ===========================================================================

export const USD_POOL_INPUT: AddPoolInput = {
  poolAddress: USD_POOL,
  assetClass: AssetClass.USD,
  name: 'USDv2',
  externalId: 0n,
  isApproved: true,
  isRemoved: false,
};

export const SUSD_META_INPUT: AddPoolInput = {
  poolAddress: SUSD_META_POOL,
  assetClass: AssetClass.USD,
  name: 'sUSD meta v2',
  depositWrapperAddress: SUSD_META_DEPOSIT,
  externalId: 1n,
  isApproved: true,
  isRemoved: false,
};

// ===========================================================================
// Registry
// ===========================================================================

export interface RegistryFixture {
  service: PoolRegistryService;
  provider: InMemorySwapEngineProvider;
  roles: RoleRegistry;
  publisher: InMemoryDomainEventPublisher;
  usdEngine: InMemorySwapEngine;
  metaEngine: InMemorySwapEngine;
  metaDeposit: InMemoryDepositWrapper;
}

export function createRegistryFixture(
  options: { eventPublisher?: DomainEventPublisher } = {}
): RegistryFixture {
  const provider = new InMemorySwapEngineProvider();
  const roles = new RoleRegistry({
    [Role.POOL_MANAGER]: [POOL_MANAGER],
    [Role.COMMUNITY_MANAGER]: [COMMUNITY_MANAGER],
    [Role.APPROVED_POOL_OWNER]: [ENGINE_OWNER],
  });
  const publisher = new InMemoryDomainEventPublisher();

  const usdEngine = provider.deployEngine(USD_POOL, engineState([DAI, USDC, USDT], USD_LP));
  const metaEngine = provider.deployEngine(
    SUSD_META_POOL,
    engineState([SUSD, USD_LP], SUSD_META_LP)
  );
  const metaDeposit = provider.deployWrapper(SUSD_META_DEPOSIT, {
    tokens: [SUSD, DAI, USDC, USDT],
    basePool: USD_POOL,
    parentPool: SUSD_META_POOL,
  });

  const service = new PoolRegistryService({
    accessController: roles,
    engineProvider: provider,
    eventPublisher: options.eventPublisher ?? publisher,
  });

  return { service, provider, roles, publisher, usdEngine, metaEngine, metaDeposit };
}

/**
 * Digit-only address: a single-digit `prefix`, then `n` zero-padded
 */
export function numberedAddress(prefix: number, n: number): Address {
  return `0x${prefix}${n.toString().padStart(39, '0')}`;
}
