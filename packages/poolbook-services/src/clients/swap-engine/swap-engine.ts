/**
 * Swap Engine Collaborator Interfaces
 *
 * What the pool registry needs from the contracts it indexes. Implementations
 * talk to a chain (ViemSwapEngineProvider) or to in-process fixtures
 * (InMemorySwapEngineProvider).
 */

import type { Address } from 'viem';
import type { AggregateParameters } from '@poolbook/shared';

/**
 * Source of an indexed token sequence.
 * `tokenAt` resolves null when there is no token at the position.
 */
export interface TokenSource {
  tokenAt(index: number): Promise<Address | null>;
}

/**
 * Custody/exchange engine of a pool
 */
export interface SwapEngine extends TokenSource {
  /** Parameters through the standard accessor; rejects if the engine lacks it */
  standardParameters(): Promise<AggregateParameters>;
  /** Parameters through the guarded accessor; rejects if the engine lacks it */
  guardedParameters(): Promise<AggregateParameters>;
  virtualPrice(): Promise<bigint>;
  amplification(): Promise<bigint>;
  owner(): Promise<Address>;
  paused(): Promise<boolean>;
  balanceAt(index: number): Promise<bigint>;
}

/**
 * Deposit wrapper fronting a wrapped pool
 */
export interface DepositWrapper extends TokenSource {
  /** Base pool whose share token the wrapped pool holds */
  basePool(): Promise<Address>;
  /** Wrapped pool this wrapper deposits into */
  parentPool(): Promise<Address>;
}

/**
 * Resolves addresses to collaborators
 */
export interface SwapEngineProvider {
  engineAt(address: Address): SwapEngine;
  wrapperAt(address: Address): DepositWrapper;
}
