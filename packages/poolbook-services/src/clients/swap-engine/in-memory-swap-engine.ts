/**
 * In-Memory Swap Engines
 *
 * Swap engines and deposit wrappers held in process. Used for local fixtures
 * and tests; mutable so tests can move balances or pause an engine between
 * reads.
 */

import type { Address } from 'viem';
import type { AggregateParameters, ParameterShape } from '@poolbook/shared';
import type {
  DepositWrapper,
  SwapEngine,
  SwapEngineProvider,
} from './swap-engine.js';

export interface InMemorySwapEngineState {
  tokens: Address[];
  /** Accessor shape the engine answers; null answers neither */
  parameterShape: ParameterShape | null;
  parameters: AggregateParameters;
  virtualPrice: bigint;
  amplification: bigint;
  owner: Address;
  paused: boolean;
  balances: bigint[];
}

export interface InMemoryDepositWrapperState {
  tokens: Address[];
  basePool: Address;
  parentPool: Address;
}

/**
 * Error raised by in-memory collaborators, standing in for a contract revert
 */
export class InMemoryRevertError extends Error {
  constructor(address: Address, operation: string) {
    super(`${operation} reverted at ${address}`);
    this.name = 'InMemoryRevertError';
  }
}

export class InMemorySwapEngine implements SwapEngine {
  constructor(
    readonly address: Address,
    readonly state: InMemorySwapEngineState
  ) {}

  async tokenAt(index: number): Promise<Address | null> {
    return this.state.tokens[index] ?? null;
  }

  async standardParameters(): Promise<AggregateParameters> {
    if (this.state.parameterShape !== 'standard') {
      throw new InMemoryRevertError(this.address, 'swapStorage');
    }
    return { ...this.state.parameters };
  }

  async guardedParameters(): Promise<AggregateParameters> {
    if (this.state.parameterShape !== 'guarded') {
      throw new InMemoryRevertError(this.address, 'swapStorage (guarded)');
    }
    return { ...this.state.parameters };
  }

  async virtualPrice(): Promise<bigint> {
    return this.state.virtualPrice;
  }

  async amplification(): Promise<bigint> {
    return this.state.amplification;
  }

  async owner(): Promise<Address> {
    return this.state.owner;
  }

  async paused(): Promise<boolean> {
    return this.state.paused;
  }

  async balanceAt(index: number): Promise<bigint> {
    const balance = this.state.balances[index];
    if (balance === undefined) {
      throw new InMemoryRevertError(this.address, `getTokenBalance(${index})`);
    }
    return balance;
  }
}

export class InMemoryDepositWrapper implements DepositWrapper {
  constructor(
    readonly address: Address,
    readonly state: InMemoryDepositWrapperState
  ) {}

  async tokenAt(index: number): Promise<Address | null> {
    return this.state.tokens[index] ?? null;
  }

  async basePool(): Promise<Address> {
    return this.state.basePool;
  }

  async parentPool(): Promise<Address> {
    return this.state.parentPool;
  }
}

/**
 * Engine at an address nothing was deployed to: every read fails
 */
class MissingSwapEngine implements SwapEngine, DepositWrapper {
  constructor(private readonly address: Address) {}

  private fail(operation: string): Promise<never> {
    return Promise.reject(
      new Error(`No contract at ${this.address} (${operation})`)
    );
  }

  tokenAt(): Promise<Address | null> {
    return this.fail('getToken');
  }
  standardParameters(): Promise<AggregateParameters> {
    return this.fail('swapStorage');
  }
  guardedParameters(): Promise<AggregateParameters> {
    return this.fail('swapStorage');
  }
  virtualPrice(): Promise<bigint> {
    return this.fail('getVirtualPrice');
  }
  amplification(): Promise<bigint> {
    return this.fail('getA');
  }
  owner(): Promise<Address> {
    return this.fail('owner');
  }
  paused(): Promise<boolean> {
    return this.fail('paused');
  }
  balanceAt(): Promise<bigint> {
    return this.fail('getTokenBalance');
  }
  basePool(): Promise<Address> {
    return this.fail('baseSwap');
  }
  parentPool(): Promise<Address> {
    return this.fail('metaSwap');
  }
}

/**
 * Provider over engines and wrappers registered in process.
 * Lookups are case-insensitive.
 */
export class InMemorySwapEngineProvider implements SwapEngineProvider {
  private readonly engines = new Map<string, InMemorySwapEngine>();
  private readonly wrappers = new Map<string, InMemoryDepositWrapper>();

  deployEngine(address: Address, state: InMemorySwapEngineState): InMemorySwapEngine {
    const engine = new InMemorySwapEngine(address, state);
    this.engines.set(address.toLowerCase(), engine);
    return engine;
  }

  deployWrapper(address: Address, state: InMemoryDepositWrapperState): InMemoryDepositWrapper {
    const wrapper = new InMemoryDepositWrapper(address, state);
    this.wrappers.set(address.toLowerCase(), wrapper);
    return wrapper;
  }

  engineAt(address: Address): SwapEngine {
    return this.engines.get(address.toLowerCase()) ?? new MissingSwapEngine(address);
  }

  wrapperAt(address: Address): DepositWrapper {
    return this.wrappers.get(address.toLowerCase()) ?? new MissingSwapEngine(address);
  }
}
