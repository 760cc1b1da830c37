/**
 * Viem Swap Engine Client
 *
 * Reads swap engines and deposit wrappers through a viem PublicClient.
 */

import {
  BaseError,
  ContractFunctionRevertedError,
  decodeFunctionResult,
  encodeFunctionData,
  size,
  type Address,
  type Hex,
  type PublicClient,
} from 'viem';
import {
  swapEngineAbi,
  guardedSwapEngineAbi,
  depositWrapperAbi,
  normalizeAddress,
  type AggregateParameters,
} from '@poolbook/shared';
import type {
  DepositWrapper,
  SwapEngine,
  SwapEngineProvider,
} from './swap-engine.js';

/**
 * The part of a PublicClient the engines use
 */
export type ContractReader = Pick<PublicClient, 'readContract' | 'call'>;

/** Return words of each `swapStorage` shape */
const STANDARD_SWAP_STORAGE_WORDS = 7;
const GUARDED_SWAP_STORAGE_WORDS = 8;

/**
 * True when a viem error comes from the contract reverting
 * (as opposed to transport or decoding failures)
 */
export function isContractRevert(error: unknown): boolean {
  if (!(error instanceof BaseError)) {
    return false;
  }
  return error.walk((e) => e instanceof ContractFunctionRevertedError) !== null;
}

/**
 * Run a `getToken(index)` read; a revert means "no token at this position"
 */
async function readTokenAt(read: () => Promise<Address>): Promise<Address | null> {
  try {
    return normalizeAddress(await read());
  } catch (error) {
    if (isContractRevert(error)) {
      return null;
    }
    throw error;
  }
}

export class ViemSwapEngine implements SwapEngine {
  constructor(
    private readonly client: ContractReader,
    readonly address: Address
  ) {}

  tokenAt(index: number): Promise<Address | null> {
    return readTokenAt(() =>
      this.client.readContract({
        address: this.address,
        abi: swapEngineAbi,
        functionName: 'getToken',
        args: [index],
      })
    );
  }

  /**
   * Both shapes share one selector and the ABI decoder ignores trailing
   * words, so the shape is told apart by the return length.
   */
  private async swapStorageData(words: number): Promise<Hex> {
    const { data } = await this.client.call({
      to: this.address,
      data: encodeFunctionData({ abi: swapEngineAbi, functionName: 'swapStorage' }),
    });
    const length = data ? size(data) : 0;
    if (!data || length !== words * 32) {
      throw new Error(
        `swapStorage at ${this.address} returned ${length} bytes, expected ${words * 32}`
      );
    }
    return data;
  }

  async standardParameters(): Promise<AggregateParameters> {
    const [initialA, futureA, initialATime, futureATime, swapFee, adminFee, lpToken] =
      decodeFunctionResult({
        abi: swapEngineAbi,
        functionName: 'swapStorage',
        data: await this.swapStorageData(STANDARD_SWAP_STORAGE_WORDS),
      });
    return {
      initialA,
      futureA,
      initialATime,
      futureATime,
      swapFee,
      adminFee,
      lpToken: normalizeAddress(lpToken),
    };
  }

  async guardedParameters(): Promise<AggregateParameters> {
    const [initialA, futureA, initialATime, futureATime, swapFee, adminFee, , lpToken] =
      decodeFunctionResult({
        abi: guardedSwapEngineAbi,
        functionName: 'swapStorage',
        data: await this.swapStorageData(GUARDED_SWAP_STORAGE_WORDS),
      });
    return {
      initialA,
      futureA,
      initialATime,
      futureATime,
      swapFee,
      adminFee,
      lpToken: normalizeAddress(lpToken),
    };
  }

  virtualPrice(): Promise<bigint> {
    return this.client.readContract({
      address: this.address,
      abi: swapEngineAbi,
      functionName: 'getVirtualPrice',
    });
  }

  amplification(): Promise<bigint> {
    return this.client.readContract({
      address: this.address,
      abi: swapEngineAbi,
      functionName: 'getA',
    });
  }

  async owner(): Promise<Address> {
    const owner = await this.client.readContract({
      address: this.address,
      abi: swapEngineAbi,
      functionName: 'owner',
    });
    return normalizeAddress(owner);
  }

  paused(): Promise<boolean> {
    return this.client.readContract({
      address: this.address,
      abi: swapEngineAbi,
      functionName: 'paused',
    });
  }

  balanceAt(index: number): Promise<bigint> {
    return this.client.readContract({
      address: this.address,
      abi: swapEngineAbi,
      functionName: 'getTokenBalance',
      args: [index],
    });
  }
}

export class ViemDepositWrapper implements DepositWrapper {
  constructor(
    private readonly client: ContractReader,
    readonly address: Address
  ) {}

  tokenAt(index: number): Promise<Address | null> {
    return readTokenAt(() =>
      this.client.readContract({
        address: this.address,
        abi: depositWrapperAbi,
        functionName: 'getToken',
        args: [index],
      })
    );
  }

  async basePool(): Promise<Address> {
    const base = await this.client.readContract({
      address: this.address,
      abi: depositWrapperAbi,
      functionName: 'baseSwap',
    });
    return normalizeAddress(base);
  }

  async parentPool(): Promise<Address> {
    const parent = await this.client.readContract({
      address: this.address,
      abi: depositWrapperAbi,
      functionName: 'metaSwap',
    });
    return normalizeAddress(parent);
  }
}

/**
 * Provider backed by one chain's PublicClient
 *
 * @example
 * ```typescript
 * const provider = new ViemSwapEngineProvider(EvmConfig.getInstance().getPublicClient(1));
 * const engine = provider.engineAt(poolAddress);
 * ```
 */
export class ViemSwapEngineProvider implements SwapEngineProvider {
  constructor(private readonly client: ContractReader) {}

  engineAt(address: Address): SwapEngine {
    return new ViemSwapEngine(this.client, address);
  }

  wrapperAt(address: Address): DepositWrapper {
    return new ViemDepositWrapper(this.client, address);
  }
}
