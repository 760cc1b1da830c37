/**
 * EVM Configuration
 *
 * Maps supported chains to their RPC endpoints and hands out viem public
 * clients for contract reads.
 *
 * RPC endpoints come from environment variables:
 * - RPC_URL_ETHEREUM
 * - RPC_URL_ARBITRUM
 * - RPC_URL_OPTIMISM
 * - RPC_URL_BASE
 * - RPC_URL_LOCAL
 */

import { createPublicClient, http, type Chain, type PublicClient } from 'viem';
import { arbitrum, base, foundry, mainnet, optimism } from 'viem/chains';
import { z } from 'zod';

export enum SupportedChainId {
  ETHEREUM = 1,
  OPTIMISM = 10,
  BASE = 8453,
  ARBITRUM = 42161,
  LOCAL = 31337,
}

interface ChainDefinition {
  chain: Chain;
  envVar: string;
}

const CHAIN_DEFINITIONS: Record<SupportedChainId, ChainDefinition> = {
  [SupportedChainId.ETHEREUM]: { chain: mainnet, envVar: 'RPC_URL_ETHEREUM' },
  [SupportedChainId.OPTIMISM]: { chain: optimism, envVar: 'RPC_URL_OPTIMISM' },
  [SupportedChainId.BASE]: { chain: base, envVar: 'RPC_URL_BASE' },
  [SupportedChainId.ARBITRUM]: { chain: arbitrum, envVar: 'RPC_URL_ARBITRUM' },
  [SupportedChainId.LOCAL]: { chain: foundry, envVar: 'RPC_URL_LOCAL' },
};

const rpcUrlSchema = z.string().url();

/**
 * Source of environment values; `process.env` unless injected
 */
export type EnvSource = Record<string, string | undefined>;

/**
 * EVM configuration
 *
 * A chain counts as supported once its RPC_URL_* variable holds a valid URL.
 * Public clients are created lazily and cached per chain.
 */
export class EvmConfig {
  private static instance: EvmConfig | null = null;

  private readonly endpoints = new Map<number, { url: string; chain: Chain }>();
  private readonly clients = new Map<number, PublicClient>();

  constructor(env: EnvSource = process.env) {
    for (const [id, definition] of Object.entries(CHAIN_DEFINITIONS)) {
      const raw = env[definition.envVar];
      if (!raw) continue;

      const parsed = rpcUrlSchema.safeParse(raw);
      if (!parsed.success) {
        throw new Error(
          `${definition.envVar} is not a valid URL: ${raw}`
        );
      }
      this.endpoints.set(Number(id), { url: parsed.data, chain: definition.chain });
    }
  }

  /**
   * Get the process-wide instance, built from process.env
   */
  static getInstance(): EvmConfig {
    if (!EvmConfig.instance) {
      EvmConfig.instance = new EvmConfig();
    }
    return EvmConfig.instance;
  }

  /**
   * Drop the process-wide instance (tests)
   */
  static resetInstance(): void {
    EvmConfig.instance = null;
  }

  isChainSupported(chainId: number): boolean {
    return this.endpoints.has(chainId);
  }

  getSupportedChainIds(): number[] {
    return [...this.endpoints.keys()].sort((a, b) => a - b);
  }

  getRpcUrl(chainId: number): string {
    const endpoint = this.endpoints.get(chainId);
    if (!endpoint) {
      throw new Error(
        `Chain ${chainId} is not configured. Supported chains: ${this.getSupportedChainIds().join(', ')}`
      );
    }
    return endpoint.url;
  }

  /**
   * Get (or create) the viem public client for a chain
   *
   * @throws Error if the chain has no RPC URL configured
   */
  getPublicClient(chainId: number): PublicClient {
    const cached = this.clients.get(chainId);
    if (cached) {
      return cached;
    }

    const url = this.getRpcUrl(chainId);
    const client = createPublicClient({
      chain: this.endpoints.get(chainId)?.chain,
      transport: http(url),
    });
    this.clients.set(chainId, client);
    return client;
  }
}
