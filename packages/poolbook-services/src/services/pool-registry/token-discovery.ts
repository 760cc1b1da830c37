/**
 * Token Discovery
 *
 * Enumerates the token sequence of a swap engine or deposit wrapper. The
 * contracts do not publish a length: positions are probed from 0 upwards and
 * the first empty position ends the sequence.
 */

import type { Address } from 'viem';
import { MAX_POOL_TOKENS, isZeroAddress } from '@poolbook/shared';
import type { TokenSource } from '../../clients/index.js';
import { ValidationError } from '../../errors/index.js';

/**
 * Yield the token at each position until the source reports none, or `cap`
 * positions have been read
 */
export async function* probeTokens(
  source: TokenSource,
  cap: number = MAX_POOL_TOKENS
): AsyncGenerator<Address, void, undefined> {
  for (let index = 0; index < cap; index++) {
    const token = await source.tokenAt(index);
    if (token === null) {
      return;
    }
    yield token;
  }
}

/**
 * Collect the full token sequence of a source
 *
 * @param source - Engine or wrapper to probe
 * @param owner - Address of the source, for error details
 * @throws ValidationError (ZeroToken) if a position holds the zero address
 */
export async function discoverTokens(
  source: TokenSource,
  owner: Address,
  cap: number = MAX_POOL_TOKENS
): Promise<Address[]> {
  const tokens: Address[] = [];
  for await (const token of probeTokens(source, cap)) {
    if (isZeroAddress(token)) {
      throw new ValidationError(
        'ZeroToken',
        `Token at index ${tokens.length} of ${owner} is the zero address`,
        { address: owner, index: tokens.length }
      );
    }
    tokens.push(token);
  }
  return tokens;
}
