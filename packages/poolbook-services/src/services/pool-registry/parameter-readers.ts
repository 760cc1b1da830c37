/**
 * Aggregate Parameter Readers
 *
 * Swap engines answer one of two `swapStorage` shapes. Readers are tried in
 * order; the first that answers wins.
 */

import type { Address } from 'viem';
import type { AggregateParameters, ParameterShape } from '@poolbook/shared';
import type { SwapEngine } from '../../clients/index.js';
import { ExternalUnavailableError } from '../../errors/index.js';

export interface ParameterReader {
  shape: ParameterShape;
  read(engine: SwapEngine): Promise<AggregateParameters>;
}

export const PARAMETER_READERS: readonly ParameterReader[] = [
  { shape: 'standard', read: (engine) => engine.standardParameters() },
  { shape: 'guarded', read: (engine) => engine.guardedParameters() },
];

export interface ShapedParameters {
  shape: ParameterShape;
  parameters: AggregateParameters;
}

/**
 * @throws ExternalUnavailableError (NoParameterData) when no reader succeeds;
 *         the individual failures are attached as an AggregateError cause
 */
export async function readAggregateParameters(
  engine: SwapEngine,
  address: Address,
  readers: readonly ParameterReader[] = PARAMETER_READERS
): Promise<ShapedParameters> {
  const failures: unknown[] = [];

  for (const reader of readers) {
    try {
      return { shape: reader.shape, parameters: await reader.read(engine) };
    } catch (error) {
      failures.push(error);
    }
  }

  throw new ExternalUnavailableError(
    'NoParameterData',
    `Swap engine at ${address} answered none of: ${readers.map((r) => r.shape).join(', ')}`,
    { address },
    new AggregateError(failures, 'All parameter readers failed')
  );
}
