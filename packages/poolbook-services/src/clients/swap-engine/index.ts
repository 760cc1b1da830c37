export type {
  TokenSource,
  SwapEngine,
  DepositWrapper,
  SwapEngineProvider,
} from './swap-engine.js';
export {
  ViemSwapEngine,
  ViemDepositWrapper,
  ViemSwapEngineProvider,
  isContractRevert,
} from './viem-swap-engine.js';
export type { ContractReader } from './viem-swap-engine.js';
export {
  InMemorySwapEngine,
  InMemoryDepositWrapper,
  InMemorySwapEngineProvider,
  InMemoryRevertError,
} from './in-memory-swap-engine.js';
export type {
  InMemorySwapEngineState,
  InMemoryDepositWrapperState,
} from './in-memory-swap-engine.js';
