export { swapEngineAbi, guardedSwapEngineAbi } from './swap-abi.js';
export { depositWrapperAbi } from './deposit-wrapper-abi.js';
