// ============================================================================
// Deposit Wrapper ABI
// Front-end contract exposing the unwrapped token set of a wrapped pool
// ============================================================================

export const depositWrapperAbi = [
  {
    type: 'function',
    name: 'getToken',
    inputs: [{ name: 'index', type: 'uint8', internalType: 'uint8' }],
    outputs: [{ name: '', type: 'address', internalType: 'contract IERC20' }],
    stateMutability: 'view',
  },
  {
    type: 'function',
    name: 'baseSwap',
    inputs: [],
    outputs: [{ name: '', type: 'address', internalType: 'contract ISwap' }],
    stateMutability: 'view',
  },
  {
    type: 'function',
    name: 'metaSwap',
    inputs: [],
    outputs: [{ name: '', type: 'address', internalType: 'contract IMetaSwap' }],
    stateMutability: 'view',
  },
] as const;
