// ============================================================================
// Stable-swap Engine ABIs
// Read-only subset used by the pool registry
// ============================================================================

/**
 * Swap engine ABI (standard accessor shape).
 *
 * `getToken` reverts for an index past the last token; the registry relies on
 * that revert to find the token count.
 */
export const swapEngineAbi = [
  {
    type: 'function',
    name: 'getToken',
    inputs: [{ name: 'index', type: 'uint8', internalType: 'uint8' }],
    outputs: [{ name: '', type: 'address', internalType: 'contract IERC20' }],
    stateMutability: 'view',
  },
  {
    type: 'function',
    name: 'getTokenBalance',
    inputs: [{ name: 'index', type: 'uint8', internalType: 'uint8' }],
    outputs: [{ name: '', type: 'uint256', internalType: 'uint256' }],
    stateMutability: 'view',
  },
  {
    type: 'function',
    name: 'getVirtualPrice',
    inputs: [],
    outputs: [{ name: '', type: 'uint256', internalType: 'uint256' }],
    stateMutability: 'view',
  },
  {
    type: 'function',
    name: 'getA',
    inputs: [],
    outputs: [{ name: '', type: 'uint256', internalType: 'uint256' }],
    stateMutability: 'view',
  },
  {
    type: 'function',
    name: 'owner',
    inputs: [],
    outputs: [{ name: '', type: 'address', internalType: 'address' }],
    stateMutability: 'view',
  },
  {
    type: 'function',
    name: 'paused',
    inputs: [],
    outputs: [{ name: '', type: 'bool', internalType: 'bool' }],
    stateMutability: 'view',
  },
  {
    type: 'function',
    name: 'swapStorage',
    inputs: [],
    outputs: [
      { name: 'initialA', type: 'uint256', internalType: 'uint256' },
      { name: 'futureA', type: 'uint256', internalType: 'uint256' },
      { name: 'initialATime', type: 'uint256', internalType: 'uint256' },
      { name: 'futureATime', type: 'uint256', internalType: 'uint256' },
      { name: 'swapFee', type: 'uint256', internalType: 'uint256' },
      { name: 'adminFee', type: 'uint256', internalType: 'uint256' },
      { name: 'lpToken', type: 'address', internalType: 'contract LPToken' },
    ],
    stateMutability: 'view',
  },
] as const;

/**
 * Guarded swap engine `swapStorage` accessor.
 * Carries an extra `defaultWithdrawFee` before `lpToken`.
 */
export const guardedSwapEngineAbi = [
  {
    type: 'function',
    name: 'swapStorage',
    inputs: [],
    outputs: [
      { name: 'initialA', type: 'uint256', internalType: 'uint256' },
      { name: 'futureA', type: 'uint256', internalType: 'uint256' },
      { name: 'initialATime', type: 'uint256', internalType: 'uint256' },
      { name: 'futureATime', type: 'uint256', internalType: 'uint256' },
      { name: 'swapFee', type: 'uint256', internalType: 'uint256' },
      { name: 'adminFee', type: 'uint256', internalType: 'uint256' },
      { name: 'defaultWithdrawFee', type: 'uint256', internalType: 'uint256' },
      { name: 'lpToken', type: 'address', internalType: 'contract LPToken' },
    ],
    stateMutability: 'view',
  },
] as const;
