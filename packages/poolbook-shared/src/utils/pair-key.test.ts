import { describe, it, expect } from 'vitest';
import { pairKey } from './pair-key.js';

const DAI = '0x6B175474E89094C44Da98b954EedeAC495271d0F';
const USDC = '0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48';

describe('pairKey', () => {
  it('should be identical regardless of argument order', () => {
    expect(pairKey(DAI, USDC)).toBe(pairKey(USDC, DAI));
  });

  it('should put the lower address first, lowercased', () => {
    expect(pairKey(USDC, DAI)).toBe(
      '0x6b175474e89094c44da98b954eedeac495271d0f/0xa0b86991c6218b36c1d19d4a2e9eb0ce3606eb48'
    );
  });

  it('should ignore address casing', () => {
    expect(pairKey('0x6b175474e89094c44da98b954eedeac495271d0f', USDC)).toBe(pairKey(DAI, USDC));
  });

  it('should keep pairs that an exclusive-or combination would merge apart', () => {
    // 0x..01 ^ 0x..02 === 0x..03 ^ 0x..00
    const a = '0x0000000000000000000000000000000000000001';
    const b = '0x0000000000000000000000000000000000000002';
    const c = '0x0000000000000000000000000000000000000003';
    const d = '0x0000000000000000000000000000000000000000';

    expect(pairKey(a, b)).not.toBe(pairKey(c, d));
  });
});

