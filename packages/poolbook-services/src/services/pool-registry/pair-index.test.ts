import { describe, it, expect, beforeEach } from 'vitest';
import { PairIndex, StagedPairs } from './pair-index.js';

const A = '0x0000000000000000000000000000000000000a01';
const B = '0x0000000000000000000000000000000000000b02';
const C = '0x0000000000000000000000000000000000000c03';
const POOL_1 = '0x1111111111111111111111111111111111111111';
const POOL_2 = '0x2222222222222222222222222222222222222222';

describe('PairIndex', () => {
  let index: PairIndex;

  beforeEach(() => {
    index = new PairIndex();
  });

  it('should hide staged contributions until applied', () => {
    const staged = new StagedPairs();
    staged.add(A, B, POOL_1);

    expect(index.get(A, B)).toEqual([]);
    index.apply(staged.contributions);
    expect(index.get(A, B)).toEqual([POOL_1]);
  });

  it('should answer both argument orders with the same venues', () => {
    const staged = new StagedPairs();
    staged.add(A, B, POOL_1);
    staged.add(B, C, POOL_1);
    index.apply(staged.contributions);

    expect(index.get(B, A)).toEqual(index.get(A, B));
    expect(index.get(C, B)).toEqual([POOL_1]);
    expect(index.get(A, C)).toEqual([]);
  });

  it('should keep venues in insertion order without duplicates', () => {
    const first = new StagedPairs();
    first.add(A, B, POOL_2);
    first.add(B, A, POOL_2);
    const added = index.apply(first.contributions);

    const second = new StagedPairs();
    second.add(A, B, POOL_1);
    index.apply(second.contributions);

    expect(added).toHaveLength(1);
    expect(index.get(A, B)).toEqual([POOL_2, POOL_1]);
  });

  it('should withdraw contributions and drop empty pairs', () => {
    const staged = new StagedPairs();
    staged.add(A, B, POOL_1);
    staged.add(A, C, POOL_1);
    staged.add(A, B, POOL_2);
    const added = index.apply(staged.contributions);

    index.withdraw(added.filter((c) => c.venue === POOL_1));

    expect(index.get(A, B)).toEqual([POOL_2]);
    expect(index.get(A, C)).toEqual([]);
    expect(index.size).toBe(1);
  });

  it('should return copies', () => {
    const staged = new StagedPairs();
    staged.add(A, B, POOL_1);
    index.apply(staged.contributions);

    index.get(A, B).push(POOL_2);
    expect(index.get(A, B)).toEqual([POOL_1]);
  });

  it('should serialize to plain JSON keyed by pair key', () => {
    const staged = new StagedPairs();
    staged.add(B, A, POOL_1);
    index.apply(staged.contributions);

    expect(index.toJSON()).toEqual({
      '0x0000000000000000000000000000000000000a01/0x0000000000000000000000000000000000000b02': [
        POOL_1,
      ],
    });
  });
});
