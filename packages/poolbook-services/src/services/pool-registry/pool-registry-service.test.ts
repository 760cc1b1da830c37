/**
 * PoolRegistryService Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Address } from 'viem';
import { AssetClass, ZERO_ADDRESS } from '@poolbook/shared';
import {
  AuthorizationError,
  ConflictError,
  ExternalMismatchError,
  ExternalUnavailableError,
  NotFoundError,
  ValidationError,
} from '../../errors/index.js';
import type { AddPoolInput } from '../types/pool-registry/index.js';
import {
  COMMUNITY_MANAGER,
  DAI,
  ENGINE_OWNER,
  ONE,
  POOL_MANAGER,
  STRANGER,
  SUSD,
  SUSD_META_DEPOSIT,
  SUSD_META_INPUT,
  SUSD_META_LP,
  SUSD_META_POOL,
  USDC,
  USDT,
  USD_LP,
  USD_POOL,
  USD_POOL_INPUT,
  createRegistryFixture,
  engineState,
  numberedAddress,
  type RegistryFixture,
} from './test-fixtures.js';

const OTHER_POOL: Address = '0x2000000000000000000000000000000000000003';
const PROXY_TARGET: Address = '0x2000000000000000000000000000000000000004';

describe('PoolRegistryService', () => {
  let fixture: RegistryFixture;

  beforeEach(() => {
    fixture = createRegistryFixture();
  });

  // ===========================================================================
  // addPool
  // ===========================================================================

  describe('addPool', () => {
    it('should register a plain pool with discovered tokens and LP token', async () => {
      const { index, record } = await fixture.service.addPool(POOL_MANAGER, USD_POOL_INPUT);

      expect(index).toBe(0);
      expect(record).toEqual({
        poolAddress: USD_POOL,
        lpToken: USD_LP,
        assetClass: AssetClass.USD,
        name: 'USDv2',
        targetAddress: USD_POOL,
        tokens: [DAI, USDC, USDT],
        underlyingTokens: [],
        basePoolAddress: ZERO_ADDRESS,
        depositWrapperAddress: ZERO_ADDRESS,
        externalId: 0n,
        isApproved: true,
        isRemoved: false,
      });
    });

    it('should index every pair of a three-token pool', async () => {
      await fixture.service.addPool(POOL_MANAGER, USD_POOL_INPUT);

      expect(fixture.service.getEligiblePools(DAI, USDC)).toEqual([USD_POOL]);
      expect(fixture.service.getEligiblePools(DAI, USDT)).toEqual([USD_POOL]);
      expect(fixture.service.getEligiblePools(USDC, USDT)).toEqual([USD_POOL]);
    });

    it('should expand a wrapped pool through its deposit wrapper', async () => {
      await fixture.service.addPool(POOL_MANAGER, USD_POOL_INPUT);
      const { index, record } = await fixture.service.addPool(POOL_MANAGER, SUSD_META_INPUT);

      expect(index).toBe(1);
      expect(record.tokens).toEqual([SUSD, USD_LP]);
      expect(record.underlyingTokens).toEqual([SUSD, DAI, USDC, USDT]);
      expect(record.basePoolAddress).toBe(USD_POOL);
      expect(record.depositWrapperAddress).toBe(SUSD_META_DEPOSIT);
      expect(record.lpToken).toBe(SUSD_META_LP);

      const { service } = fixture;
      expect(service.getEligiblePools(DAI, USDC)).toEqual([USD_POOL]);
      expect(service.getEligiblePools(DAI, USD_LP)).toEqual([]);
      expect(service.getEligiblePools(SUSD, USDC)).toEqual([SUSD_META_DEPOSIT]);
      expect(service.getEligiblePools(USD_LP, SUSD)).toEqual([SUSD_META_POOL]);
      expect(service.getEligiblePools(DAI, SUSD)).toEqual([SUSD_META_DEPOSIT]);
      expect(service.getEligiblePools(SUSD, USDT)).toEqual([SUSD_META_DEPOSIT]);
    });

    it('should answer the same venues in either argument order', async () => {
      await fixture.service.addPool(POOL_MANAGER, USD_POOL_INPUT);
      await fixture.service.addPool(POOL_MANAGER, SUSD_META_INPUT);
      const { service } = fixture;

      for (const [a, b] of [
        [DAI, USDC],
        [USDC, SUSD],
        [SUSD, USD_LP],
        [USDT, SUSD],
      ] as const) {
        expect(service.getEligiblePools(b, a)).toEqual(service.getEligiblePools(a, b));
      }
      expect(service.getEligiblePools(USDC, SUSD)).toEqual([SUSD_META_DEPOSIT]);
    });

    it('should reject a wrapped pool whose base pool is not registered', async () => {
      const attempt = fixture.service.addPool(POOL_MANAGER, SUSD_META_INPUT);

      await expect(attempt).rejects.toBeInstanceOf(NotFoundError);
      await expect(attempt).rejects.toMatchObject({ code: 'BasePoolNotFound' });
      expect(fixture.service.getPoolsLength()).toBe(0);
      expect(fixture.service.getEligiblePools(SUSD, USD_LP)).toEqual([]);
      expect(fixture.publisher.getEvents()).toEqual([]);
    });

    it('should register a wrapped pool queued right behind its base pool', async () => {
      const [base, wrapped] = await Promise.all([
        fixture.service.addPool(POOL_MANAGER, USD_POOL_INPUT),
        fixture.service.addPool(POOL_MANAGER, SUSD_META_INPUT),
      ]);

      expect(base.index).toBe(0);
      expect(wrapped.index).toBe(1);
    });

    it('should reject the zero pool address', async () => {
      await expect(
        fixture.service.addPool(POOL_MANAGER, { ...USD_POOL_INPUT, poolAddress: ZERO_ADDRESS })
      ).rejects.toMatchObject({ code: 'InvalidPoolAddress' });
    });

    it('should reject an address that is already registered', async () => {
      await fixture.service.addPool(POOL_MANAGER, USD_POOL_INPUT);

      const attempt = fixture.service.addPool(POOL_MANAGER, { ...USD_POOL_INPUT, name: 'again' });
      await expect(attempt).rejects.toBeInstanceOf(ConflictError);
      await expect(attempt).rejects.toMatchObject({ code: 'AlreadyRegistered' });
    });

    it('should reject a name used by an active pool', async () => {
      fixture.provider.deployEngine(OTHER_POOL, engineState([DAI, SUSD], SUSD_META_LP));
      await fixture.service.addPool(POOL_MANAGER, USD_POOL_INPUT);

      await expect(
        fixture.service.addPool(POOL_MANAGER, { ...USD_POOL_INPUT, poolAddress: OTHER_POOL })
      ).rejects.toMatchObject({ code: 'DuplicatePoolName' });
    });

    it('should reject malformed input', async () => {
      await expect(
        fixture.service.addPool(POOL_MANAGER, { ...USD_POOL_INPUT, name: '' })
      ).rejects.toMatchObject({ code: 'InvalidName' });
      await expect(
        fixture.service.addPool(POOL_MANAGER, { ...USD_POOL_INPUT, poolAddress: '0x1234' })
      ).rejects.toMatchObject({ code: 'InvalidInput' });
      await expect(
        fixture.service.addPool(POOL_MANAGER, { ...USD_POOL_INPUT, externalId: -1 })
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('should read tokens from the target address of a proxied pool', async () => {
      fixture.provider.deployEngine(PROXY_TARGET, engineState([DAI, SUSD], SUSD_META_LP));

      const { record } = await fixture.service.addPool(POOL_MANAGER, {
        ...USD_POOL_INPUT,
        poolAddress: OTHER_POOL,
        targetAddress: PROXY_TARGET,
      });

      expect(record.targetAddress).toBe(PROXY_TARGET);
      expect(record.tokens).toEqual([DAI, SUSD]);
      expect(fixture.service.getEligiblePools(SUSD, DAI)).toEqual([OTHER_POOL]);
    });

    it('should stop discovery at eight tokens', async () => {
      const tokens = Array.from({ length: 9 }, (_, i) => numberedAddress(4, i + 1));
      fixture.provider.deployEngine(OTHER_POOL, engineState(tokens, SUSD_META_LP));

      const { record } = await fixture.service.addPool(POOL_MANAGER, {
        ...USD_POOL_INPUT,
        poolAddress: OTHER_POOL,
      });

      expect(record.tokens).toEqual(tokens.slice(0, 8));
    });

    it('should reject a zero token and leave nothing behind', async () => {
      fixture.usdEngine.state.tokens = [DAI, ZERO_ADDRESS, USDC];

      const attempt = fixture.service.addPool(POOL_MANAGER, USD_POOL_INPUT);
      await expect(attempt).rejects.toBeInstanceOf(ValidationError);
      await expect(attempt).rejects.toMatchObject({ code: 'ZeroToken', details: { index: 1 } });
      expect(fixture.service.getPoolsLength()).toBe(0);
    });

    it('should reject a zero LP token', async () => {
      const { state } = fixture.usdEngine;
      state.parameters = { ...state.parameters, lpToken: ZERO_ADDRESS };

      const attempt = fixture.service.addPool(POOL_MANAGER, USD_POOL_INPUT);
      await expect(attempt).rejects.toBeInstanceOf(ValidationError);
      await expect(attempt).rejects.toMatchObject({
        code: 'ZeroToken',
        details: { address: USD_POOL, shape: 'standard' },
      });
      expect(fixture.service.getPoolsLength()).toBe(0);
    });

    it('should refuse to add a pool already marked removed', async () => {
      const attempt = fixture.service.addPool(POOL_MANAGER, { ...USD_POOL_INPUT, isRemoved: true });

      await expect(attempt).rejects.toBeInstanceOf(ValidationError);
      await expect(attempt).rejects.toMatchObject({ code: 'InvalidInput' });
      expect(fixture.service.getPoolsLength()).toBe(0);
      expect(fixture.service.getEligiblePools(DAI, USDC)).toEqual([]);
      await expect(
        fixture.service.addPool(POOL_MANAGER, { ...USD_POOL_INPUT, name: 'USDv3' })
      ).resolves.toMatchObject({ index: 0, record: { isRemoved: false } });
    });

    it('should fall back to the guarded parameter accessor', async () => {
      fixture.usdEngine.state.parameterShape = 'guarded';

      const { record } = await fixture.service.addPool(POOL_MANAGER, USD_POOL_INPUT);
      expect(record.lpToken).toBe(USD_LP);
    });

    it('should fail with NoParameterData when no accessor answers', async () => {
      fixture.usdEngine.state.parameterShape = null;

      const attempt = fixture.service.addPool(POOL_MANAGER, USD_POOL_INPUT);
      await expect(attempt).rejects.toBeInstanceOf(ExternalUnavailableError);
      await expect(attempt).rejects.toMatchObject({ code: 'NoParameterData' });
      expect(fixture.service.getPoolsLength()).toBe(0);
      expect(fixture.service.getEligiblePools(DAI, USDC)).toEqual([]);
    });

    it('should reject a deposit wrapper that fronts another pool', async () => {
      await fixture.service.addPool(POOL_MANAGER, USD_POOL_INPUT);
      fixture.metaDeposit.state.parentPool = OTHER_POOL;

      const attempt = fixture.service.addPool(POOL_MANAGER, SUSD_META_INPUT);
      await expect(attempt).rejects.toBeInstanceOf(ExternalMismatchError);
      await expect(attempt).rejects.toMatchObject({ code: 'WrapperMismatch' });
      expect(fixture.service.getPoolsLength()).toBe(1);
      expect(fixture.service.getEligiblePools(SUSD, USD_LP)).toEqual([]);
      expect(fixture.service.getEligiblePools(SUSD, DAI)).toEqual([]);
    });

    it('should publish pool.added with the serialized record', async () => {
      await fixture.service.addPool(POOL_MANAGER, USD_POOL_INPUT);

      const [event] = fixture.publisher.getEvents('pool.added');
      expect(event?.entityId).toBe(USD_POOL);
      expect(event?.metadata.source).toBe('pool-registry');
      expect(event?.payload).toMatchObject({
        poolAddress: USD_POOL,
        index: 0,
        record: { externalId: '0', tokens: [DAI, USDC, USDT] },
      });
    });

    it('should commit nothing when the event cannot be published', async () => {
      const failing = createRegistryFixture({
        eventPublisher: { publish: () => Promise.reject(new Error('broker down')) },
      });

      await expect(failing.service.addPool(POOL_MANAGER, USD_POOL_INPUT)).rejects.toThrow(
        'broker down'
      );
      expect(failing.service.getPoolsLength()).toBe(0);
      expect(failing.service.getEligiblePools(DAI, USDC)).toEqual([]);
    });
  });

  // ===========================================================================
  // authorization
  // ===========================================================================

  describe('authorization', () => {
    const unapproved: AddPoolInput = { ...USD_POOL_INPUT, isApproved: false };

    it('should reject callers without a manager role', async () => {
      await expect(fixture.service.addPool(STRANGER, unapproved)).rejects.toBeInstanceOf(
        AuthorizationError
      );
    });

    it('should let community managers add unapproved pools only', async () => {
      await expect(
        fixture.service.addPool(COMMUNITY_MANAGER, USD_POOL_INPUT)
      ).rejects.toMatchObject({ code: 'MissingRole' });

      const { record } = await fixture.service.addPool(COMMUNITY_MANAGER, unapproved);
      expect(record.isApproved).toBe(false);
    });

    it('should restrict maintenance to pool managers', async () => {
      await fixture.service.addPool(POOL_MANAGER, USD_POOL_INPUT);

      await expect(fixture.service.removePool(COMMUNITY_MANAGER, USD_POOL)).rejects.toBeInstanceOf(
        AuthorizationError
      );
      await expect(fixture.service.approvePool(STRANGER, USD_POOL)).rejects.toBeInstanceOf(
        AuthorizationError
      );
    });
  });

  // ===========================================================================
  // stored records
  // ===========================================================================

  describe('stored records', () => {
    beforeEach(async () => {
      await fixture.service.addPool(POOL_MANAGER, USD_POOL_INPUT);
      await fixture.service.addPool(POOL_MANAGER, SUSD_META_INPUT);
    });

    it('should return the same record by address, index and name', () => {
      const byAddress = fixture.service.getRecord(SUSD_META_POOL);

      expect(fixture.service.getRecordAt(1)).toEqual(byAddress);
      expect(fixture.service.getRecordByName('sUSD meta v2')).toEqual(byAddress);
      expect(fixture.service.getRecord(SUSD_META_POOL.toLowerCase())).toEqual(byAddress);
    });

    it('should fail with OutOfBounds past the last index', () => {
      expect(() => fixture.service.getRecordAt(2)).toThrow(
        expect.objectContaining({ code: 'OutOfBounds' })
      );
    });

    it('should fail with NotFound for unknown addresses and names', () => {
      expect(() => fixture.service.getRecord(ZERO_ADDRESS)).toThrow(
        expect.objectContaining({ code: 'NotFound' })
      );
      expect(() => fixture.service.getRecordByName('nope')).toThrow(NotFoundError);
    });

    it('should expose stored token sequences', () => {
      expect(fixture.service.getTokens(SUSD_META_POOL)).toEqual([SUSD, USD_LP]);
      expect(fixture.service.getUnderlyingTokens(SUSD_META_POOL)).toEqual([SUSD, DAI, USDC, USDT]);
      expect(fixture.service.getUnderlyingTokens(USD_POOL)).toEqual([]);
    });

    it('should hand out copies', () => {
      fixture.service.getRecord(USD_POOL).tokens.push(SUSD);
      fixture.service.getTokens(USD_POOL).pop();

      expect(fixture.service.getTokens(USD_POOL)).toEqual([DAI, USDC, USDT]);
    });

    it('should list every record in index order', () => {
      expect(fixture.service.getPoolsLength()).toBe(2);
      expect(fixture.service.getAllRecords().map((r) => r.poolAddress)).toEqual([
        USD_POOL,
        SUSD_META_POOL,
      ]);
    });

    it('should export a JSON snapshot', () => {
      const snapshot = fixture.service.snapshot();

      expect(snapshot.records).toHaveLength(2);
      expect(snapshot.records[1]?.externalId).toBe('1');
      expect(snapshot.addressIndex).toEqual({ [USD_POOL]: 0, [SUSD_META_POOL]: 1 });
      expect(snapshot.nameIndex).toEqual({ USDv2: 0, 'sUSD meta v2': 1 });
      // 3 USD pairs, 1 primary sUSD pair, 3 wrapper pairs
      expect(Object.keys(snapshot.pairs)).toHaveLength(7);
    });
  });

  // ===========================================================================
  // getEligiblePools
  // ===========================================================================

  describe('getEligiblePools', () => {
    it('should reject a zero, malformed or degenerate pair', () => {
      expect(() => fixture.service.getEligiblePools(ZERO_ADDRESS, DAI)).toThrow(
        expect.objectContaining({ code: 'InvalidPair' })
      );
      expect(() => fixture.service.getEligiblePools(DAI, DAI)).toThrow(ValidationError);
      expect(() => fixture.service.getEligiblePools('0x12', DAI)).toThrow(ValidationError);
    });

    it('should return an empty list for unknown pairs', () => {
      expect(fixture.service.getEligiblePools(DAI, USDC)).toEqual([]);
    });

    it('should match regardless of address casing', async () => {
      fixture.provider.deployEngine(OTHER_POOL, engineState(
        ['0xabcdef0000000000000000000000000000000001', DAI],
        SUSD_META_LP
      ));
      await fixture.service.addPool(POOL_MANAGER, { ...USD_POOL_INPUT, poolAddress: OTHER_POOL });

      expect(
        fixture.service.getEligiblePools('0xABCDEF0000000000000000000000000000000001', DAI)
      ).toEqual([OTHER_POOL]);
    });
  });

  // ===========================================================================
  // live engine reads
  // ===========================================================================

  describe('live engine reads', () => {
    beforeEach(async () => {
      await fixture.service.addPool(POOL_MANAGER, USD_POOL_INPUT);
    });

    it('should proxy price, amplification and pause state', async () => {
      expect(await fixture.service.getVirtualPrice(USD_POOL)).toBe(ONE);
      expect(await fixture.service.getAmplificationFactor(USD_POOL)).toBe(200n);
      expect(await fixture.service.getPaused(USD_POOL)).toBe(false);

      fixture.usdEngine.state.paused = true;
      expect(await fixture.service.getPaused(USD_POOL)).toBe(true);
    });

    it('should read fees through the aggregate parameters', async () => {
      expect(await fixture.service.getSwapFee(USD_POOL)).toBe(4000000n);
      expect(await fixture.service.getAdminFee(USD_POOL)).toBe(5000000000n);

      fixture.usdEngine.state.parameterShape = 'guarded';
      expect((await fixture.service.getAggregateParameters(USD_POOL)).lpToken).toBe(USD_LP);
    });

    it('should return balances in stored token order', async () => {
      expect(await fixture.service.getBalances(USD_POOL)).toEqual({
        tokens: [DAI, USDC, USDT],
        balances: [ONE, 2n * ONE, 3n * ONE],
      });
    });

    it('should require a registered pool', async () => {
      await expect(fixture.service.getVirtualPrice(OTHER_POOL)).rejects.toMatchObject({
        code: 'NotFound',
      });
      expect(() => fixture.service.getTokens(OTHER_POOL)).toThrow(NotFoundError);
    });
  });

  // ===========================================================================
  // approvePool
  // ===========================================================================

  describe('approvePool', () => {
    beforeEach(async () => {
      await fixture.service.addPool(POOL_MANAGER, { ...USD_POOL_INPUT, isApproved: false });
    });

    it('should approve a pool owned by an approved owner', async () => {
      const record = await fixture.service.approvePool(POOL_MANAGER, USD_POOL);

      expect(record.isApproved).toBe(true);
      expect(fixture.service.getRecord(USD_POOL).isApproved).toBe(true);
      expect(fixture.publisher.getEvents('pool.approved')[0]?.payload).toEqual({
        poolAddress: USD_POOL,
        index: 0,
      });
    });

    it('should refuse pools whose engine owner lacks the role', async () => {
      fixture.roles.revokeRole('APPROVED_POOL_OWNER', ENGINE_OWNER);

      const attempt = fixture.service.approvePool(POOL_MANAGER, USD_POOL);
      await expect(attempt).rejects.toBeInstanceOf(ExternalMismatchError);
      await expect(attempt).rejects.toMatchObject({ code: 'NotSaddleOwned' });
      expect(fixture.service.getRecord(USD_POOL).isApproved).toBe(false);
    });

    it('should fail with NotFound for unknown pools', async () => {
      await expect(fixture.service.approvePool(POOL_MANAGER, OTHER_POOL)).rejects.toMatchObject({
        code: 'NotFound',
      });
    });
  });

  // ===========================================================================
  // updatePool
  // ===========================================================================

  describe('updatePool', () => {
    beforeEach(async () => {
      await fixture.service.addPool(POOL_MANAGER, USD_POOL_INPUT);
      await fixture.service.addPool(POOL_MANAGER, SUSD_META_INPUT);
    });

    it('should overwrite the record and move its name', async () => {
      const current = fixture.service.getRecord(USD_POOL);

      const updated = await fixture.service.updatePool(POOL_MANAGER, {
        ...current,
        name: 'USD base',
        externalId: 7n,
      });

      expect(updated.externalId).toBe(7n);
      expect(fixture.service.getRecordAt(0).name).toBe('USD base');
      expect(fixture.service.getRecordByName('USD base').poolAddress).toBe(USD_POOL);
      expect(() => fixture.service.getRecordByName('USDv2')).toThrow(NotFoundError);
      expect(fixture.service.getEligiblePools(DAI, USDC)).toEqual([USD_POOL]);
      expect(fixture.publisher.getEvents('pool.updated')).toHaveLength(1);
    });

    it('should reject a name held by another pool', async () => {
      const current = fixture.service.getRecord(USD_POOL);

      await expect(
        fixture.service.updatePool(POOL_MANAGER, { ...current, name: 'sUSD meta v2' })
      ).rejects.toMatchObject({ code: 'DuplicatePoolName' });
      expect(fixture.service.getRecord(USD_POOL).name).toBe('USDv2');
    });

    it('should refuse to remove through an update', async () => {
      const current = fixture.service.getRecord(USD_POOL);

      await expect(
        fixture.service.updatePool(POOL_MANAGER, { ...current, isRemoved: true })
      ).rejects.toMatchObject({ code: 'InvalidInput' });
    });

    it('should fail with NotFound for unregistered pools', async () => {
      const current = fixture.service.getRecord(USD_POOL);

      await expect(
        fixture.service.updatePool(POOL_MANAGER, { ...current, poolAddress: OTHER_POOL })
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  // ===========================================================================
  // removePool
  // ===========================================================================

  describe('removePool', () => {
    beforeEach(async () => {
      await fixture.service.addPool(POOL_MANAGER, USD_POOL_INPUT);
    });

    it('should soft-delete the record and withdraw its pairs', async () => {
      const removed = await fixture.service.removePool(POOL_MANAGER, USD_POOL);

      expect(removed.isRemoved).toBe(true);
      expect(fixture.service.getRecordAt(0).isRemoved).toBe(true);
      expect(fixture.service.getPoolsLength()).toBe(1);
      expect(() => fixture.service.getRecord(USD_POOL)).toThrow(NotFoundError);
      expect(() => fixture.service.getRecordByName('USDv2')).toThrow(NotFoundError);
      expect(fixture.service.getEligiblePools(DAI, USDC)).toEqual([]);
      expect(fixture.publisher.getEvents('pool.removed')[0]?.payload).toEqual({
        poolAddress: USD_POOL,
        index: 0,
      });
    });

    it('should allow the address and name to be registered again', async () => {
      await fixture.service.removePool(POOL_MANAGER, USD_POOL);

      const { index } = await fixture.service.addPool(POOL_MANAGER, USD_POOL_INPUT);

      expect(index).toBe(1);
      expect(fixture.service.getRecord(USD_POOL).isRemoved).toBe(false);
      expect(fixture.service.getEligiblePools(DAI, USDC)).toEqual([USD_POOL]);
    });

    it('should stop wrapped pools from finding a removed base pool', async () => {
      await fixture.service.removePool(POOL_MANAGER, USD_POOL);

      await expect(fixture.service.addPool(POOL_MANAGER, SUSD_META_INPUT)).rejects.toMatchObject({
        code: 'BasePoolNotFound',
      });
    });

    it('should fail with NotFound the second time', async () => {
      await fixture.service.removePool(POOL_MANAGER, USD_POOL);

      await expect(fixture.service.removePool(POOL_MANAGER, USD_POOL)).rejects.toMatchObject({
        code: 'NotFound',
      });
    });
  });

  // ===========================================================================
  // concurrency
  // ===========================================================================

  describe('concurrency', () => {
    it('should reject a write started by a collaborator during a write', async () => {
      let reentrant: unknown;
      let lengthDuringWrite: number | undefined;
      const original = fixture.usdEngine.state.tokens;

      vi.spyOn(fixture.usdEngine, 'tokenAt').mockImplementation(async (index) => {
        if (index === 0) {
          lengthDuringWrite = fixture.service.getPoolsLength();
          reentrant = await fixture.service
            .addPool(POOL_MANAGER, SUSD_META_INPUT)
            .catch((error: unknown) => error);
        }
        return original[index] ?? null;
      });

      const { index } = await fixture.service.addPool(POOL_MANAGER, USD_POOL_INPUT);

      expect(index).toBe(0);
      expect(lengthDuringWrite).toBe(0);
      expect(reentrant).toBeInstanceOf(ConflictError);
      expect(reentrant).toMatchObject({ code: 'ReentrantWrite' });
      expect(fixture.service.getPoolsLength()).toBe(1);
    });

    it('should let reads through while a write is in flight', async () => {
      await fixture.service.addPool(POOL_MANAGER, USD_POOL_INPUT);

      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const tokenAt = fixture.metaEngine.tokenAt.bind(fixture.metaEngine);
      vi.spyOn(fixture.metaEngine, 'tokenAt').mockImplementation(async (index) => {
        await gate;
        return tokenAt(index);
      });

      const pending = fixture.service.addPool(POOL_MANAGER, SUSD_META_INPUT);

      expect(fixture.service.getRecord(USD_POOL).name).toBe('USDv2');
      expect(fixture.service.getPoolsLength()).toBe(1);

      release();
      await pending;
      expect(fixture.service.getPoolsLength()).toBe(2);
    });
  });
});
