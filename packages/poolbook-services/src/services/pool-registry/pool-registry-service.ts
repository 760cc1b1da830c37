/**
 * PoolRegistryService
 *
 * Registry of stable-swap pools. Registration discovers a pool's tokens from
 * its swap engine, expands wrapped pools through their deposit wrapper, and
 * indexes every exchangeable asset pair so routers can ask which venues trade
 * a pair.
 *
 * Methods:
 * - addPool: discover, validate and register a pool
 * - approvePool / updatePool / removePool: maintenance
 * - getRecord / getRecordAt / getRecordByName / getAllRecords: stored records
 * - getVirtualPrice, getAmplificationFactor, getPaused, getSwapFee,
 *   getAdminFee, getAggregateParameters, getBalances: live engine reads
 * - getEligiblePools: venues for an asset pair
 */

import type { Address } from 'viem';
import type { ZodTypeAny, output } from 'zod';
import {
  ZERO_ADDRESS,
  clonePoolRecord,
  isValidAddress,
  isZeroAddress,
  normalizeAddress,
  sameAddress,
  serializePoolRecord,
} from '@poolbook/shared';
import type {
  AggregateParameters,
  PoolBalances,
  PoolRecord,
  PoolRegistrySnapshot,
} from '@poolbook/shared';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import {
  ConflictError,
  ExternalMismatchError,
  NotFoundError,
  ValidationError,
} from '../../errors/index.js';
import type { ValidationErrorCode } from '../../errors/index.js';
import {
  createDomainEvent,
  InMemoryDomainEventPublisher,
} from '../../events/index.js';
import type { DomainEventPublisher } from '../../events/index.js';
import type { SwapEngine, SwapEngineProvider } from '../../clients/index.js';
import { Role, requireAnyRole } from '../access-control/index.js';
import type { AccessController } from '../access-control/index.js';
import { WriteSerializer } from '../../utils/index.js';
import { addPoolInputSchema, poolRecordSchema } from '../types/pool-registry/index.js';
import type { AddPoolInput, UpdatePoolInput } from '../types/pool-registry/index.js';
import { PairIndex, StagedPairs } from './pair-index.js';
import type { PairContribution } from './pair-index.js';
import { discoverTokens } from './token-discovery.js';
import { readAggregateParameters } from './parameter-readers.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Dependencies for PoolRegistryService
 */
export interface PoolRegistryServiceDependencies {
  /** Role checks for every write */
  accessController: AccessController;

  /** Resolves pool, engine and wrapper addresses to collaborators */
  engineProvider: SwapEngineProvider;

  /**
   * Receives pool.* events
   * If not provided, an InMemoryDomainEventPublisher is used
   */
  eventPublisher?: DomainEventPublisher;
}

/**
 * Result of addPool
 */
export interface AddPoolResult {
  /** Zero-based position of the record */
  index: number;
  record: PoolRecord;
}

interface WrapperExpansion {
  basePoolAddress: Address;
  underlyingTokens: Address[];
}

// ============================================================================
// SERVICE
// ============================================================================

export class PoolRegistryService {
  protected readonly logger: ServiceLogger;
  protected readonly accessController: AccessController;
  protected readonly engineProvider: SwapEngineProvider;
  protected readonly eventPublisher: DomainEventPublisher;
  private readonly writes = new WriteSerializer('PoolRegistryService');

  private readonly records: PoolRecord[] = [];
  /** Pair-index entries each record added, by record index */
  private readonly contributions: PairContribution[][] = [];
  /** lowercase pool address → record index (active records) */
  private readonly indexByAddress = new Map<string, number>();
  /** name → record index (active records) */
  private readonly indexByName = new Map<string, number>();
  private readonly pairs = new PairIndex();

  constructor(dependencies: PoolRegistryServiceDependencies) {
    this.logger = createServiceLogger('PoolRegistryService');
    this.accessController = dependencies.accessController;
    this.engineProvider = dependencies.engineProvider;
    this.eventPublisher =
      dependencies.eventPublisher ?? new InMemoryDomainEventPublisher();
  }

  // ============================================================================
  // ADD POOL
  // ============================================================================

  /**
   * Register a pool
   *
   * This method:
   * 1. Validates the input and the caller's role
   * 2. Discovers the pool's tokens from its swap engine
   * 3. Reads the LP token through the aggregate parameter accessor
   * 4. For wrapped pools, discovers underlying tokens from the deposit wrapper
   * 5. Commits the record and its pair-index entries together
   *
   * POOL_MANAGER may add any pool; COMMUNITY_MANAGER only unapproved ones.
   *
   * @throws ValidationError, AuthorizationError, ConflictError, NotFoundError
   *         (BasePoolNotFound), ExternalMismatchError (WrapperMismatch),
   *         ExternalUnavailableError (NoParameterData)
   */
  async addPool(caller: Address, input: AddPoolInput): Promise<AddPoolResult> {
    log.methodEntry(this.logger, 'addPool', {
      caller,
      poolAddress: input.poolAddress,
      name: input.name,
    });

    try {
      return await this.writes.run('addPool', async () => {
        const parsed = this.parse(addPoolInputSchema, input);
        requireAnyRole(
          this.accessController,
          caller,
          parsed.isApproved
            ? [Role.POOL_MANAGER]
            : [Role.POOL_MANAGER, Role.COMMUNITY_MANAGER],
          'addPool'
        );

        const { poolAddress, name } = parsed;
        if (parsed.isRemoved) {
          throw new ValidationError('InvalidInput', 'A pool cannot be added as removed', {
            poolAddress,
          });
        }
        if (isZeroAddress(poolAddress)) {
          throw new ValidationError('InvalidPoolAddress', 'poolAddress is the zero address', {
            poolAddress,
          });
        }
        if (this.indexByAddress.has(poolAddress.toLowerCase())) {
          throw new ConflictError('AlreadyRegistered', `${poolAddress} is already registered`, {
            poolAddress,
          });
        }
        this.assertNameAvailable(name);

        const targetAddress =
          parsed.targetAddress && !isZeroAddress(parsed.targetAddress)
            ? parsed.targetAddress
            : poolAddress;
        const depositWrapperAddress = parsed.depositWrapperAddress ?? ZERO_ADDRESS;
        const engine = this.engineProvider.engineAt(targetAddress);
        const staged = new StagedPairs();

        // 2. Tokens, and every pair among them
        log.externalCall(this.logger, targetAddress, 'getToken');
        const tokens = await discoverTokens(engine, targetAddress);
        tokens.forEach((token, i) => {
          for (const earlier of tokens.slice(0, i)) {
            staged.add(token, earlier, poolAddress);
          }
        });

        // 3. Only the LP token is kept from the aggregate parameters
        log.externalCall(this.logger, targetAddress, 'swapStorage');
        const { shape, parameters } = await readAggregateParameters(engine, targetAddress);
        this.logger.debug({ poolAddress, shape }, 'Aggregate parameters read');
        if (isZeroAddress(parameters.lpToken)) {
          throw new ValidationError('ZeroToken', `LP token of ${targetAddress} is the zero address`, {
            address: targetAddress,
            shape,
          });
        }

        // 4. Wrapped pools
        const expansion: WrapperExpansion = isZeroAddress(depositWrapperAddress)
          ? { basePoolAddress: ZERO_ADDRESS, underlyingTokens: [] }
          : await this.expandWrapper(poolAddress, depositWrapperAddress, tokens, staged);

        const record: PoolRecord = {
          poolAddress,
          lpToken: normalizeAddress(parameters.lpToken),
          assetClass: parsed.assetClass,
          name,
          targetAddress,
          tokens: tokens.map((token) => normalizeAddress(token)),
          underlyingTokens: expansion.underlyingTokens,
          basePoolAddress: expansion.basePoolAddress,
          depositWrapperAddress,
          externalId: parsed.externalId,
          isApproved: parsed.isApproved,
          isRemoved: false,
        };
        const index = this.records.length;

        await this.eventPublisher.publish(
          createDomainEvent({
            type: 'pool.added',
            entityId: poolAddress,
            entityType: 'pool',
            payload: { poolAddress, index, record: serializePoolRecord(record) },
            source: 'pool-registry',
          })
        );

        // 5. Commit
        this.records.push(record);
        this.contributions.push(this.pairs.apply(staged.contributions));
        this.indexByAddress.set(poolAddress.toLowerCase(), index);
        this.indexByName.set(name, index);

        this.logger.info(
          {
            poolAddress,
            index,
            tokens: record.tokens.length,
            underlyingTokens: record.underlyingTokens.length,
          },
          'Pool added'
        );
        log.methodExit(this.logger, 'addPool', { poolAddress, index });
        return { index, record: clonePoolRecord(record) };
      });
    } catch (error) {
      log.methodError(this.logger, 'addPool', error as Error, {
        poolAddress: input.poolAddress,
      });
      throw error;
    }
  }

  /**
   * Underlying tokens of a wrapped pool, and the wrapper's pair entries:
   * each underlying token from the base pool's position onwards pairs with
   * each top-level token before the base pool's LP token.
   */
  private async expandWrapper(
    poolAddress: Address,
    wrapperAddress: Address,
    tokens: Address[],
    staged: StagedPairs
  ): Promise<WrapperExpansion> {
    const wrapper = this.engineProvider.wrapperAt(wrapperAddress);

    log.externalCall(this.logger, wrapperAddress, 'baseSwap');
    const basePoolAddress = normalizeAddress(await wrapper.basePool());
    if (!this.indexByAddress.has(basePoolAddress.toLowerCase())) {
      throw new NotFoundError(
        'BasePoolNotFound',
        `Base pool ${basePoolAddress} of ${poolAddress} is not registered`,
        { poolAddress, basePoolAddress }
      );
    }

    log.externalCall(this.logger, wrapperAddress, 'getToken');
    const underlyingTokens = (await discoverTokens(wrapper, wrapperAddress)).map((token) =>
      normalizeAddress(token)
    );

    const baseLpPosition = tokens.length - 1;
    const topLevel = tokens.slice(0, Math.max(baseLpPosition, 0));
    underlyingTokens.forEach((underlying, i) => {
      if (i < baseLpPosition) return;
      for (const token of topLevel) {
        staged.add(underlying, token, wrapperAddress);
      }
    });

    log.externalCall(this.logger, wrapperAddress, 'metaSwap');
    const parentPool = await wrapper.parentPool();
    if (!sameAddress(parentPool, poolAddress)) {
      throw new ExternalMismatchError(
        'WrapperMismatch',
        `Deposit wrapper ${wrapperAddress} fronts ${parentPool}, not ${poolAddress}`,
        { poolAddress, wrapperAddress, parentPool }
      );
    }

    return { basePoolAddress, underlyingTokens };
  }

  // ============================================================================
  // MAINTENANCE
  // ============================================================================

  /**
   * Mark a pool approved. The swap engine's owner must hold APPROVED_POOL_OWNER.
   *
   * @throws AuthorizationError, NotFoundError, ExternalMismatchError (NotSaddleOwned)
   */
  async approvePool(caller: Address, address: string): Promise<PoolRecord> {
    log.methodEntry(this.logger, 'approvePool', { caller, address });

    try {
      return await this.writes.run('approvePool', async () => {
        requireAnyRole(this.accessController, caller, [Role.POOL_MANAGER], 'approvePool');
        const index = this.requireIndex(address);
        const current = this.recordAt(index);

        log.externalCall(this.logger, current.targetAddress, 'owner');
        const owner = await this.engineFor(current).owner();
        if (!this.accessController.hasRole(Role.APPROVED_POOL_OWNER, owner)) {
          throw new ExternalMismatchError(
            'NotSaddleOwned',
            `Owner ${owner} of ${current.poolAddress} is not an approved pool owner`,
            { poolAddress: current.poolAddress, owner }
          );
        }

        await this.eventPublisher.publish(
          createDomainEvent({
            type: 'pool.approved',
            entityId: current.poolAddress,
            entityType: 'pool',
            payload: { poolAddress: current.poolAddress, index },
            source: 'pool-registry',
          })
        );

        current.isApproved = true;

        this.logger.info({ poolAddress: current.poolAddress, index }, 'Pool approved');
        log.methodExit(this.logger, 'approvePool', { index });
        return clonePoolRecord(current);
      });
    } catch (error) {
      log.methodError(this.logger, 'approvePool', error as Error, { address });
      throw error;
    }
  }

  /**
   * Overwrite a record in place. The pair index is not recomputed.
   *
   * @throws AuthorizationError, ValidationError, NotFoundError,
   *         ConflictError (DuplicatePoolName)
   */
  async updatePool(caller: Address, input: UpdatePoolInput): Promise<PoolRecord> {
    log.methodEntry(this.logger, 'updatePool', { caller, poolAddress: input.poolAddress });

    try {
      return await this.writes.run('updatePool', async () => {
        requireAnyRole(this.accessController, caller, [Role.POOL_MANAGER], 'updatePool');
        const record: PoolRecord = this.parse(poolRecordSchema, input);
        if (record.isRemoved) {
          throw new ValidationError('InvalidInput', 'Use removePool to remove a pool', {
            poolAddress: record.poolAddress,
          });
        }

        const index = this.requireIndex(record.poolAddress);
        const previous = this.recordAt(index);
        if (record.name !== previous.name) {
          this.assertNameAvailable(record.name);
        }

        await this.eventPublisher.publish(
          createDomainEvent({
            type: 'pool.updated',
            entityId: record.poolAddress,
            entityType: 'pool',
            payload: { poolAddress: record.poolAddress, index, record: serializePoolRecord(record) },
            source: 'pool-registry',
          })
        );

        this.records[index] = record;
        this.indexByName.delete(previous.name);
        this.indexByName.set(record.name, index);

        this.logger.info({ poolAddress: record.poolAddress, index }, 'Pool updated');
        log.methodExit(this.logger, 'updatePool', { index });
        return clonePoolRecord(record);
      });
    } catch (error) {
      log.methodError(this.logger, 'updatePool', error as Error, {
        poolAddress: input.poolAddress,
      });
      throw error;
    }
  }

  /**
   * Soft-delete a pool. The record keeps its index; its address and name can
   * be registered again and its pair-index entries are withdrawn.
   *
   * @throws AuthorizationError, NotFoundError
   */
  async removePool(caller: Address, address: string): Promise<PoolRecord> {
    log.methodEntry(this.logger, 'removePool', { caller, address });

    try {
      return await this.writes.run('removePool', async () => {
        requireAnyRole(this.accessController, caller, [Role.POOL_MANAGER], 'removePool');
        const index = this.requireIndex(address);
        const record = this.recordAt(index);

        await this.eventPublisher.publish(
          createDomainEvent({
            type: 'pool.removed',
            entityId: record.poolAddress,
            entityType: 'pool',
            payload: { poolAddress: record.poolAddress, index },
            source: 'pool-registry',
          })
        );

        record.isRemoved = true;
        this.indexByAddress.delete(record.poolAddress.toLowerCase());
        this.indexByName.delete(record.name);
        this.pairs.withdraw(this.contributions[index] ?? []);
        this.contributions[index] = [];

        this.logger.info({ poolAddress: record.poolAddress, index }, 'Pool removed');
        log.methodExit(this.logger, 'removePool', { index });
        return clonePoolRecord(record);
      });
    } catch (error) {
      log.methodError(this.logger, 'removePool', error as Error, { address });
      throw error;
    }
  }

  // ============================================================================
  // STORED RECORDS
  // ============================================================================

  /**
   * @throws NotFoundError (NotFound) unless the address belongs to an active record
   */
  getRecord(address: string): PoolRecord {
    return clonePoolRecord(this.recordAt(this.requireIndex(address)));
  }

  /**
   * Record by zero-based index, removed records included
   *
   * @throws NotFoundError (OutOfBounds)
   */
  getRecordAt(index: number): PoolRecord {
    const record = Number.isInteger(index) ? this.records[index] : undefined;
    if (!record) {
      throw new NotFoundError(
        'OutOfBounds',
        `Index ${index} is out of bounds (${this.records.length} records)`,
        { index, length: this.records.length }
      );
    }
    return clonePoolRecord(record);
  }

  /**
   * @throws NotFoundError (NotFound)
   */
  getRecordByName(name: string): PoolRecord {
    const index = this.indexByName.get(name);
    if (index === undefined) {
      throw new NotFoundError('NotFound', `No pool named ${name}`, { name });
    }
    return clonePoolRecord(this.recordAt(index));
  }

  /**
   * Number of records ever added, removed ones included
   */
  getPoolsLength(): number {
    return this.records.length;
  }

  getAllRecords(): PoolRecord[] {
    return this.records.map(clonePoolRecord);
  }

  getTokens(address: string): Address[] {
    return [...this.recordAt(this.requireIndex(address)).tokens];
  }

  getUnderlyingTokens(address: string): Address[] {
    return [...this.recordAt(this.requireIndex(address)).underlyingTokens];
  }

  /**
   * Venues able to exchange `from` for `to` (either direction)
   *
   * @throws ValidationError (InvalidPair) when from is zero or equals to
   */
  getEligiblePools(from: string, to: string): Address[] {
    if (
      !isValidAddress(from) ||
      !isValidAddress(to) ||
      isZeroAddress(from) ||
      sameAddress(from, to)
    ) {
      throw new ValidationError('InvalidPair', `Invalid pair ${from} / ${to}`, { from, to });
    }
    return this.pairs.get(from, to);
  }

  snapshot(): PoolRegistrySnapshot {
    return {
      records: this.records.map(serializePoolRecord),
      addressIndex: Object.fromEntries(this.indexByAddress),
      nameIndex: Object.fromEntries(this.indexByName),
      pairs: this.pairs.toJSON(),
    };
  }

  // ============================================================================
  // LIVE ENGINE READS
  // ============================================================================

  async getVirtualPrice(address: string): Promise<bigint> {
    const engine = this.engineFor(this.recordAt(this.requireIndex(address)));
    return engine.virtualPrice();
  }

  async getAmplificationFactor(address: string): Promise<bigint> {
    const engine = this.engineFor(this.recordAt(this.requireIndex(address)));
    return engine.amplification();
  }

  async getPaused(address: string): Promise<boolean> {
    const engine = this.engineFor(this.recordAt(this.requireIndex(address)));
    return engine.paused();
  }

  /**
   * Current aggregate parameters, through whichever accessor shape the engine answers
   *
   * @throws ExternalUnavailableError (NoParameterData)
   */
  async getAggregateParameters(address: string): Promise<AggregateParameters> {
    const record = this.recordAt(this.requireIndex(address));
    const { parameters } = await readAggregateParameters(
      this.engineFor(record),
      record.targetAddress
    );
    return parameters;
  }

  async getSwapFee(address: string): Promise<bigint> {
    return (await this.getAggregateParameters(address)).swapFee;
  }

  async getAdminFee(address: string): Promise<bigint> {
    return (await this.getAggregateParameters(address)).adminFee;
  }

  /**
   * Live balance of each stored token, in stored order
   */
  async getBalances(address: string): Promise<PoolBalances> {
    const record = this.recordAt(this.requireIndex(address));
    const engine = this.engineFor(record);

    const balances: bigint[] = [];
    for (let i = 0; i < record.tokens.length; i++) {
      balances.push(await engine.balanceAt(i));
    }
    return { tokens: [...record.tokens], balances };
  }

  // ============================================================================
  // HELPERS
  // ============================================================================

  private parse<TSchema extends ZodTypeAny>(schema: TSchema, input: unknown): output<TSchema> {
    const result = schema.safeParse(input);
    if (result.success) {
      return result.data;
    }

    const issue = result.error.issues[0];
    const code: ValidationErrorCode = issue?.path[0] === 'name' ? 'InvalidName' : 'InvalidInput';
    throw new ValidationError(
      code,
      issue ? `${issue.path.join('.')}: ${issue.message}` : 'Invalid input',
      { issues: result.error.issues },
      result.error
    );
  }

  private requireIndex(address: string): number {
    const index = this.indexByAddress.get(address.toLowerCase());
    if (index === undefined) {
      throw new NotFoundError('NotFound', `No registered pool at ${address}`, { address });
    }
    return index;
  }

  private recordAt(index: number): PoolRecord {
    const record = this.records[index];
    if (!record) {
      throw new NotFoundError('OutOfBounds', `Index ${index} is out of bounds`, { index });
    }
    return record;
  }

  private assertNameAvailable(name: string): void {
    const holder = this.indexByName.get(name);
    if (holder !== undefined) {
      throw new ConflictError(
        'DuplicatePoolName',
        `Name ${name} is already used by pool #${holder}`,
        { name, index: holder }
      );
    }
  }

  private engineFor(record: PoolRecord): SwapEngine {
    return this.engineProvider.engineAt(record.targetAddress);
  }
}
