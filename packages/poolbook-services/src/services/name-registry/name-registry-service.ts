/**
 * NameRegistryService
 *
 * Versioned, append-only map of names to component addresses, with reverse
 * lookup. An address is registered at most once, under one name, for good.
 *
 * Methods:
 * - addRegistry: append a new version of a name
 * - resolveNameToLatest / resolveNameAndVersion / resolveNameToAllVersions
 * - resolveIdentifierToRegistryData: address → { name, version, isLatest }
 * - listNames, snapshot
 */

import type { Address } from 'viem';
import {
  isValidAddress,
  isValidRegistryName,
  isZeroAddress,
  normalizeAddress,
} from '@poolbook/shared';
import type {
  NameRegistrySnapshot,
  RegistryData,
  RegistryEntry,
} from '@poolbook/shared';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import {
  ConflictError,
  NotFoundError,
  ValidationError,
} from '../../errors/index.js';
import {
  createDomainEvent,
  InMemoryDomainEventPublisher,
} from '../../events/index.js';
import type { DomainEventPublisher } from '../../events/index.js';
import { Role, requireAnyRole } from '../access-control/index.js';
import type { AccessController } from '../access-control/index.js';
import { WriteSerializer } from '../../utils/index.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Dependencies for NameRegistryService
 */
export interface NameRegistryServiceDependencies {
  /** Role checks for addRegistry */
  accessController: AccessController;

  /**
   * Receives registry.entry.added events
   * If not provided, an InMemoryDomainEventPublisher is used
   */
  eventPublisher?: DomainEventPublisher;
}

interface ReverseEntry {
  name: string;
  version: number;
}

// ============================================================================
// SERVICE
// ============================================================================

export class NameRegistryService {
  protected readonly logger: ServiceLogger;
  protected readonly accessController: AccessController;
  protected readonly eventPublisher: DomainEventPublisher;
  private readonly writes = new WriteSerializer('NameRegistryService');

  /** name → addresses in version order; Map keeps first-registration order */
  private readonly versions = new Map<string, Address[]>();
  /** lowercase address → name/version */
  private readonly reverse = new Map<string, ReverseEntry>();

  constructor(dependencies: NameRegistryServiceDependencies) {
    this.logger = createServiceLogger('NameRegistryService');
    this.accessController = dependencies.accessController;
    this.eventPublisher =
      dependencies.eventPublisher ?? new InMemoryDomainEventPublisher();
  }

  // ============================================================================
  // WRITES
  // ============================================================================

  /**
   * Register `address` as the next version of `name`
   *
   * @param caller - Account performing the write; needs REGISTRY_MANAGER
   * @returns The appended entry
   * @throws AuthorizationError, ValidationError (InvalidName, InvalidIdentifier),
   *         ConflictError (DuplicateIdentifier)
   */
  async addRegistry(caller: Address, name: string, address: string): Promise<RegistryEntry> {
    log.methodEntry(this.logger, 'addRegistry', { caller, name, address });

    try {
      return await this.writes.run('addRegistry', async () => {
        requireAnyRole(this.accessController, caller, [Role.REGISTRY_MANAGER], 'addRegistry');

        if (!isValidRegistryName(name)) {
          throw new ValidationError(
            'InvalidName',
            'Registry name must be 1 to 32 UTF-8 bytes',
            { name }
          );
        }

        const identifier = this.parseIdentifier(address);
        const existing = this.reverse.get(identifier.toLowerCase());
        if (existing) {
          throw new ConflictError(
            'DuplicateIdentifier',
            `${identifier} is already registered as ${existing.name} v${existing.version}`,
            { address: identifier, ...existing }
          );
        }

        const version = this.versions.get(name)?.length ?? 0;
        const entry: RegistryEntry = { name, address: identifier, version };

        await this.eventPublisher.publish(
          createDomainEvent({
            type: 'registry.entry.added',
            entityId: name,
            entityType: 'registry-entry',
            payload: { name, address: identifier, version },
            source: 'name-registry',
          })
        );

        const list = this.versions.get(name);
        if (list) {
          list.push(identifier);
        } else {
          this.versions.set(name, [identifier]);
        }
        this.reverse.set(identifier.toLowerCase(), { name, version });

        this.logger.info({ name, address: identifier, version }, 'Registry entry added');
        log.methodExit(this.logger, 'addRegistry', { name, version });
        return entry;
      });
    } catch (error) {
      log.methodError(this.logger, 'addRegistry', error as Error, { name, address });
      throw error;
    }
  }

  // ============================================================================
  // READS
  // ============================================================================

  /**
   * @throws NotFoundError (NameNotFound)
   */
  resolveNameToLatest(name: string): Address {
    const list = this.requireVersions(name);
    const latest = list[list.length - 1];
    if (latest === undefined) {
      throw this.nameNotFound(name);
    }
    return latest;
  }

  /**
   * @throws NotFoundError (VersionNotFound) for versions past the last one,
   *         including every version of an unknown name
   */
  resolveNameAndVersion(name: string, version: number): Address {
    const address = Number.isInteger(version) && version >= 0
      ? this.versions.get(name)?.[version]
      : undefined;
    if (address === undefined) {
      throw new NotFoundError(
        'VersionNotFound',
        `No version ${version} of ${name}`,
        { name, version }
      );
    }
    return address;
  }

  /**
   * @throws NotFoundError (NameNotFound)
   */
  resolveNameToAllVersions(name: string): Address[] {
    return [...this.requireVersions(name)];
  }

  /**
   * @throws ValidationError (InvalidIdentifier), NotFoundError (IdentifierNotFound)
   */
  resolveIdentifierToRegistryData(address: string): RegistryData {
    const identifier = this.parseIdentifier(address);
    const entry = this.reverse.get(identifier.toLowerCase());
    if (!entry) {
      throw new NotFoundError(
        'IdentifierNotFound',
        `${identifier} is not registered`,
        { address: identifier }
      );
    }

    const length = this.versions.get(entry.name)?.length ?? 0;
    return {
      name: entry.name,
      version: entry.version,
      isLatest: entry.version === length - 1,
    };
  }

  /**
   * Registered names in first-registration order
   */
  listNames(): string[] {
    return [...this.versions.keys()];
  }

  snapshot(): NameRegistrySnapshot {
    const versions: Record<string, string[]> = {};
    for (const [name, list] of this.versions) {
      versions[name] = [...list];
    }

    const reverse: Record<string, { name: string; version: number }> = {};
    for (const [address, entry] of this.reverse) {
      reverse[address] = { ...entry };
    }

    return { versions, reverse };
  }

  // ============================================================================
  // HELPERS
  // ============================================================================

  private parseIdentifier(address: string): Address {
    if (!isValidAddress(address) || isZeroAddress(address)) {
      throw new ValidationError(
        'InvalidIdentifier',
        `Invalid identifier: ${address}`,
        { address }
      );
    }
    return normalizeAddress(address);
  }

  private requireVersions(name: string): Address[] {
    const list = this.versions.get(name);
    if (!list || list.length === 0) {
      throw this.nameNotFound(name);
    }
    return list;
  }

  private nameNotFound(name: string): NotFoundError {
    return new NotFoundError('NameNotFound', `No registry entry named ${name}`, { name });
  }
}
