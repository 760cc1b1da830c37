/**
 * Access Control
 *
 * Role checks consumed by the registries. The registries only ask
 * `hasRole(role, account)`; who grants roles is up to the host.
 */

import type { Address } from 'viem';
import { normalizeAddress } from '@poolbook/shared';
import { AuthorizationError } from '../../errors/index.js';
import { createServiceLogger } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';

export const Role = {
  /** May add, approve, update and remove any pool */
  POOL_MANAGER: 'POOL_MANAGER',
  /** May add unapproved pools only */
  COMMUNITY_MANAGER: 'COMMUNITY_MANAGER',
  /** May append entries to the name registry */
  REGISTRY_MANAGER: 'REGISTRY_MANAGER',
  /** Held by accounts whose swap engines may be approved */
  APPROVED_POOL_OWNER: 'APPROVED_POOL_OWNER',
} as const;

export type Role = (typeof Role)[keyof typeof Role];

export interface AccessController {
  hasRole(role: Role, account: Address): boolean;
}

/**
 * Throw unless the account holds at least one of the roles
 */
export function requireAnyRole(
  access: AccessController,
  account: Address,
  roles: readonly Role[],
  operation: string
): void {
  if (!roles.some((role) => access.hasRole(role, account))) {
    throw new AuthorizationError(account, roles, operation);
  }
}

/**
 * In-memory role table
 *
 * @example
 * const roles = new RoleRegistry();
 * roles.grantRole(Role.POOL_MANAGER, '0x...');
 */
export class RoleRegistry implements AccessController {
  private readonly members = new Map<Role, Set<string>>();
  private readonly logger: ServiceLogger;

  constructor(initial: Partial<Record<Role, Address[]>> = {}) {
    this.logger = createServiceLogger('RoleRegistry');
    for (const role of Object.values(Role)) {
      for (const account of initial[role] ?? []) {
        this.grantRole(role, account);
      }
    }
  }

  hasRole(role: Role, account: Address): boolean {
    return this.members.get(role)?.has(account.toLowerCase()) ?? false;
  }

  grantRole(role: Role, account: Address): void {
    const normalized = normalizeAddress(account);
    let set = this.members.get(role);
    if (!set) {
      set = new Set();
      this.members.set(role, set);
    }
    set.add(normalized.toLowerCase());
    this.logger.info({ role, account: normalized }, 'Role granted');
  }

  revokeRole(role: Role, account: Address): void {
    if (this.members.get(role)?.delete(account.toLowerCase())) {
      this.logger.info({ role, account }, 'Role revoked');
    }
  }
}
