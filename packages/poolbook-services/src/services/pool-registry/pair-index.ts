/**
 * Pair Index
 *
 * Unordered asset pair → venues (pool or deposit wrapper addresses) that can
 * exchange the pair. Venue sets keep insertion order and hold each venue once.
 *
 * Writers stage contributions and apply them in one synchronous step, so a
 * failed registration never leaves a partial entry behind.
 */

import type { Address } from 'viem';
import { pairKey } from '@poolbook/shared';
import type { PairKey } from '@poolbook/shared';

/**
 * One venue made eligible for one pair
 */
export interface PairContribution {
  key: PairKey;
  venue: Address;
}

/**
 * Contributions collected during a registration, not yet visible to readers
 */
export class StagedPairs {
  private readonly entries: PairContribution[] = [];

  add(a: Address, b: Address, venue: Address): void {
    this.entries.push({ key: pairKey(a, b), venue });
  }

  get contributions(): readonly PairContribution[] {
    return this.entries;
  }
}

export class PairIndex {
  private readonly venues = new Map<PairKey, Address[]>();

  /**
   * Venues for the pair; order of arguments does not matter
   */
  get(a: Address, b: Address): Address[] {
    return [...(this.venues.get(pairKey(a, b)) ?? [])];
  }

  /**
   * Make staged contributions visible. Returns those that were new, which is
   * what the owner has to withdraw later.
   */
  apply(contributions: readonly PairContribution[]): PairContribution[] {
    const added: PairContribution[] = [];
    for (const contribution of contributions) {
      const list = this.venues.get(contribution.key) ?? [];
      if (list.some((venue) => venue.toLowerCase() === contribution.venue.toLowerCase())) {
        continue;
      }
      list.push(contribution.venue);
      this.venues.set(contribution.key, list);
      added.push(contribution);
    }
    return added;
  }

  /**
   * Remove contributions; pairs left without venues disappear
   */
  withdraw(contributions: readonly PairContribution[]): void {
    for (const { key, venue } of contributions) {
      const list = this.venues.get(key);
      if (!list) continue;

      const remaining = list.filter((entry) => entry.toLowerCase() !== venue.toLowerCase());
      if (remaining.length === 0) {
        this.venues.delete(key);
      } else {
        this.venues.set(key, remaining);
      }
    }
  }

  get size(): number {
    return this.venues.size;
  }

  toJSON(): Record<string, string[]> {
    const out: Record<string, string[]> = {};
    for (const [key, list] of this.venues) {
      out[key] = [...list];
    }
    return out;
  }
}
