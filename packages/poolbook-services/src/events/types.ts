/**
 * Domain Events Type Definitions
 *
 * Events published by the registries once a write has passed every check,
 * just before its state is committed.
 */

import type { PoolRecordJSON } from '@poolbook/shared';

// ============================================================
// Event Type Discriminators
// ============================================================

export type NameRegistryEventType = 'registry.entry.added';

export type PoolEventType =
  | 'pool.added'
  | 'pool.approved'
  | 'pool.updated'
  | 'pool.removed';

export type DomainEventType = NameRegistryEventType | PoolEventType;

export type DomainEntityType = 'registry-entry' | 'pool';

export type DomainEventSource = 'name-registry' | 'pool-registry';

// ============================================================
// Event Envelope
// ============================================================

export interface DomainEventMetadata {
  /** Component that published the event */
  source: DomainEventSource;
  /** Correlation ID for tracing */
  traceId: string;
  /** Parent event ID if this event was caused by another event */
  causedBy?: string;
}

/**
 * Envelope of every domain event
 *
 * @template TPayload - Event-specific payload type
 */
export interface DomainEvent<TPayload = unknown> {
  /** Unique event ID (CUID) */
  id: string;
  type: DomainEventType;
  /** Pool address or registry name */
  entityId: string;
  entityType: DomainEntityType;
  /** ISO 8601 */
  timestamp: string;
  /** Schema version */
  version: number;
  payload: TPayload;
  metadata: DomainEventMetadata;
}

// ============================================================
// Payloads
// ============================================================

export interface RegistryEntryAddedPayload {
  name: string;
  address: string;
  version: number;
}

export interface PoolAddedPayload {
  poolAddress: string;
  index: number;
  record: PoolRecordJSON;
}

export interface PoolApprovedPayload {
  poolAddress: string;
  index: number;
}

export interface PoolUpdatedPayload {
  poolAddress: string;
  index: number;
  record: PoolRecordJSON;
}

export interface PoolRemovedPayload {
  poolAddress: string;
  index: number;
}

/**
 * Event type → payload type
 */
export interface DomainEventPayloadMap {
  'registry.entry.added': RegistryEntryAddedPayload;
  'pool.added': PoolAddedPayload;
  'pool.approved': PoolApprovedPayload;
  'pool.updated': PoolUpdatedPayload;
  'pool.removed': PoolRemovedPayload;
}
