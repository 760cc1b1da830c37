/**
 * Domain events
 */

export type {
  DomainEvent,
  DomainEventType,
  DomainEntityType,
  DomainEventSource,
  DomainEventMetadata,
  DomainEventPayloadMap,
  NameRegistryEventType,
  PoolEventType,
  RegistryEntryAddedPayload,
  PoolAddedPayload,
  PoolApprovedPayload,
  PoolUpdatedPayload,
  PoolRemovedPayload,
} from './types.js';

export {
  DOMAIN_EVENTS_EXCHANGE,
  createDomainEvent,
  buildRoutingKey,
  InMemoryDomainEventPublisher,
  AmqpDomainEventPublisher,
} from './publisher.js';
export type {
  CreateDomainEventInput,
  DomainEventPublisher,
  AmqpDomainEventPublisherDependencies,
} from './publisher.js';
