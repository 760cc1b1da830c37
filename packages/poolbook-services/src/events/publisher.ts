/**
 * Domain Event Publisher
 *
 * Two publishers share one interface:
 * 1. InMemoryDomainEventPublisher - keeps events in process (default, tests)
 * 2. AmqpDomainEventPublisher - publishes to a RabbitMQ topic exchange
 */

import { createId } from '@paralleldrive/cuid2';
import type { Channel } from 'amqplib';
import { createServiceLogger, log } from '../logging/index.js';
import type { ServiceLogger } from '../logging/index.js';
import type {
  DomainEvent,
  DomainEventType,
  DomainEntityType,
  DomainEventSource,
  DomainEventPayloadMap,
} from './types.js';

/**
 * Exchange all registry events are published to
 */
export const DOMAIN_EVENTS_EXCHANGE = 'poolbook.events';

// ============================================================
// Event Builder
// ============================================================

export interface CreateDomainEventInput<TType extends DomainEventType> {
  type: TType;
  entityId: string;
  entityType: DomainEntityType;
  payload: DomainEventPayloadMap[TType];
  source: DomainEventSource;
  /** Generated if not provided */
  traceId?: string;
  causedBy?: string;
}

/**
 * Build a complete domain event from input
 */
export function createDomainEvent<TType extends DomainEventType>(
  input: CreateDomainEventInput<TType>
): DomainEvent<DomainEventPayloadMap[TType]> {
  return {
    id: createId(),
    type: input.type,
    entityId: input.entityId,
    entityType: input.entityType,
    timestamp: new Date().toISOString(),
    version: 1,
    payload: input.payload,
    metadata: {
      source: input.source,
      traceId: input.traceId ?? createId(),
      causedBy: input.causedBy,
    },
  };
}

/**
 * Routing key: "{entityType}.{eventType}", e.g. "pool.pool.added"
 */
export function buildRoutingKey(event: DomainEvent): string {
  return `${event.entityType}.${event.type}`;
}

// ============================================================
// Publishers
// ============================================================

export interface DomainEventPublisher {
  publish<TPayload>(event: DomainEvent<TPayload>): Promise<void>;
}

/**
 * Keeps every published event in memory, in publish order
 */
export class InMemoryDomainEventPublisher implements DomainEventPublisher {
  private readonly events: DomainEvent[] = [];
  private readonly logger: ServiceLogger;

  constructor() {
    this.logger = createServiceLogger('InMemoryDomainEventPublisher');
  }

  async publish<TPayload>(event: DomainEvent<TPayload>): Promise<void> {
    this.events.push(event);
    this.logger.debug(
      { eventId: event.id, eventType: event.type, entityId: event.entityId },
      'Event recorded'
    );
  }

  /**
   * Published events, optionally filtered by type
   */
  getEvents(type?: DomainEventType): DomainEvent[] {
    return type ? this.events.filter((event) => event.type === type) : [...this.events];
  }

  clear(): void {
    this.events.length = 0;
  }
}

export interface AmqpDomainEventPublisherDependencies {
  channel: Channel;
  /** Defaults to DOMAIN_EVENTS_EXCHANGE */
  exchange?: string;
}

/**
 * Publishes events as persistent JSON messages on a topic exchange.
 * The exchange is asserted on first publish.
 */
export class AmqpDomainEventPublisher implements DomainEventPublisher {
  private readonly channel: Channel;
  private readonly exchange: string;
  private readonly logger: ServiceLogger;
  private exchangeReady: Promise<unknown> | null = null;

  constructor(deps: AmqpDomainEventPublisherDependencies) {
    this.channel = deps.channel;
    this.exchange = deps.exchange ?? DOMAIN_EVENTS_EXCHANGE;
    this.logger = createServiceLogger('AmqpDomainEventPublisher');
  }

  async publish<TPayload>(event: DomainEvent<TPayload>): Promise<void> {
    log.methodEntry(this.logger, 'publish', {
      eventId: event.id,
      eventType: event.type,
      entityId: event.entityId,
    });

    const routingKey = buildRoutingKey(event);

    try {
      if (!this.exchangeReady) {
        this.exchangeReady = this.channel.assertExchange(this.exchange, 'topic', {
          durable: true,
        });
      }
      await this.exchangeReady;

      const message = Buffer.from(JSON.stringify(event));
      this.channel.publish(this.exchange, routingKey, message, {
        persistent: true,
        contentType: 'application/json',
        messageId: event.id,
        headers: {
          eventType: event.type,
          entityType: event.entityType,
          entityId: event.entityId,
          source: event.metadata.source,
        },
      });

      log.methodExit(this.logger, 'publish', { eventId: event.id, routingKey });
    } catch (error) {
      this.exchangeReady = null;
      log.methodError(this.logger, 'publish', error as Error, {
        eventId: event.id,
        eventType: event.type,
      });
      throw error;
    }
  }
}
