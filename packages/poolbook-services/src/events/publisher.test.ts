/**
 * Domain Event Publisher Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { mockDeep, type DeepMockProxy } from 'vitest-mock-extended';
import type { Channel } from 'amqplib';
import {
  AmqpDomainEventPublisher,
  DOMAIN_EVENTS_EXCHANGE,
  InMemoryDomainEventPublisher,
  buildRoutingKey,
  createDomainEvent,
} from './publisher.js';

const POOL = '0x2000000000000000000000000000000000000001';

function poolRemovedEvent(traceId?: string) {
  return createDomainEvent({
    type: 'pool.removed',
    entityId: POOL,
    entityType: 'pool',
    payload: { poolAddress: POOL, index: 3 },
    source: 'pool-registry',
    traceId,
  });
}

describe('createDomainEvent', () => {
  it('should fill in id, timestamp, version and trace id', () => {
    const event = poolRemovedEvent();

    expect(event.id).toMatch(/^[a-z0-9]+$/);
    expect(event.version).toBe(1);
    expect(Number.isNaN(Date.parse(event.timestamp))).toBe(false);
    expect(event.metadata.source).toBe('pool-registry');
    expect(event.metadata.traceId).toMatch(/^[a-z0-9]+$/);
    expect(event.payload).toEqual({ poolAddress: POOL, index: 3 });
  });

  it('should keep a supplied trace id', () => {
    expect(poolRemovedEvent('trace-1').metadata.traceId).toBe('trace-1');
  });

  it('should give every event its own id', () => {
    expect(poolRemovedEvent().id).not.toBe(poolRemovedEvent().id);
  });
});

describe('buildRoutingKey', () => {
  it('should join entity type and event type', () => {
    expect(buildRoutingKey(poolRemovedEvent())).toBe('pool.pool.removed');
  });
});

describe('InMemoryDomainEventPublisher', () => {
  it('should keep events in order and filter by type', async () => {
    const publisher = new InMemoryDomainEventPublisher();
    const removed = poolRemovedEvent();
    const added = createDomainEvent({
      type: 'registry.entry.added',
      entityId: 'Router',
      entityType: 'registry-entry',
      payload: { name: 'Router', address: POOL, version: 0 },
      source: 'name-registry',
    });

    await publisher.publish(removed);
    await publisher.publish(added);

    expect(publisher.getEvents()).toEqual([removed, added]);
    expect(publisher.getEvents('registry.entry.added')).toEqual([added]);

    publisher.clear();
    expect(publisher.getEvents()).toEqual([]);
  });
});

describe('AmqpDomainEventPublisher', () => {
  let channel: DeepMockProxy<Channel>;

  beforeEach(() => {
    channel = mockDeep<Channel>();
    channel.assertExchange.mockResolvedValue({ exchange: DOMAIN_EVENTS_EXCHANGE });
    channel.publish.mockReturnValue(true);
  });

  it('should publish persistent JSON under the routing key', async () => {
    const publisher = new AmqpDomainEventPublisher({ channel });
    const event = poolRemovedEvent();

    await publisher.publish(event);

    expect(channel.assertExchange).toHaveBeenCalledWith(DOMAIN_EVENTS_EXCHANGE, 'topic', {
      durable: true,
    });
    expect(channel.publish).toHaveBeenCalledTimes(1);

    const [exchange, routingKey, content, options] = channel.publish.mock.calls[0] ?? [];
    expect(exchange).toBe('poolbook.events');
    expect(routingKey).toBe('pool.pool.removed');
    expect(JSON.parse(String(content))).toEqual(event);
    expect(options).toMatchObject({
      persistent: true,
      contentType: 'application/json',
      messageId: event.id,
      headers: { eventType: 'pool.removed', source: 'pool-registry' },
    });
  });

  it('should assert the exchange only once', async () => {
    const publisher = new AmqpDomainEventPublisher({ channel, exchange: 'custom.events' });

    await publisher.publish(poolRemovedEvent());
    await publisher.publish(poolRemovedEvent());

    expect(channel.assertExchange).toHaveBeenCalledTimes(1);
    expect(channel.assertExchange).toHaveBeenCalledWith('custom.events', 'topic', {
      durable: true,
    });
  });

  it('should surface a failed exchange assertion and retry it on the next publish', async () => {
    channel.assertExchange.mockRejectedValueOnce(new Error('channel closed'));
    const publisher = new AmqpDomainEventPublisher({ channel });

    await expect(publisher.publish(poolRemovedEvent())).rejects.toThrow('channel closed');
    await publisher.publish(poolRemovedEvent());

    expect(channel.assertExchange).toHaveBeenCalledTimes(2);
    expect(channel.publish).toHaveBeenCalledTimes(1);
  });
});
