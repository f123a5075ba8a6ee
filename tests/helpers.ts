import { vi } from 'vitest';
import type { EventEnvelope, EventSender, ReceivedMessage, SendResult } from '../src/domain/index.js';

export const QUEUE_ID =
  '/subscriptions/00000000-0000-0000-0000-000000000000/resourceGroups/rg1/providers/Microsoft.ServiceBus/namespaces/ns1/queues/q1';

export const SUBSCRIPTION_ID =
  '/subscriptions/00000000-0000-0000-0000-000000000000/resourceGroups/rg1/providers/Microsoft.ServiceBus/namespaces/ns1/topics/t1/subscriptions/s1';

/** Fixed enqueue time for deterministic envelopes. */
export const FIXED_TIME = new Date('2026-02-18T12:00:00Z');

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as import('pino').Logger;
}

/** Received message whose `complete` is a spy. */
export function makeMessage(
  overrides: Partial<Omit<ReceivedMessage, 'complete'>> = {},
): ReceivedMessage & { complete: ReturnType<typeof vi.fn> } {
  return {
    id: 'id' in overrides ? overrides.id : 'm1',
    body: 'body' in overrides ? overrides.body : Buffer.from('{"x":1}'),
    contentType: overrides.contentType,
    correlationId: overrides.correlationId,
    subject: overrides.subject,
    applicationProperties: overrides.applicationProperties,
    enqueuedTime: 'enqueuedTime' in overrides ? overrides.enqueuedTime : FIXED_TIME,
    deliveryCount: overrides.deliveryCount,
    complete: vi.fn().mockResolvedValue(undefined),
  };
}

/** Factory for creating test envelopes with sensible defaults. */
export function makeEnvelope(overrides: Partial<EventEnvelope> = {}): EventEnvelope {
  return {
    specversion: '1.0',
    id: 'e1',
    source: QUEUE_ID,
    type: 'com.microsoft.azure.servicebus.message',
    time: FIXED_TIME.toISOString(),
    datacontenttype: 'application/json',
    data: { x: 1 },
    ...overrides,
  };
}

/**
 * Sender that replays the given results in order and records what it sent.
 * Once the results run out every send is acknowledged.
 */
export function scriptedSender(results: Array<SendResult | Error> = []) {
  const sent: EventEnvelope[] = [];
  const queue = [...results];
  const sender: EventSender = {
    send: vi.fn(async (envelope: EventEnvelope): Promise<SendResult> => {
      sent.push(envelope);
      const next = queue.shift();
      if (next instanceof Error) throw next;
      return next ?? { ack: true };
    }),
  };
  return { sender, sent };
}

export function nack(message: string): SendResult {
  return { ack: false, error: new Error(message) };
}
