import type {
  ServiceBusClient,
  ServiceBusReceiver,
  ServiceBusReceivedMessage,
  ServiceBusReceiverOptions,
  MessageHandlers,
  SubscribeOptions,
} from '@azure/service-bus';
import type { ReceivedMessage, ServiceBusEntityId } from '../../domain/index.js';

/** The part of `ServiceBusReceiver` the listener relies on. */
export interface SubscribableReceiver {
  readonly entityPath: string;
  readonly identifier: string;
  subscribe(handlers: MessageHandlers, options?: SubscribeOptions): { close(): Promise<void> };
  completeMessage(message: ServiceBusReceivedMessage): Promise<void>;
}

/**
 * Lock renewal is disabled: a message the handler did not complete must see
 * its lock expire so the broker redelivers it.
 */
const RECEIVER_OPTIONS = {
  receiveMode: 'peekLock',
  maxAutoLockRenewalDurationInMs: 0,
} satisfies ServiceBusReceiverOptions;

/**
 * Opens a peek-lock receiver on the queue or topic subscription.
 *
 * Required permissions:
 *  Queues: Microsoft.ServiceBus/namespaces/queues/read
 *  Topics: Microsoft.ServiceBus/namespaces/topics/read,
 *          Microsoft.ServiceBus/namespaces/topics/subscriptions/read
 */
export function createEntityReceiver(client: ServiceBusClient, entity: ServiceBusEntityId): ServiceBusReceiver {
  switch (entity.resourceType) {
    case 'queues':
      return client.createReceiver(entity.resourceName, RECEIVER_OPTIONS);
    case 'topics':
      return client.createReceiver(entity.resourceName, entity.subResourceName, RECEIVER_OPTIONS);
  }
}

function idToString(id: string | number | Buffer | undefined): string | undefined {
  if (id === undefined) return undefined;
  if (Buffer.isBuffer(id)) return id.toString('hex');
  return String(id);
}

/** Wraps a broker message so that completing it settles it on `receiver`. */
export function toReceivedMessage(
  message: ServiceBusReceivedMessage,
  receiver: Pick<SubscribableReceiver, 'completeMessage'>,
): ReceivedMessage {
  return {
    id: idToString(message.messageId),
    body: message.body,
    contentType: message.contentType,
    correlationId: idToString(message.correlationId),
    subject: message.subject,
    applicationProperties: message.applicationProperties,
    enqueuedTime: message.enqueuedTimeUtc,
    deliveryCount: message.deliveryCount,
    complete: () => receiver.completeMessage(message),
  };
}
