import type { EventEnvelope, ReceivedMessage } from '../../domain/index.js';

/** CloudEvents type of events produced from Service Bus messages. */
export const SERVICEBUS_MESSAGE_EVENT_TYPE = 'com.microsoft.azure.servicebus.message';

/**
 * Converts a broker message into outbound envelopes.
 *
 * Implementations are deterministic for a given message, never mutate it,
 * and throw `ProcessingError` when the content cannot be interpreted.
 */
export interface MessageProcessor {
  process(message: ReceivedMessage): EventEnvelope[];
}

export interface MessageProcessorOptions {
  /** CloudEvents source stamped on every envelope (the entity resource ID). */
  source: string;
  /** Clock used when the broker did not report an enqueue time. */
  now?: (() => Date) | undefined;
}
