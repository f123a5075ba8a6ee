import type { Logger } from 'pino';
import type { EventEnvelope, EventSender, ReceivedMessage } from '../domain/index.js';
import { DeliveryError, ProcessingError, toError } from '../domain/index.js';
import type { MessageProcessor } from './processors/index.js';
import type { AdapterStats } from './stats.js';
import { dispatchEnvelopes } from './dispatch.js';
import { finalizeMessage } from './acknowledgment.js';

/** Dependencies shared by every handler invocation. None of them hold per-message state. */
export interface MessageHandlerDeps {
  processor: MessageProcessor;
  sender: EventSender;
  stats: AdapterStats;
  log: Logger;
}

/** Handles one broker message end to end. Rejects when the message was not completed. */
export type MessageHandler = (message: ReceivedMessage | null | undefined) => Promise<void>;

/**
 * Builds the per-message pipeline: process → dispatch → finalize.
 *
 * A processing error ends handling before anything is sent and the message
 * is never finalized, so the broker redelivers it. Once processing succeeded,
 * finalization always runs, whatever the dispatch outcome.
 */
export function createMessageHandler(deps: MessageHandlerDeps): MessageHandler {
  const { processor, sender, stats, log } = deps;

  return async (message) => {
    if (!message) return;

    stats.messageReceived();

    let envelopes: EventEnvelope[];
    try {
      envelopes = processor.process(message);
    } catch (err: unknown) {
      stats.messageSettled('processing_error');
      throw err instanceof ProcessingError ? err : new ProcessingError(message.id, toError(err));
    }

    log.debug({ message_id: message.id, eventCount: envelopes.length }, 'Message processed');

    const failures = await dispatchEnvelopes(envelopes, sender, log);
    stats.eventsDispatched(envelopes.length - failures.length, failures.length);

    try {
      await finalizeMessage(message, failures);
    } catch (err: unknown) {
      stats.messageSettled(err instanceof DeliveryError ? 'delivery_error' : 'acknowledgment_error');
      throw err;
    }

    stats.messageSettled('completed');
    log.debug({ message_id: message.id }, 'Message completed');
  };
}
