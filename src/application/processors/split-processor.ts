import type { EventEnvelope, ReceivedMessage } from '../../domain/index.js';
import { ProcessingError } from '../../domain/index.js';
import { decodeBody } from './body.js';
import type { MessageProcessor, MessageProcessorOptions } from './types.js';
import { SERVICEBUS_MESSAGE_EVENT_TYPE } from './types.js';

/**
 * Splits a message whose body is a JSON array into one envelope per element.
 *
 * Element `i` of message `m` becomes envelope `m-i`. An empty array yields
 * no envelopes, anything other than an array is a processing error.
 */
export class SplitMessageProcessor implements MessageProcessor {
  private readonly source: string;
  private readonly now: () => Date;

  constructor(options: MessageProcessorOptions) {
    this.source = options.source;
    this.now = options.now ?? (() => new Date());
  }

  process(message: ReceivedMessage): EventEnvelope[] {
    const messageId = message.id;
    if (!messageId) {
      throw new ProcessingError(messageId, new Error('message has no ID'));
    }

    const decoded = decodeBody(message.body);
    if (decoded.kind !== 'json' || !Array.isArray(decoded.value)) {
      throw new ProcessingError(messageId, new Error('message body is not a JSON array'));
    }

    const time = (message.enqueuedTime ?? this.now()).toISOString();
    const items: unknown[] = decoded.value;

    return items.map((item, index): EventEnvelope => ({
      specversion: '1.0',
      id: `${messageId}-${index}`,
      source: this.source,
      type: SERVICEBUS_MESSAGE_EVENT_TYPE,
      subject: message.subject || undefined,
      time,
      datacontenttype: 'application/json',
      data: item,
    }));
  }
}
