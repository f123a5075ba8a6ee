import type { EventEnvelope, ReceivedMessage } from '../../domain/index.js';
import { ProcessingError } from '../../domain/index.js';
import { decodeBody } from './body.js';
import type { MessageProcessor, MessageProcessorOptions } from './types.js';
import { SERVICEBUS_MESSAGE_EVENT_TYPE } from './types.js';

/** Payload of an envelope produced by the default processor. */
export interface ServiceBusMessageData {
  messageId: string;
  body: unknown;
  bodyEncoding?: 'base64';
  contentType?: string;
  correlationId?: string;
  subject?: string;
  applicationProperties?: Record<string, unknown>;
  enqueuedTime?: string;
  deliveryCount?: number;
}

/**
 * Maps each message onto a single envelope.
 *
 * The envelope ID is the broker message ID, its data is the decoded body
 * together with the message metadata.
 */
export class DefaultMessageProcessor implements MessageProcessor {
  private readonly source: string;
  private readonly now: () => Date;

  constructor(options: MessageProcessorOptions) {
    this.source = options.source;
    this.now = options.now ?? (() => new Date());
  }

  process(message: ReceivedMessage): EventEnvelope[] {
    if (!message.id) {
      throw new ProcessingError(message.id, new Error('message has no ID'));
    }

    const data: ServiceBusMessageData = { messageId: message.id, body: null };

    const decoded = decodeBody(message.body);
    switch (decoded.kind) {
      case 'json':
      case 'text':
        data.body = decoded.value;
        break;
      case 'binary':
        data.body = decoded.base64;
        data.bodyEncoding = 'base64';
        break;
    }

    if (message.contentType) data.contentType = message.contentType;
    if (message.correlationId) data.correlationId = message.correlationId;
    if (message.subject) data.subject = message.subject;
    if (message.applicationProperties) data.applicationProperties = { ...message.applicationProperties };
    if (message.enqueuedTime) data.enqueuedTime = message.enqueuedTime.toISOString();
    if (message.deliveryCount !== undefined) data.deliveryCount = message.deliveryCount;

    return [
      {
        specversion: '1.0',
        id: message.id,
        source: this.source,
        type: SERVICEBUS_MESSAGE_EVENT_TYPE,
        subject: message.subject || undefined,
        time: (message.enqueuedTime ?? this.now()).toISOString(),
        datacontenttype: 'application/json',
        data,
      },
    ];
  }
}
