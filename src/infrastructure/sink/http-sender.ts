import { CloudEvent, HTTP } from 'cloudevents';
import type { EventEnvelope, EventSender, SendResult } from '../../domain/index.js';
import { toError } from '../../domain/index.js';
import type { CloudEventOverrides } from '../config/index.js';

export interface HttpEventSenderOptions {
  sinkUrl: string;
  timeoutMs: number;
  overrides?: CloudEventOverrides | undefined;
  fetchFn?: typeof fetch | undefined;
}

/** Builds the CloudEvent that goes on the wire, with override extensions applied. */
export function toCloudEvent(envelope: EventEnvelope, overrides?: CloudEventOverrides): CloudEvent<unknown> {
  return new CloudEvent<unknown>(
    {
      ...overrides?.extensions,
      specversion: envelope.specversion,
      id: envelope.id,
      source: envelope.source,
      type: envelope.type,
      subject: envelope.subject,
      time: envelope.time,
      datacontenttype: envelope.datacontenttype,
      dataschema: envelope.dataschema,
      data: envelope.data,
    },
    false,
  );
}

const JSON_CONTENT_TYPE = /^application\/([\w.+-]+\+)?json\b/i;

/**
 * A JSON content type is always serialized as JSON: the binding passes a
 * string datum through unquoted, which would not parse on the sink side.
 */
function encodeBody(envelope: EventEnvelope, encoded: unknown): string | Uint8Array {
  const { data, datacontenttype } = envelope;
  if (datacontenttype && JSON_CONTENT_TYPE.test(datacontenttype) && data !== undefined && !(data instanceof Uint8Array)) {
    return JSON.stringify(data);
  }
  if (typeof encoded === 'string' || encoded instanceof Uint8Array) return encoded;
  return JSON.stringify(encoded);
}

/**
 * Sends envelopes to an HTTP sink in CloudEvents binary content mode.
 *
 * A 2xx response is an ACK. Any other status, a timeout or a transport
 * failure is reported as a NACK carrying the reason. Nothing is retried here.
 */
export function createHttpEventSender(options: HttpEventSenderOptions): EventSender {
  const fetchFn = options.fetchFn ?? fetch;

  return {
    async send(envelope: EventEnvelope): Promise<SendResult> {
      const message = HTTP.binary(toCloudEvent(envelope, options.overrides));

      const headers: Record<string, string> = {};
      for (const [name, value] of Object.entries(message.headers)) {
        if (typeof value === 'string') headers[name] = value;
        else if (Array.isArray(value)) headers[name] = value.join(', ');
      }

      try {
        const response = await fetchFn(options.sinkUrl, {
          method: 'POST',
          headers,
          body: encodeBody(envelope, message.body),
          signal: AbortSignal.timeout(options.timeoutMs),
        });
        // The sink's reply is not read; release the connection.
        await response.body?.cancel();

        if (!response.ok) {
          return { ack: false, error: new Error(`sink responded with status ${response.status}`) };
        }
        return { ack: true };
      } catch (err: unknown) {
        return { ack: false, error: toError(err) };
      }
    },
  };
}
