/**
 * Decoded form of a message body.
 *
 * The Service Bus client hands out AMQP value bodies already decoded and
 * data-section bodies as Buffers, so both shapes end up here.
 */
export type DecodedBody =
  | { kind: 'json'; value: unknown }
  | { kind: 'text'; value: string }
  | { kind: 'binary'; base64: string };

const utf8 = new TextDecoder('utf-8', { fatal: true });

function fromText(text: string): DecodedBody {
  try {
    return { kind: 'json', value: JSON.parse(text) as unknown };
  } catch {
    return { kind: 'text', value: text };
  }
}

export function decodeBody(body: unknown): DecodedBody {
  if (body === undefined || body === null) {
    return { kind: 'json', value: null };
  }

  if (typeof body === 'string') {
    return fromText(body);
  }

  if (body instanceof Uint8Array) {
    let text: string;
    try {
      text = utf8.decode(body);
    } catch {
      return { kind: 'binary', base64: Buffer.from(body).toString('base64') };
    }
    return fromText(text);
  }

  return { kind: 'json', value: body };
}
