import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  ProcessingError,
} from '../../src/domain/index.js';
import {
  createMessageProcessor,
  decodeBody,
  DefaultMessageProcessor,
  SplitMessageProcessor,
  SERVICEBUS_MESSAGE_EVENT_TYPE,
} from '../../src/application/processors/index.js';
import { FIXED_TIME, QUEUE_ID, makeMessage } from '../helpers.js';

const FALLBACK_TIME = new Date('2026-03-01T00:00:00Z');

// ── decodeBody ───────────────────────────────────────────────

describe('decodeBody', () => {
  it('parses JSON from a Buffer', () => {
    expect(decodeBody(Buffer.from('{"x":1}'))).toEqual({ kind: 'json', value: { x: 1 } });
  });

  it('keeps UTF-8 text that is not JSON', () => {
    expect(decodeBody(Buffer.from('hello world'))).toEqual({ kind: 'text', value: 'hello world' });
  });

  it('base64-encodes bytes that are not UTF-8', () => {
    expect(decodeBody(Buffer.from([0xff, 0xfe, 0x00]))).toEqual({ kind: 'binary', base64: '//4A' });
  });

  it('parses JSON strings', () => {
    expect(decodeBody('[1,2]')).toEqual({ kind: 'json', value: [1, 2] });
  });

  it('passes decoded AMQP values through', () => {
    expect(decodeBody({ a: 'b' })).toEqual({ kind: 'json', value: { a: 'b' } });
  });

  it('maps a missing body to null', () => {
    expect(decodeBody(undefined)).toEqual({ kind: 'json', value: null });
  });
});

// ── DefaultMessageProcessor ─────────────────────────────────

describe('DefaultMessageProcessor', () => {
  const processor = new DefaultMessageProcessor({ source: QUEUE_ID, now: () => FALLBACK_TIME });

  it('maps a message onto a single envelope', () => {
    const envelopes = processor.process(makeMessage());

    expect(envelopes).toEqual([
      {
        specversion: '1.0',
        id: 'm1',
        source: QUEUE_ID,
        type: SERVICEBUS_MESSAGE_EVENT_TYPE,
        subject: undefined,
        time: '2026-02-18T12:00:00.000Z',
        datacontenttype: 'application/json',
        data: {
          messageId: 'm1',
          body: { x: 1 },
          enqueuedTime: '2026-02-18T12:00:00.000Z',
        },
      },
    ]);
  });

  it('carries message metadata into the data', () => {
    const [envelope] = processor.process(
      makeMessage({
        contentType: 'application/json',
        correlationId: 'c-42',
        subject: 'orders',
        applicationProperties: { tenant: 'acme', priority: 3 },
        deliveryCount: 2,
      }),
    );

    expect(envelope?.subject).toBe('orders');
    expect(envelope?.data).toEqual({
      messageId: 'm1',
      body: { x: 1 },
      contentType: 'application/json',
      correlationId: 'c-42',
      subject: 'orders',
      applicationProperties: { tenant: 'acme', priority: 3 },
      enqueuedTime: '2026-02-18T12:00:00.000Z',
      deliveryCount: 2,
    });
  });

  it('marks binary bodies as base64', () => {
    const [envelope] = processor.process(makeMessage({ body: Buffer.from([0xff, 0xfe, 0x00]) }));
    expect(envelope?.data).toMatchObject({ body: '//4A', bodyEncoding: 'base64' });
  });

  it('falls back to the clock without an enqueue time', () => {
    const [envelope] = processor.process(makeMessage({ enqueuedTime: undefined }));
    expect(envelope?.time).toBe('2026-03-01T00:00:00.000Z');
  });

  it('is deterministic and leaves the message untouched', () => {
    const message = makeMessage({ applicationProperties: { tenant: 'acme' } });
    const first = processor.process(message);
    const second = processor.process(message);

    expect(second).toEqual(first);
    expect(message.applicationProperties).toEqual({ tenant: 'acme' });
    expect(message.complete).not.toHaveBeenCalled();
  });

  it('rejects a message without ID', () => {
    expect(() => processor.process(makeMessage({ id: undefined }))).toThrow(ProcessingError);
    expect(() => processor.process(makeMessage({ id: undefined }))).toThrow(
      'processing Service Bus message with ID <none>: message has no ID',
    );
  });
});

// ── SplitMessageProcessor ───────────────────────────────────

describe('SplitMessageProcessor', () => {
  const processor = new SplitMessageProcessor({ source: QUEUE_ID });

  it('produces one envelope per array element', () => {
    const envelopes = processor.process(makeMessage({ body: Buffer.from('[{"a":1},{"b":2}]'), subject: 'batch' }));

    expect(envelopes.map((e) => e.id)).toEqual(['m1-0', 'm1-1']);
    expect(envelopes.map((e) => e.data)).toEqual([{ a: 1 }, { b: 2 }]);
    expect(envelopes[1]).toMatchObject({
      source: QUEUE_ID,
      type: SERVICEBUS_MESSAGE_EVENT_TYPE,
      subject: 'batch',
      time: FIXED_TIME.toISOString(),
    });
  });

  it('produces nothing for an empty array', () => {
    expect(processor.process(makeMessage({ body: [] }))).toEqual([]);
  });

  it('rejects a body that is not an array', () => {
    let caught: unknown;
    try {
      processor.process(makeMessage({ id: 'm7', body: Buffer.from('{"x":1}') }));
    } catch (err: unknown) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ProcessingError);
    expect(caught).toMatchObject({
      messageId: 'm7',
      message: 'processing Service Bus message with ID m7: message body is not a JSON array',
    });
  });
});

// ── createMessageProcessor ──────────────────────────────────

describe('createMessageProcessor', () => {
  it('returns the default processor', () => {
    expect(createMessageProcessor('default', { source: QUEUE_ID })).toBeInstanceOf(DefaultMessageProcessor);
  });

  it('returns the split processor', () => {
    expect(createMessageProcessor('split', { source: QUEUE_ID })).toBeInstanceOf(SplitMessageProcessor);
  });

  it('fails fast on an unknown name', () => {
    expect(() => createMessageProcessor('eventgrid', { source: QUEUE_ID })).toThrow(ConfigurationError);
    expect(() => createMessageProcessor('eventgrid', { source: QUEUE_ID })).toThrow(
      'unsupported message processor "eventgrid" (supported: default, split)',
    );
  });

  it('does not resolve inherited property names', () => {
    expect(() => createMessageProcessor('toString', { source: QUEUE_ID })).toThrow(ConfigurationError);
  });
});
