import type { EventEnvelope } from './envelope.js';

/** Outcome of a single send: ACK from the sink, or the reason it was not acknowledged. */
export type SendResult =
  | { readonly ack: true }
  | { readonly ack: false; readonly error: Error };

/** Delivers envelopes to the event sink. Shared by all concurrent handlers. */
export interface EventSender {
  send(envelope: EventEnvelope): Promise<SendResult>;
}

/** A failed delivery of one envelope. */
export interface SendFailure {
  readonly eventId: string;
  readonly cause: Error;
}

/** Ordered send failures collected while dispatching one message's envelopes. */
export type ErrorBatch = readonly SendFailure[];
