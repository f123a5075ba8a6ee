import type { Logger } from 'pino';
import type { EventEnvelope, EventSender, SendFailure, ErrorBatch } from '../domain/index.js';
import { toError } from '../domain/index.js';
import { validateEnvelope } from './envelope-schema.js';
import { sanitizeEnvelope } from './sanitizer.js';

/**
 * Sends the envelopes derived from one message, in order.
 *
 * For each envelope:
 * 1. Validate once. On failure, sanitize once and carry on with the
 *    corrected envelope, whatever its state.
 * 2. Send. Only an ACK from the sender counts as delivered.
 * 3. Record a NACK or a thrown send error and move on to the next envelope.
 *
 * Returns every failure in envelope order; an empty batch means all were delivered.
 */
export async function dispatchEnvelopes(
  envelopes: readonly EventEnvelope[],
  sender: EventSender,
  log: Logger,
): Promise<ErrorBatch> {
  const failures: SendFailure[] = [];

  for (const original of envelopes) {
    let envelope = original;

    const failure = validateEnvelope(envelope);
    if (failure) {
      envelope = sanitizeEnvelope(failure, envelope);
      log.debug(
        { event_id: envelope.id, attributes: [...failure] },
        'Sanitized invalid event attributes',
      );
    }

    let cause: Error | null = null;
    try {
      const result = await sender.send(envelope);
      if (!result.ack) cause = result.error;
    } catch (err: unknown) {
      cause = toError(err);
    }

    if (cause) {
      log.debug({ event_id: envelope.id, err: cause }, 'Event not acknowledged by the sink');
      failures.push({ eventId: envelope.id, cause });
      continue;
    }

    log.debug({ event_id: envelope.id }, 'Event sent');
  }

  return failures;
}
