import type { ErrorBatch, ReceivedMessage } from '../domain/index.js';
import { AcknowledgmentError, DeliveryError, toError } from '../domain/index.js';

/**
 * Settles a message after its envelopes were dispatched.
 *
 * - No message: nothing to do.
 * - No failures: the message is completed on the broker. A rejected
 *   completion surfaces as `AcknowledgmentError`.
 * - Any failure: the message is left locked so the broker redelivers it once
 *   the lock expires, and a `DeliveryError` listing every failure is thrown.
 */
export async function finalizeMessage(
  message: ReceivedMessage | null | undefined,
  failures: ErrorBatch,
): Promise<void> {
  if (!message) return;

  if (failures.length > 0) {
    throw new DeliveryError(failures);
  }

  try {
    await message.complete();
  } catch (err: unknown) {
    throw new AcknowledgmentError(message.id, toError(err));
  }
}
