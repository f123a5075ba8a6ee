import type { SendFailure } from './sender.js';

/** Normalizes anything thrown into an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Invalid or unusable startup configuration. The adapter must not start
 * listening once one of these is raised.
 */
export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';
}

/** No authentication strategy could produce a broker client. */
export class AuthenticationError extends Error {
  override readonly name = 'AuthenticationError';

  constructor(
    readonly namespace: string,
    readonly attempts: ReadonlyArray<{ readonly strategy: string; readonly error: Error }>,
  ) {
    super(
      `no usable authentication method for Service Bus namespace "${namespace}": ` +
        attempts.map((a) => `${a.strategy}: ${a.error.message}`).join('; '),
    );
  }
}

/** A message processor could not interpret a broker message. */
export class ProcessingError extends Error {
  override readonly name = 'ProcessingError';

  constructor(
    readonly messageId: string | undefined,
    cause: Error,
  ) {
    super(`processing Service Bus message with ID ${messageId ?? '<none>'}: ${cause.message}`, { cause });
  }
}

/** One or more envelopes derived from a message were not acknowledged by the sink. */
export class DeliveryError extends Error {
  override readonly name = 'DeliveryError';

  constructor(readonly failures: readonly SendFailure[]) {
    super(
      'sending events to the sink: ' +
        failures.map((f) => `failed to send event with ID ${f.eventId}: ${f.cause.message}`).join('; '),
    );
  }
}

/** The broker rejected the completion of a message. */
export class AcknowledgmentError extends Error {
  override readonly name = 'AcknowledgmentError';

  constructor(
    readonly messageId: string | undefined,
    cause: Error,
  ) {
    super(`completing Service Bus message with ID ${messageId ?? '<none>'}: ${cause.message}`, { cause });
  }
}
