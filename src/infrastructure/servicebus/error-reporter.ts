import type { ProcessErrorArgs } from '@azure/service-bus';
import type { Logger } from 'pino';
import { AcknowledgmentError, DeliveryError, ProcessingError } from '../../domain/index.js';

/** Receives every error the broker client reports while listening. */
export type ErrorReporter = (args: ProcessErrorArgs) => void;

/**
 * Returns a reporter that logs broker-reported errors through `log`.
 *
 * Errors thrown by the message handler come back here with source
 * `processMessageCallback`; the fields of the pipeline error classes are
 * lifted into the log record.
 */
export function createErrorReporter(log: Logger): ErrorReporter {
  return ({ error, errorSource, entityPath }) => {
    const fields: Record<string, unknown> = { err: error, errorSource, entityPath };

    if (error instanceof ProcessingError || error instanceof AcknowledgmentError) {
      fields['message_id'] = error.messageId;
    }
    if (error instanceof DeliveryError) {
      fields['failedEventIds'] = error.failures.map((f) => f.eventId);
    }

    if (errorSource === 'processMessageCallback') {
      log.error(fields, 'Message handling failed');
    } else {
      log.error(fields, 'Service Bus receiver error');
    }
  };
}
