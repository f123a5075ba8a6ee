import { describe, it, expect } from 'vitest';
import type { ProcessErrorArgs } from '@azure/service-bus';
import { createErrorReporter } from '../../src/infrastructure/servicebus/error-reporter.js';
import { AcknowledgmentError, DeliveryError, ProcessingError } from '../../src/domain/index.js';
import { fakeLogger } from '../helpers.js';

function args(error: Error, errorSource: ProcessErrorArgs['errorSource']): ProcessErrorArgs {
  return {
    error,
    errorSource,
    entityPath: 't1/Subscriptions/s1',
    fullyQualifiedNamespace: 'ns1.servicebus.windows.net',
    identifier: 'receiver-1',
  };
}

describe('createErrorReporter', () => {
  it('logs processing errors with the message ID', () => {
    const log = fakeLogger();
    const error = new ProcessingError('m1', new Error('message body is not a JSON array'));

    createErrorReporter(log)(args(error, 'processMessageCallback'));

    expect(log.error).toHaveBeenCalledWith(
      { err: error, errorSource: 'processMessageCallback', entityPath: 't1/Subscriptions/s1', message_id: 'm1' },
      'Message handling failed',
    );
  });

  it('logs the IDs of events the sink did not acknowledge', () => {
    const log = fakeLogger();
    const error = new DeliveryError([
      { eventId: 'e1', cause: new Error('503') },
      { eventId: 'e2', cause: new Error('timeout') },
    ]);

    createErrorReporter(log)(args(error, 'processMessageCallback'));

    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ failedEventIds: ['e1', 'e2'] }),
      'Message handling failed',
    );
  });

  it('logs acknowledgment errors with the message ID', () => {
    const log = fakeLogger();
    const error = new AcknowledgmentError('m4', new Error('lock lost'));

    createErrorReporter(log)(args(error, 'processMessageCallback'));

    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ message_id: 'm4' }),
      'Message handling failed',
    );
  });

  it('logs receiver errors', () => {
    const log = fakeLogger();
    const error = new Error('connection reset');

    createErrorReporter(log)(args(error, 'receive'));

    expect(log.error).toHaveBeenCalledWith(
      { err: error, errorSource: 'receive', entityPath: 't1/Subscriptions/s1' },
      'Service Bus receiver error',
    );
  });
});
