import { isServiceBusError } from '@azure/service-bus';
import { toError } from '../../domain/index.js';
import type { Logger } from 'pino';
import type { MessageHandler } from '../../application/index.js';
import type { SubscribableReceiver } from './receiver.js';
import { toReceivedMessage } from './receiver.js';
import type { ErrorReporter } from './error-reporter.js';

/** Receive errors after which retrying the link cannot succeed. */
const TERMINAL_ERROR_CODES: ReadonlySet<string> = new Set([
  'MessagingEntityNotFound',
  'MessagingEntityDisabled',
  'UnauthorizedAccess',
]);

export interface ListenerOptions {
  receiver: SubscribableReceiver;
  handle: MessageHandler;
  reportError: ErrorReporter;
  log: Logger;
  signal: AbortSignal;
  /** Host name of the namespace, reported alongside handler errors. */
  fullyQualifiedNamespace: string;
  maxConcurrentCalls?: number | undefined;
}

/**
 * Receives messages until `signal` aborts or the receiver fails for good.
 *
 * Settlement is left to the message handler (`autoCompleteMessages: false`).
 * A handler rejection is reported through `reportError` and never reaches
 * the broker client, which would abandon the message. The message stays
 * locked until its lock expires and the broker redelivers it. Per-message
 * errors never stop the listener.
 *
 * Resolves once the subscription is closed after `signal` aborts. Rejects
 * with the broker error when the receive link reports a terminal condition.
 */
export function startListener(options: ListenerOptions): Promise<void> {
  const { receiver, handle, reportError, log, signal } = options;

  return new Promise<void>((resolve, reject) => {
    let stopped = false;

    const subscription = receiver.subscribe(
      {
        processMessage: async (message) => {
          try {
            await handle(toReceivedMessage(message, receiver));
          } catch (err: unknown) {
            reportError({
              error: toError(err),
              errorSource: 'processMessageCallback',
              entityPath: receiver.entityPath,
              fullyQualifiedNamespace: options.fullyQualifiedNamespace,
              identifier: receiver.identifier,
            });
          }
        },
        processError: async (args) => {
          reportError(args);
          if (
            args.errorSource !== 'processMessageCallback' &&
            isServiceBusError(args.error) &&
            TERMINAL_ERROR_CODES.has(args.error.code)
          ) {
            stop(args.error);
          }
        },
      },
      {
        autoCompleteMessages: false,
        maxConcurrentCalls: options.maxConcurrentCalls ?? 1,
      },
    );

    log.info('Listening for messages');

    function stop(reason?: Error): void {
      if (stopped) return;
      stopped = true;
      signal.removeEventListener('abort', onAbort);

      subscription.close().then(
        () => {
          log.info('Listener stopped');
          if (reason) reject(reason);
          else resolve();
        },
        (err: unknown) => reject(reason ?? err),
      );
    }

    function onAbort(): void {
      stop();
    }

    if (signal.aborted) {
      stop();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
}
