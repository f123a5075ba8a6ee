import pino from 'pino';
import {
  AdapterStats,
  createMessageHandler,
  createMessageProcessor,
} from './application/index.js';
import { entityPath, parseServiceBusEntityId } from './domain/index.js';
import { loadAdapterConfig } from './infrastructure/config/index.js';
import {
  connectFirst,
  createEntityReceiver,
  createErrorReporter,
  serviceBusAuthStrategies,
  serviceBusClientFactory,
  startListener,
} from './infrastructure/servicebus/index.js';
import { createHttpEventSender } from './infrastructure/sink/index.js';
import { buildHttpServer } from './interfaces/http/index.js';

/**
 * Service Bus source adapter.
 *
 * Receives messages from a queue or topic subscription, turns them into
 * CloudEvents and delivers them to the sink. Messages are completed only
 * after every event derived from them was acknowledged by the sink.
 *
 * Order:
 * 1) Configuration, entity ID and message processor (fail fast)
 * 2) Broker client (SAS first, then AAD)
 * 3) HTTP surface
 * 4) Listen until SIGINT / SIGTERM
 */
const logLevel = process.env['LOG_LEVEL'] ?? 'info';
const log = pino({ level: logLevel });

// Abort controller for graceful shutdown
const ac = new AbortController();

async function main(): Promise<void> {
  // --------------------------------------------------
  // Configuration
  // --------------------------------------------------

  const config = loadAdapterConfig(process.env);
  const entity = parseServiceBusEntityId(config.entityResourceId);
  const processor = createMessageProcessor(config.messageProcessor, { source: config.entityResourceId });

  log.info(
    { entityPath: entityPath(entity), namespace: entity.namespace, processor: config.messageProcessor },
    'Configuration loaded',
  );

  // --------------------------------------------------
  // Service Bus
  // --------------------------------------------------

  const { client, strategy } = connectFirst(
    entity.namespace,
    serviceBusAuthStrategies(config.auth, entity, serviceBusClientFactory),
  );
  log.info({ strategy }, 'Service Bus client created');

  const receiver = createEntityReceiver(client, entity);

  // --------------------------------------------------
  // Pipeline
  // --------------------------------------------------

  const stats = new AdapterStats();
  const sender = createHttpEventSender({
    sinkUrl: config.sink.url,
    timeoutMs: config.sink.timeoutMs,
    overrides: config.sink.overrides,
  });
  const handle = createMessageHandler({ processor, sender, stats, log });

  // --------------------------------------------------
  // HTTP surface
  // --------------------------------------------------

  const http = await buildHttpServer({ stats, logLevel });
  await http.listen({ host: config.metrics.host, port: config.metrics.port });

  // --------------------------------------------------
  // Listen
  // --------------------------------------------------

  try {
    await startListener({
      receiver,
      handle,
      reportError: createErrorReporter(log),
      log,
      signal: ac.signal,
      fullyQualifiedNamespace: client.fullyQualifiedNamespace,
      maxConcurrentCalls: config.maxConcurrentCalls,
    });
  } finally {
    await receiver.close().catch((err: unknown) => log.warn({ err }, 'Failed to close receiver'));
    await client.close().catch((err: unknown) => log.warn({ err }, 'Failed to close Service Bus client'));
    await http.close();
  }
}

// Graceful shutdown on SIGINT / SIGTERM
function shutdown(): void {
  log.info('Shutting down adapter...');
  ac.abort();
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().then(
  () => {
    log.info('Adapter stopped');
    process.exit(0);
  },
  (err: unknown) => {
    log.fatal({ err }, 'Adapter crashed');
    process.exit(1);
  },
);
