export {
  connectFirst,
  connectionStringFromConfig,
  serviceBusAuthStrategies,
  serviceBusClientFactory,
} from './auth.js';
export type { AuthStrategy, ServiceBusClientFactory } from './auth.js';
export { createEntityReceiver, toReceivedMessage } from './receiver.js';
export type { SubscribableReceiver } from './receiver.js';
export { createErrorReporter } from './error-reporter.js';
export type { ErrorReporter } from './error-reporter.js';
export { startListener } from './listener.js';
export type { ListenerOptions } from './listener.js';
