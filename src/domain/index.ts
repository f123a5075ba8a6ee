export type { EventEnvelope, ValidationFailure } from './envelope.js';
export type { ReceivedMessage, MessageProperties } from './message.js';
export type { EventSender, SendResult, SendFailure, ErrorBatch } from './sender.js';
export {
  ConfigurationError,
  AuthenticationError,
  ProcessingError,
  DeliveryError,
  AcknowledgmentError,
  toError,
} from './errors.js';
export {
  parseAzureResourceId,
  parseServiceBusEntityId,
  entityPath,
  namespaceHostname,
} from './resource-id.js';
export type {
  AzureResourceId,
  ServiceBusEntityId,
  ServiceBusQueueId,
  ServiceBusSubscriptionId,
} from './resource-id.js';
