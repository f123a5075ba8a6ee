export { validateEnvelope } from './envelope-schema.js';
export { sanitizeEnvelope } from './sanitizer.js';
export { dispatchEnvelopes } from './dispatch.js';
export { finalizeMessage } from './acknowledgment.js';
export { createMessageHandler } from './message-handler.js';
export type { MessageHandler, MessageHandlerDeps } from './message-handler.js';
export { AdapterStats } from './stats.js';
export type { AdapterStatsSnapshot, MessageOutcome } from './stats.js';
export {
  createMessageProcessor,
  DefaultMessageProcessor,
  SplitMessageProcessor,
  SERVICEBUS_MESSAGE_EVENT_TYPE,
} from './processors/index.js';
export type { MessageProcessor, MessageProcessorOptions, MessageProcessorName } from './processors/index.js';
