export { createMessageProcessor } from './registry.js';
export type { MessageProcessorName } from './registry.js';
export { DefaultMessageProcessor } from './default-processor.js';
export type { ServiceBusMessageData } from './default-processor.js';
export { SplitMessageProcessor } from './split-processor.js';
export { decodeBody } from './body.js';
export type { DecodedBody } from './body.js';
export { SERVICEBUS_MESSAGE_EVENT_TYPE } from './types.js';
export type { MessageProcessor, MessageProcessorOptions } from './types.js';
