import { ConfigurationError } from '../../domain/index.js';
import { DefaultMessageProcessor } from './default-processor.js';
import { SplitMessageProcessor } from './split-processor.js';
import type { MessageProcessor, MessageProcessorOptions } from './types.js';

type MessageProcessorFactory = (options: MessageProcessorOptions) => MessageProcessor;

const processors = {
  default: (options) => new DefaultMessageProcessor(options),
  split: (options) => new SplitMessageProcessor(options),
} satisfies Record<string, MessageProcessorFactory>;

export type MessageProcessorName = keyof typeof processors;

const MESSAGE_PROCESSOR_NAMES: readonly string[] = Object.keys(processors);

function isMessageProcessorName(name: string): name is MessageProcessorName {
  return Object.hasOwn(processors, name);
}

/**
 * Returns the message processor registered under `name`.
 * An unknown name is a configuration error, raised before anything is received.
 */
export function createMessageProcessor(name: string, options: MessageProcessorOptions): MessageProcessor {
  if (!isMessageProcessorName(name)) {
    throw new ConfigurationError(
      `unsupported message processor "${name}" (supported: ${MESSAGE_PROCESSOR_NAMES.join(', ')})`,
    );
  }
  return processors[name](options);
}
