/** Application-defined properties attached to a broker message. */
export type MessageProperties = Readonly<Record<string, unknown>>;

/**
 * A message delivered by the broker, reduced to what the pipeline reads.
 *
 * `complete()` settles the message on the broker so it is not redelivered.
 * Nothing in the pipeline mutates a received message.
 */
export interface ReceivedMessage {
  readonly id: string | undefined;
  readonly body: unknown;
  readonly contentType?: string | undefined;
  readonly correlationId?: string | undefined;
  readonly subject?: string | undefined;
  readonly applicationProperties?: MessageProperties | undefined;
  readonly enqueuedTime?: Date | undefined;
  readonly deliveryCount?: number | undefined;
  complete(): Promise<void>;
}
