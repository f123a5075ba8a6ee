/** Point-in-time view of the adapter counters. */
export interface AdapterStatsSnapshot {
  started_at: string;
  messages_received: number;
  messages_completed: number;
  processing_errors: number;
  delivery_errors: number;
  acknowledgment_errors: number;
  events_sent: number;
  events_failed: number;
}

export type MessageOutcome = 'completed' | 'processing_error' | 'delivery_error' | 'acknowledgment_error';

/**
 * In-process counters for the message pipeline.
 *
 * Handlers only ever increment, and Node.js runs them on a single thread,
 * so concurrent handlers never observe a partial update.
 */
export class AdapterStats {
  private readonly startedAt: Date;
  private received = 0;
  private completed = 0;
  private processingErrors = 0;
  private deliveryErrors = 0;
  private acknowledgmentErrors = 0;
  private sent = 0;
  private failed = 0;

  constructor(now: () => Date = () => new Date()) {
    this.startedAt = now();
  }

  messageReceived(): void {
    this.received++;
  }

  eventsDispatched(sent: number, failed: number): void {
    this.sent += sent;
    this.failed += failed;
  }

  messageSettled(outcome: MessageOutcome): void {
    switch (outcome) {
      case 'completed':
        this.completed++;
        break;
      case 'processing_error':
        this.processingErrors++;
        break;
      case 'delivery_error':
        this.deliveryErrors++;
        break;
      case 'acknowledgment_error':
        this.acknowledgmentErrors++;
        break;
    }
  }

  snapshot(): AdapterStatsSnapshot {
    return {
      started_at: this.startedAt.toISOString(),
      messages_received: this.received,
      messages_completed: this.completed,
      processing_errors: this.processingErrors,
      delivery_errors: this.deliveryErrors,
      acknowledgment_errors: this.acknowledgmentErrors,
      events_sent: this.sent,
      events_failed: this.failed,
    };
  }
}
