import { describe, it, expect } from 'vitest';
import { AdapterStats } from '../../src/application/stats.js';

describe('AdapterStats', () => {
  it('starts at zero', () => {
    const stats = new AdapterStats(() => new Date('2026-02-18T12:00:00Z'));

    expect(stats.snapshot()).toEqual({
      started_at: '2026-02-18T12:00:00.000Z',
      messages_received: 0,
      messages_completed: 0,
      processing_errors: 0,
      delivery_errors: 0,
      acknowledgment_errors: 0,
      events_sent: 0,
      events_failed: 0,
    });
  });

  it('accumulates dispatch counts and settlement outcomes', () => {
    const stats = new AdapterStats();

    stats.messageReceived();
    stats.messageReceived();
    stats.eventsDispatched(3, 1);
    stats.eventsDispatched(2, 0);
    stats.messageSettled('completed');
    stats.messageSettled('acknowledgment_error');

    expect(stats.snapshot()).toMatchObject({
      messages_received: 2,
      messages_completed: 1,
      acknowledgment_errors: 1,
      events_sent: 5,
      events_failed: 1,
    });
  });
});
