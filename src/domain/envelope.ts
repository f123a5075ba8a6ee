/**
 * CloudEvents 1.0 envelope as it leaves the adapter.
 *
 * Produced by a message processor, possibly corrected once by the
 * sanitizer, then handed to the event sender. Never mutated in place.
 */
export interface EventEnvelope {
  readonly specversion: '1.0';
  readonly id: string;
  readonly source: string;
  readonly type: string;
  readonly subject?: string | undefined;
  readonly time?: string | undefined; // RFC 3339
  readonly datacontenttype?: string | undefined;
  readonly dataschema?: string | undefined;
  readonly data?: unknown;
}

/** Names of the envelope attributes that failed validation. */
export type ValidationFailure = ReadonlySet<string>;
