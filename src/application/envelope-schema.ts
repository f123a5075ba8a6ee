import { z } from 'zod';
import type { EventEnvelope, ValidationFailure } from '../domain/index.js';

/**
 * Zod schema for a CloudEvents 1.0 envelope.
 *
 * - `source` is a URI-reference, so a non-empty string is enough.
 * - `dataschema` must be an absolute URI when present.
 * - `time` accepts any RFC 3339 timestamp, with or without offset.
 */
const envelopeSchema = z.object({
  specversion: z.literal('1.0'),
  id: z.string().min(1),
  source: z.string().min(1),
  type: z.string().min(1),
  subject: z.string().min(1).optional(),
  time: z.string().datetime({ offset: true, message: 'Must be an RFC 3339 timestamp' }).optional(),
  datacontenttype: z.string().min(1).optional(),
  dataschema: z.string().url().optional(),
  data: z.unknown().optional(),
});

/**
 * Validates an envelope in a single pass.
 * Returns the set of failing attribute names, or `null` when the envelope is valid.
 */
export function validateEnvelope(envelope: EventEnvelope): ValidationFailure | null {
  const result = envelopeSchema.safeParse(envelope);
  if (result.success) return null;

  const attributes = new Set<string>();
  for (const issue of result.error.issues) {
    const attr = issue.path[0];
    if (typeof attr === 'string') attributes.add(attr);
  }
  return attributes;
}
