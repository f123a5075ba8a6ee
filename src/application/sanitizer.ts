import type { EventEnvelope, ValidationFailure } from '../domain/index.js';

type EnvelopeFix = (envelope: EventEnvelope) => EventEnvelope;

/**
 * Known fixes, keyed by attribute name.
 *
 * Event Grid deliveries often carry `"dataschema": "#"`, which is not an
 * absolute URI. The attribute is optional, so it is dropped.
 */
const FIXES: Readonly<Record<string, EnvelopeFix>> = {
  dataschema: ({ dataschema: _invalid, ...rest }) => rest,
};

/**
 * Applies the known fix for each failing attribute and returns the
 * corrected envelope. Attributes without a fix are left as they are; the
 * result is not validated again.
 */
export function sanitizeEnvelope(failure: ValidationFailure, envelope: EventEnvelope): EventEnvelope {
  let sanitized = envelope;
  for (const attr of failure) {
    const fix = Object.hasOwn(FIXES, attr) ? FIXES[attr] : undefined;
    if (fix) sanitized = fix(sanitized);
  }
  return sanitized;
}
