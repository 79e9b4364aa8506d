/**
 * Validation of events received from outside the process.
 */

import { z } from 'zod';
import { InvalidEventError } from '../errors.js';
import type { SignedEvent } from '../types.js';

const hex64 = z.string().regex(/^[0-9a-f]{64}$/);
const hex128 = z.string().regex(/^[0-9a-f]{128}$/);
const unsignedInteger = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

/**
 * Shape of a signed event on the wire. Unknown keys are stripped.
 */
export const SignedEventSchema = z.object({
  id: hex64,
  pubkey: hex64,
  created_at: unsignedInteger,
  kind: unsignedInteger,
  tags: z.array(z.array(z.string())),
  content: z.string(),
  sig: hex128,
});

/**
 * Shape of a rumor: an event with identifier and author but no signature.
 */
export const RumorSchema = SignedEventSchema.omit({ sig: true });

/**
 * Parses an untrusted value into a SignedEvent.
 *
 * Only the shape is checked here; use verifyEvent() to check the identifier
 * and signature.
 *
 * @throws {InvalidEventError} If a field is missing or has the wrong type
 */
export function parseEvent(input: unknown): SignedEvent {
  const result = SignedEventSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue?.path.join('.') || 'event';
    throw new InvalidEventError(`Invalid event: ${path}: ${issue?.message ?? 'malformed'}`);
  }
  return result.data;
}

/**
 * Non-throwing shape check for signed events.
 */
export function isSignedEvent(input: unknown): input is SignedEvent {
  return SignedEventSchema.safeParse(input).success;
}
