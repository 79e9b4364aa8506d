/**
 * Canonical serialization and content addressing of events.
 *
 * The canonical form is the JSON array
 * `[0, pubkey, created_at, kind, tags, content]` with no whitespace, hashed as
 * UTF-8 with SHA-256. Other implementations of the protocol compute the same
 * identifier from the same fields.
 */

import { sha256 } from '@noble/hashes/sha2';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';
import { InvalidEventError } from '../errors.js';
import type { EventTemplate, UnsignedEvent } from '../types.js';

/**
 * Serializes the signable fields of an event into its canonical form.
 */
export function serializeEvent(event: UnsignedEvent): string {
  return JSON.stringify([
    0,
    event.pubkey,
    event.created_at,
    event.kind,
    event.tags,
    event.content,
  ]);
}

/**
 * Computes the event identifier: lowercase hex SHA-256 of the canonical form.
 */
export function getEventHash(event: UnsignedEvent): string {
  return bytesToHex(sha256(utf8ToBytes(serializeEvent(event))));
}

/**
 * Rejects templates the canonical encoding cannot represent faithfully.
 *
 * @throws {InvalidEventError} If kind or created_at is not a non-negative
 *   safe integer, tags is not an array of string arrays, or content is not a string
 */
export function validateEventTemplate(template: EventTemplate): void {
  if (!Number.isSafeInteger(template.kind) || template.kind < 0) {
    throw new InvalidEventError(`kind must be a non-negative integer, got ${template.kind}`);
  }
  if (!Number.isSafeInteger(template.created_at) || template.created_at < 0) {
    throw new InvalidEventError(
      `created_at must be a non-negative integer, got ${template.created_at}`
    );
  }
  if (
    !Array.isArray(template.tags) ||
    !template.tags.every(
      (tag) => Array.isArray(tag) && tag.every((value) => typeof value === 'string')
    )
  ) {
    throw new InvalidEventError('tags must be an array of string arrays');
  }
  if (typeof template.content !== 'string') {
    throw new InvalidEventError('content must be a string');
  }
}
