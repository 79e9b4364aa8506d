/**
 * Builders for event templates and common signed events.
 */

import { ENCRYPTED_DIRECT_MESSAGE_KIND, TEXT_NOTE_KIND } from '../constants.js';
import type { KeyManager } from '../keys/KeyManager.js';
import type { CipherVersion, EventTemplate, SignedEvent, Tag } from '../types.js';

/**
 * Named optional fields for createEvent().
 */
export interface EventConfig {
  /** Event kind (default: 1, text note) */
  kind?: number;
  /** Tag entries (default: none) */
  tags?: Tag[];
  /** Content string (default: empty) */
  content?: string;
  /** Unix timestamp in seconds (default: now) */
  created_at?: number;
}

/**
 * Current time as a Unix timestamp in seconds.
 */
export function nowInSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Builds an event template, filling unset fields with their defaults.
 */
export function createEvent(config: EventConfig = {}): EventTemplate {
  return {
    kind: config.kind ?? TEXT_NOTE_KIND,
    created_at: config.created_at ?? nowInSeconds(),
    tags: config.tags?.map((tag) => [...tag]) ?? [],
    content: config.content ?? '',
  };
}

/**
 * Builds and signs a kind:4 encrypted direct message.
 *
 * @param keys - The sender's keys, used for both encryption and signing
 * @param recipientPubkey - The recipient's public key (64-character hex)
 * @param plaintext - Message text
 * @param version - Envelope generation (default: current)
 * @returns A signed event whose content is the encrypted envelope
 */
export function buildEncryptedDirectMessage(
  keys: KeyManager,
  recipientPubkey: string,
  plaintext: string,
  version: CipherVersion = 'current'
): SignedEvent {
  return keys.signEvent(
    createEvent({
      kind: ENCRYPTED_DIRECT_MESSAGE_KIND,
      tags: [['p', recipientPubkey]],
      content: keys.encrypt(recipientPubkey, plaintext, version),
    })
  );
}
