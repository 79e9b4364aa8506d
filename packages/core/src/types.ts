/**
 * Event shapes as they travel between callers, signers and relays.
 */

/** A tag entry, e.g. `["p", "<pubkey hex>", "<relay url>"]`. */
export type Tag = string[];

/**
 * The caller-supplied part of an event, before a key is attached.
 */
export interface EventTemplate {
  kind: number;
  /** Unix timestamp in seconds */
  created_at: number;
  tags: Tag[];
  content: string;
}

/**
 * An event bound to an author but not yet content-addressed or signed.
 */
export interface UnsignedEvent extends EventTemplate {
  /** 32-byte x-only public key, lowercase hex */
  pubkey: string;
}

/**
 * An unsigned event that already carries its identifier. Gift-wrapped rumors
 * travel in this form.
 */
export interface IdentifiedEvent extends UnsignedEvent {
  /** SHA-256 of the canonical form, lowercase hex */
  id: string;
}

/**
 * A signed event. Both `id` and `sig` are present and consistent; no partial
 * state is transmitted.
 */
export interface SignedEvent extends IdentifiedEvent {
  /** 64-byte BIP-340 Schnorr signature over `id`, lowercase hex */
  sig: string;
}

/**
 * Envelope generation used when encrypting a payload.
 *
 * - `legacy`: AES-256-CBC with a random IV, `<base64>?iv=<base64>`
 * - `current`: ChaCha20 + HMAC-SHA256 with a version byte (NIP-44 v2 layout)
 */
export type CipherVersion = 'legacy' | 'current';
