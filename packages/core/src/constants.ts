/**
 * Nostr event kind constants used by the engine.
 */

/**
 * Short text note (kind 1)
 * Default kind for events built with createEvent().
 */
export const TEXT_NOTE_KIND = 1;

/**
 * Encrypted direct message (kind 4)
 * Content is a legacy or current cipher envelope; the recipient is named in a `p` tag.
 */
export const ENCRYPTED_DIRECT_MESSAGE_KIND = 4;

/**
 * Seal (kind 13)
 * Signed by the real author, content is an encrypted rumor.
 */
export const SEAL_KIND = 13;

/**
 * Private direct message (kind 14)
 * Unsigned rumor carried inside a seal.
 */
export const PRIVATE_DIRECT_MESSAGE_KIND = 14;

/**
 * Gift wrap (kind 1059)
 * Signed by a throwaway key, content is an encrypted seal.
 */
export const GIFT_WRAP_KIND = 1059;

/**
 * Remote signing message (kind 24133)
 * Encrypted request or response between a client and a remote signer.
 */
export const NOSTR_CONNECT_KIND = 24133;

/** Salt for deriving a conversation key from the ECDH x-coordinate. */
export const CONVERSATION_KEY_SALT = 'nip44-v2';

/** Seals and gift wraps backdate created_at by up to this many seconds. */
export const TIMESTAMP_TWEAK_WINDOW = 2 * 24 * 60 * 60;
