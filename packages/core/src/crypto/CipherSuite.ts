/**
 * Versioned symmetric encryption of opaque payloads.
 *
 * Keys come from KeyManager.sharedSecret() (already passed through a KDF).
 * The suite never interprets plaintext.
 */

import { CipherError, DecryptionFailedError } from '../errors.js';
import type { CipherVersion } from '../types.js';
import { decryptCurrent, encryptCurrent } from './current.js';
import { decryptLegacy, encryptLegacy, LEGACY_IV_SEPARATOR } from './legacy.js';

const KEY_LENGTH = 32;

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

function assertKey(key: Uint8Array): void {
  if (key.length !== KEY_LENGTH) {
    throw new CipherError(`key must be ${KEY_LENGTH} bytes, got ${key.length}`, 'INVALID_KEY_LENGTH');
  }
}

/**
 * Identifies the envelope generation from its framing. Does not validate the
 * envelope.
 */
export function detectVersion(envelope: string): CipherVersion {
  return envelope.includes(LEGACY_IV_SEPARATOR) ? 'legacy' : 'current';
}

/**
 * Encrypts `plaintext` into an envelope string.
 *
 * @throws {CipherError} If the key is not 32 bytes, or (current version) the
 *   plaintext is empty or longer than 65535 bytes
 */
export function encrypt(
  key: Uint8Array,
  plaintext: Uint8Array,
  version: CipherVersion = 'current'
): string {
  assertKey(key);
  return version === 'legacy' ? encryptLegacy(key, plaintext) : encryptCurrent(key, plaintext);
}

/**
 * Decrypts an envelope produced by encrypt() or by another implementation of
 * either generation.
 *
 * @throws {DecryptionFailedError} On any failure, without saying which check failed
 */
export function decrypt(key: Uint8Array, envelope: string): Uint8Array {
  assertKey(key);
  return detectVersion(envelope) === 'legacy'
    ? decryptLegacy(key, envelope)
    : decryptCurrent(key, envelope);
}

/**
 * UTF-8 convenience wrapper around encrypt().
 */
export function encryptText(key: Uint8Array, plaintext: string, version?: CipherVersion): string {
  return encrypt(key, utf8Encoder.encode(plaintext), version);
}

/**
 * UTF-8 convenience wrapper around decrypt(). Plaintext that is not valid
 * UTF-8 is reported as a failed decryption.
 */
export function decryptText(key: Uint8Array, envelope: string): string {
  const plaintext = decrypt(key, envelope);
  try {
    return utf8Decoder.decode(plaintext);
  } catch {
    throw new DecryptionFailedError();
  }
}
