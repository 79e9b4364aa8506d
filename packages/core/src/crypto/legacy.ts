/**
 * Legacy payload encryption: AES-256-CBC with PKCS#7 padding and a random IV,
 * framed as `<base64 ciphertext>?iv=<base64 iv>`.
 */

import { cbc } from '@noble/ciphers/aes';
import { randomBytes } from '@noble/hashes/utils';
import { base64 } from '@scure/base';
import { DecryptionFailedError } from '../errors.js';

export const LEGACY_IV_SEPARATOR = '?iv=';

const IV_LENGTH = 16;
const BLOCK_LENGTH = 16;

/**
 * Encrypts `plaintext` under a 32-byte key.
 *
 * @param iv - Override for the random 16-byte IV (test vectors only)
 */
export function encryptLegacy(
  key: Uint8Array,
  plaintext: Uint8Array,
  iv: Uint8Array = randomBytes(IV_LENGTH)
): string {
  const ciphertext = cbc(key, iv).encrypt(plaintext);
  return `${base64.encode(ciphertext)}${LEGACY_IV_SEPARATOR}${base64.encode(iv)}`;
}

/**
 * Decrypts a legacy envelope.
 *
 * @throws {DecryptionFailedError} On bad framing, bad base64, wrong lengths or invalid padding
 */
export function decryptLegacy(key: Uint8Array, envelope: string): Uint8Array {
  const parts = envelope.split(LEGACY_IV_SEPARATOR);
  if (parts.length !== 2) {
    throw new DecryptionFailedError();
  }
  const [encodedCiphertext = '', encodedIv = ''] = parts;

  let ciphertext: Uint8Array;
  let iv: Uint8Array;
  try {
    ciphertext = base64.decode(encodedCiphertext);
    iv = base64.decode(encodedIv);
  } catch {
    throw new DecryptionFailedError();
  }
  if (
    iv.length !== IV_LENGTH ||
    ciphertext.length === 0 ||
    ciphertext.length % BLOCK_LENGTH !== 0
  ) {
    throw new DecryptionFailedError();
  }

  try {
    return cbc(key, iv).decrypt(ciphertext);
  } catch {
    throw new DecryptionFailedError();
  }
}
