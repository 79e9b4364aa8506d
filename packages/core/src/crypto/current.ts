/**
 * Current-generation payload encryption (NIP-44 version 2 layout).
 *
 * Envelope, base64 encoded:
 *
 * | offset     | length | field                                   |
 * |------------|--------|-----------------------------------------|
 * | 0          | 1      | version byte, always 0x02               |
 * | 1          | 32     | random nonce                            |
 * | 33         | n      | ChaCha20 ciphertext of padded plaintext |
 * | 33 + n     | 32     | HMAC-SHA256 over nonce ‖ ciphertext     |
 *
 * The padded plaintext is a big-endian u16 length prefix, the plaintext, then
 * zero bytes up to calcPaddedLength().
 */

import { chacha20 } from '@noble/ciphers/chacha';
import { equalBytes } from '@noble/ciphers/utils';
import { expand } from '@noble/hashes/hkdf';
import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha2';
import { concatBytes, randomBytes } from '@noble/hashes/utils';
import { base64 } from '@scure/base';
import { CipherError, DecryptionFailedError } from '../errors.js';

export const CURRENT_VERSION_BYTE = 2;

const NONCE_LENGTH = 32;
const MAC_LENGTH = 32;
const MIN_PLAINTEXT_LENGTH = 1;
const MAX_PLAINTEXT_LENGTH = 65535;
const MIN_ENVELOPE_LENGTH = 132;
const MAX_ENVELOPE_LENGTH = 87472;
const MIN_DECODED_LENGTH = 99;
const MAX_DECODED_LENGTH = 65603;

interface MessageKeys {
  chachaKey: Uint8Array;
  chachaNonce: Uint8Array;
  hmacKey: Uint8Array;
}

function getMessageKeys(conversationKey: Uint8Array, nonce: Uint8Array): MessageKeys {
  const keys = expand(sha256, conversationKey, nonce, 76);
  return {
    chachaKey: keys.subarray(0, 32),
    chachaNonce: keys.subarray(32, 44),
    hmacKey: keys.subarray(44, 76),
  };
}

/**
 * Length of the padded plaintext (without the 2-byte prefix) for a plaintext
 * of `length` bytes: 32 bytes minimum, then power-of-two chunks.
 */
export function calcPaddedLength(length: number): number {
  if (length <= 32) return 32;
  const nextPower = 1 << (Math.floor(Math.log2(length - 1)) + 1);
  const chunk = nextPower <= 256 ? 32 : nextPower / 8;
  return chunk * (Math.floor((length - 1) / chunk) + 1);
}

function pad(plaintext: Uint8Array): Uint8Array {
  const length = plaintext.length;
  if (length < MIN_PLAINTEXT_LENGTH || length > MAX_PLAINTEXT_LENGTH) {
    throw new CipherError(
      `plaintext must be between ${MIN_PLAINTEXT_LENGTH} and ${MAX_PLAINTEXT_LENGTH} bytes, got ${length}`,
      'INVALID_PLAINTEXT'
    );
  }
  const padded = new Uint8Array(2 + calcPaddedLength(length));
  new DataView(padded.buffer).setUint16(0, length);
  padded.set(plaintext, 2);
  return padded;
}

function unpad(padded: Uint8Array): Uint8Array | undefined {
  if (padded.length < 2) return undefined;
  const length = new DataView(padded.buffer, padded.byteOffset, 2).getUint16(0);
  if (
    length < MIN_PLAINTEXT_LENGTH ||
    padded.length !== 2 + calcPaddedLength(length)
  ) {
    return undefined;
  }
  return padded.slice(2, 2 + length);
}

function computeMac(hmacKey: Uint8Array, nonce: Uint8Array, ciphertext: Uint8Array): Uint8Array {
  return hmac(sha256, hmacKey, concatBytes(nonce, ciphertext));
}

/**
 * Encrypts `plaintext` under a 32-byte conversation key.
 *
 * @param nonce - Override for the random 32-byte nonce (test vectors only)
 * @throws {CipherError} If the plaintext is empty or longer than 65535 bytes
 */
export function encryptCurrent(
  conversationKey: Uint8Array,
  plaintext: Uint8Array,
  nonce: Uint8Array = randomBytes(NONCE_LENGTH)
): string {
  const { chachaKey, chachaNonce, hmacKey } = getMessageKeys(conversationKey, nonce);
  const ciphertext = chacha20(chachaKey, chachaNonce, pad(plaintext));
  const mac = computeMac(hmacKey, nonce, ciphertext);
  return base64.encode(
    concatBytes(new Uint8Array([CURRENT_VERSION_BYTE]), nonce, ciphertext, mac)
  );
}

/**
 * Decrypts a current-generation envelope.
 *
 * @throws {DecryptionFailedError} On any malformed, unsupported or tampered envelope
 */
export function decryptCurrent(conversationKey: Uint8Array, envelope: string): Uint8Array {
  // '#' marks a future, non-base64 encoding
  if (
    envelope.length < MIN_ENVELOPE_LENGTH ||
    envelope.length > MAX_ENVELOPE_LENGTH ||
    envelope.startsWith('#')
  ) {
    throw new DecryptionFailedError();
  }

  let data: Uint8Array;
  try {
    data = base64.decode(envelope);
  } catch {
    throw new DecryptionFailedError();
  }
  if (
    data.length < MIN_DECODED_LENGTH ||
    data.length > MAX_DECODED_LENGTH ||
    data[0] !== CURRENT_VERSION_BYTE
  ) {
    throw new DecryptionFailedError();
  }

  const nonce = data.subarray(1, 1 + NONCE_LENGTH);
  const ciphertext = data.subarray(1 + NONCE_LENGTH, data.length - MAC_LENGTH);
  const mac = data.subarray(data.length - MAC_LENGTH);

  const { chachaKey, chachaNonce, hmacKey } = getMessageKeys(conversationKey, nonce);
  if (!equalBytes(computeMac(hmacKey, nonce, ciphertext), mac)) {
    throw new DecryptionFailedError();
  }

  const plaintext = unpad(chacha20(chachaKey, chachaNonce, ciphertext));
  if (!plaintext) {
    throw new DecryptionFailedError();
  }
  return plaintext;
}
