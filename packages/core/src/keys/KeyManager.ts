/**
 * Holder of one secp256k1 key pair: signs identifiers, verifies signatures and
 * derives shared secrets with counterparties.
 */

import { schnorr, secp256k1 } from '@noble/curves/secp256k1';
import { extract } from '@noble/hashes/hkdf';
import { sha256 } from '@noble/hashes/sha2';
import { bytesToHex, hexToBytes, randomBytes, utf8ToBytes } from '@noble/hashes/utils';
import { CONVERSATION_KEY_SALT } from '../constants.js';
import { decryptText, encryptText } from '../crypto/CipherSuite.js';
import { InvalidEventError, KeyError } from '../errors.js';
import { getEventHash, validateEventTemplate } from '../events/codec.js';
import type { CipherVersion, EventTemplate, SignedEvent, UnsignedEvent } from '../types.js';
import { normalizePublicKey, verifySignature } from './verify.js';

const SECRET_KEY_REGEX = /^[0-9a-fA-F]{64}$/;
const IDENTIFIER_REGEX = /^[0-9a-fA-F]{64}$/;

/**
 * A key pair constructed from a 64-character hex secret.
 *
 * The secret never changes after construction, so one instance can be shared
 * by concurrent callers. Each signature draws its own auxiliary randomness.
 *
 * @example
 * ```typescript
 * const keys = new KeyManager('01'.repeat(32));
 * const event = keys.signEvent(createEvent({ content: 'hello' }));
 * KeyManager.verify(event.id, event.pubkey, event.sig); // true
 * ```
 */
export class KeyManager {
  /** 32-byte x-only public key, lowercase hex */
  readonly publicKey: string;
  private readonly secretKey: Uint8Array;

  /**
   * @param secretKeyHex - 64-character hex secret scalar
   * @throws {KeyError} If the secret is not 64 hex characters or not in [1, n-1]
   */
  constructor(secretKeyHex: string) {
    if (typeof secretKeyHex !== 'string' || !SECRET_KEY_REGEX.test(secretKeyHex)) {
      throw new KeyError('secret key must be a 64-character hex string');
    }
    const secretKey = hexToBytes(secretKeyHex.toLowerCase());
    if (!secp256k1.utils.isValidPrivateKey(secretKey)) {
      throw new KeyError('secret key is out of range for secp256k1');
    }
    this.secretKey = secretKey;
    this.publicKey = bytesToHex(schnorr.getPublicKey(secretKey));
  }

  /**
   * Creates a KeyManager around a freshly generated secret.
   */
  static generate(): KeyManager {
    return new KeyManager(bytesToHex(schnorr.utils.randomPrivateKey()));
  }

  /**
   * Pure signature check; see verifySignature().
   */
  static verify(identifier: string | Uint8Array, publicKey: string, signature: string): boolean {
    return verifySignature(identifier, publicKey, signature);
  }

  /**
   * Returns the secret as hex, for handing to key-encoding collaborators.
   */
  exportSecretKey(): string {
    return bytesToHex(this.secretKey);
  }

  /**
   * Signs a 32-byte identifier.
   *
   * @returns 64-byte Schnorr signature, lowercase hex
   * @throws {InvalidEventError} If the identifier is not 32 bytes
   */
  sign(identifier: string | Uint8Array): string {
    let message: Uint8Array;
    if (typeof identifier === 'string') {
      if (!IDENTIFIER_REGEX.test(identifier)) {
        throw new InvalidEventError('identifier must be a 64-character hex string');
      }
      message = hexToBytes(identifier.toLowerCase());
    } else {
      message = identifier;
    }
    if (message.length !== 32) {
      throw new InvalidEventError(`identifier must be 32 bytes, got ${message.length}`);
    }
    return bytesToHex(schnorr.sign(message, this.secretKey, randomBytes(32)));
  }

  /**
   * Binds a template to this key, computes its identifier and signs it.
   *
   * @throws {InvalidEventError} If the template fails validation
   */
  signEvent(template: EventTemplate): SignedEvent {
    const unsigned = this.toUnsigned(template);
    const id = getEventHash(unsigned);
    return { ...unsigned, id, sig: this.sign(id) };
  }

  /**
   * Binds a template to this key without signing it.
   *
   * @throws {InvalidEventError} If the template fails validation
   */
  toUnsigned(template: EventTemplate): UnsignedEvent {
    validateEventTemplate(template);
    return {
      kind: template.kind,
      created_at: template.created_at,
      tags: template.tags.map((tag) => [...tag]),
      content: template.content,
      pubkey: this.publicKey,
    };
  }

  /**
   * Derives the 32-byte symmetric key shared with `theirPublicKey`.
   *
   * ECDH uses only the x-coordinate of the shared point, which is then run
   * through HKDF-extract (SHA-256, salt "nip44-v2"). Both parties derive the
   * same key.
   *
   * @param theirPublicKey - 32-byte x-only or 33-byte compressed key, hex
   * @throws {KeyError} If the public key is malformed or not on the curve
   */
  sharedSecret(theirPublicKey: string): Uint8Array {
    const pubkey = normalizePublicKey(theirPublicKey);
    if (!pubkey) {
      throw new KeyError('public key must be 32-byte x-only or 33-byte compressed hex');
    }

    let point: Uint8Array;
    try {
      point = secp256k1.getSharedSecret(this.secretKey, `02${pubkey}`, true);
    } catch (error) {
      throw new KeyError(
        'public key is not a valid secp256k1 point',
        error instanceof Error ? error : undefined
      );
    }
    return extract(sha256, point.subarray(1, 33), utf8ToBytes(CONVERSATION_KEY_SALT));
  }

  /**
   * Encrypts text for `theirPublicKey` with the shared secret.
   */
  encrypt(theirPublicKey: string, plaintext: string, version: CipherVersion = 'current'): string {
    return encryptText(this.sharedSecret(theirPublicKey), plaintext, version);
  }

  /**
   * Decrypts an envelope from `theirPublicKey` (either generation).
   *
   * @throws {DecryptionFailedError} If the envelope does not decrypt
   */
  decrypt(theirPublicKey: string, envelope: string): string {
    return decryptText(this.sharedSecret(theirPublicKey), envelope);
  }
}
