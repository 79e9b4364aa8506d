/**
 * Signature and event verification. Every function here returns false for
 * malformed input instead of throwing.
 */

import { schnorr } from '@noble/curves/secp256k1';
import { getEventHash } from '../events/codec.js';
import type { SignedEvent } from '../types.js';

const HEX_64_REGEX = /^[0-9a-f]{64}$/;
const COMPRESSED_KEY_REGEX = /^0[23][0-9a-f]{64}$/;
const HEX_128_REGEX = /^[0-9a-f]{128}$/;

/**
 * Reduces a 32-byte x-only or 33-byte compressed public key (hex) to its
 * x-only lowercase hex form.
 *
 * @returns The x-only key, or undefined if the input has neither shape
 */
export function normalizePublicKey(publicKey: string): string | undefined {
  if (typeof publicKey !== 'string') return undefined;
  const lower = publicKey.toLowerCase();
  if (HEX_64_REGEX.test(lower)) return lower;
  if (COMPRESSED_KEY_REGEX.test(lower)) return lower.slice(2);
  return undefined;
}

function normalizeIdentifier(identifier: string | Uint8Array): string | Uint8Array | undefined {
  if (typeof identifier === 'string') {
    const lower = identifier.toLowerCase();
    return HEX_64_REGEX.test(lower) ? lower : undefined;
  }
  return identifier instanceof Uint8Array && identifier.length === 32 ? identifier : undefined;
}

/**
 * Checks a BIP-340 Schnorr signature over a 32-byte identifier.
 */
export function verifySignature(
  identifier: string | Uint8Array,
  publicKey: string,
  signature: string
): boolean {
  const message = normalizeIdentifier(identifier);
  const pubkey = normalizePublicKey(publicKey);
  if (!message || !pubkey || typeof signature !== 'string') return false;

  const sig = signature.toLowerCase();
  if (!HEX_128_REGEX.test(sig)) return false;

  try {
    return schnorr.verify(sig, message, pubkey);
  } catch {
    // x-coordinate not on the curve
    return false;
  }
}

/**
 * Recomputes the identifier of `event` and checks its signature.
 * Any mutation of a signable field after signing makes this return false.
 */
export function verifyEvent(event: SignedEvent): boolean {
  let expectedId: string;
  try {
    expectedId = getEventHash(event);
  } catch {
    return false;
  }
  if (event.id !== expectedId) return false;
  return verifySignature(event.id, event.pubkey, event.sig);
}
