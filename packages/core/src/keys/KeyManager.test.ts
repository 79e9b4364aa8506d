import { describe, it, expect } from 'vitest';
import { hexToBytes } from '@noble/hashes/utils';
import {
  getEventHash,
  getPublicKey,
  verifyEvent as referenceVerifyEvent,
} from 'nostr-tools/pure';
import { nip44 } from 'nostr-tools';
import { KeyManager } from './KeyManager.js';
import { verifyEvent } from './verify.js';
import { createEvent } from '../events/builders.js';
import { InvalidEventError, KeyError } from '../errors.js';

const SECRET_A = 'a'.repeat(64);
const PUBKEY_A = '6a04ab98d9e4774ad806e302dddeb63bea16b5cb5f223ee77478e861bb583eb3';
const CURVE_ORDER = 'fffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141';

describe('KeyManager', () => {
  describe('constructor', () => {
    it('derives the x-only public key', () => {
      expect(new KeyManager(SECRET_A).publicKey).toBe(PUBKEY_A);
    });

    it('maps secret 1 to the generator x-coordinate', () => {
      const keys = new KeyManager('0'.repeat(63) + '1');
      expect(keys.publicKey).toBe(
        '79be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798'
      );
    });

    it('accepts uppercase hex', () => {
      expect(new KeyManager(SECRET_A.toUpperCase()).publicKey).toBe(PUBKEY_A);
    });

    it('matches an independent implementation', () => {
      const secret = '01'.repeat(32);
      expect(new KeyManager(secret).publicKey).toBe(getPublicKey(hexToBytes(secret)));
    });

    it('rejects secrets that are not 64 hex characters', () => {
      expect(() => new KeyManager('abc')).toThrow(KeyError);
      expect(() => new KeyManager('z'.repeat(64))).toThrow(KeyError);
      expect(() => new KeyManager('a'.repeat(66))).toThrow(KeyError);
    });

    it('rejects zero and the curve order', () => {
      expect(() => new KeyManager('0'.repeat(64))).toThrow('secret key is out of range for secp256k1');
      expect(() => new KeyManager(CURVE_ORDER)).toThrow(KeyError);
    });
  });

  describe('generate', () => {
    it('creates distinct usable key pairs', () => {
      const first = KeyManager.generate();
      const second = KeyManager.generate();

      expect(first.publicKey).toMatch(/^[0-9a-f]{64}$/);
      expect(first.publicKey).not.toBe(second.publicKey);
      expect(new KeyManager(first.exportSecretKey()).publicKey).toBe(first.publicKey);
    });
  });

  describe('sign and verify', () => {
    const keys = new KeyManager(SECRET_A);
    const identifier = 'c'.repeat(64);

    it('produces a 64-byte signature that verifies', () => {
      const sig = keys.sign(identifier);

      expect(sig).toMatch(/^[0-9a-f]{128}$/);
      expect(KeyManager.verify(identifier, keys.publicKey, sig)).toBe(true);
    });

    it('accepts the identifier as bytes', () => {
      const sig = keys.sign(hexToBytes(identifier));
      expect(KeyManager.verify(hexToBytes(identifier), keys.publicKey, sig)).toBe(true);
    });

    it('fails for a different identifier or key', () => {
      const sig = keys.sign(identifier);

      expect(KeyManager.verify('d'.repeat(64), keys.publicKey, sig)).toBe(false);
      expect(KeyManager.verify(identifier, KeyManager.generate().publicKey, sig)).toBe(false);
    });

    it('fails for a tampered signature', () => {
      const sig = keys.sign(identifier);
      const flipped = (sig[0] === '0' ? '1' : '0') + sig.slice(1);

      expect(KeyManager.verify(identifier, keys.publicKey, flipped)).toBe(false);
    });

    it('returns false for malformed input instead of throwing', () => {
      const sig = keys.sign(identifier);

      expect(KeyManager.verify('xyz', keys.publicKey, sig)).toBe(false);
      expect(KeyManager.verify(identifier, 'not-a-key', sig)).toBe(false);
      expect(KeyManager.verify(identifier, keys.publicKey, 'short')).toBe(false);
      expect(KeyManager.verify(identifier, 'f'.repeat(64), sig)).toBe(false);
    });

    it('rejects identifiers that are not 32 bytes', () => {
      expect(() => keys.sign('abcd')).toThrow(InvalidEventError);
      expect(() => keys.sign(new Uint8Array(31))).toThrow('identifier must be 32 bytes, got 31');
    });
  });

  describe('signEvent', () => {
    it('signs a text note that other implementations accept', () => {
      const keys = new KeyManager('01'.repeat(32));
      const event = keys.signEvent(
        createEvent({ kind: 1, content: 'hello', created_at: 1700000000 })
      );

      expect(event.pubkey).toBe(keys.publicKey);
      expect(event.id).toBe(getEventHash(event));
      expect(verifyEvent(event)).toBe(true);
      expect(referenceVerifyEvent({ ...event })).toBe(true);
    });

    it('detects mutation of any signable field', () => {
      const event = new KeyManager(SECRET_A).signEvent(createEvent({ content: 'hello' }));

      expect(verifyEvent({ ...event, content: 'hellO' })).toBe(false);
      expect(verifyEvent({ ...event, kind: 2 })).toBe(false);
      expect(verifyEvent({ ...event, tags: [['t', 'x']] })).toBe(false);
      expect(verifyEvent({ ...event, created_at: event.created_at + 1 })).toBe(false);
    });

    it('rejects invalid templates', () => {
      const keys = new KeyManager(SECRET_A);
      expect(() => keys.signEvent(createEvent({ kind: -5 }))).toThrow(InvalidEventError);
    });
  });

  describe('sharedSecret', () => {
    const alice = new KeyManager(SECRET_A);
    const bob = new KeyManager('b'.repeat(64));

    it('is symmetric', () => {
      expect(alice.sharedSecret(bob.publicKey)).toEqual(bob.sharedSecret(alice.publicKey));
    });

    it('matches the conversation key of an independent implementation', () => {
      expect(alice.sharedSecret(bob.publicKey)).toEqual(
        nip44.getConversationKey(hexToBytes(SECRET_A), bob.publicKey)
      );
    });

    it('accepts a compressed public key', () => {
      expect(alice.sharedSecret(`03${bob.publicKey}`)).toEqual(alice.sharedSecret(bob.publicKey));
    });

    it('rejects malformed and off-curve keys', () => {
      expect(() => alice.sharedSecret('xyz')).toThrow(KeyError);
      expect(() => alice.sharedSecret('f'.repeat(64))).toThrow(
        'public key is not a valid secp256k1 point'
      );
    });
  });

  describe('encrypt and decrypt', () => {
    const alice = new KeyManager(SECRET_A);
    const bob = new KeyManager('b'.repeat(64));

    it.each(['current', 'legacy'] as const)('round-trips text in %s mode', (version) => {
      const envelope = alice.encrypt(bob.publicKey, 'gm ☀️', version);
      expect(bob.decrypt(alice.publicKey, envelope)).toBe('gm ☀️');
    });
  });
});
