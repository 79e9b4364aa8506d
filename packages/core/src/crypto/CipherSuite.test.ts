import { describe, it, expect } from 'vitest';
import { cbc } from '@noble/ciphers/aes';
import { hexToBytes, randomBytes } from '@noble/hashes/utils';
import { base64 } from '@scure/base';
import { nip44 } from 'nostr-tools';
import { decrypt, decryptText, detectVersion, encrypt, encryptText } from './CipherSuite.js';
import { calcPaddedLength, encryptCurrent } from './current.js';
import { encryptLegacy } from './legacy.js';
import { CipherError, DecryptionFailedError } from '../errors.js';

const KEY = hexToBytes('11'.repeat(32));
const OTHER_KEY = hexToBytes('22'.repeat(32));

function flipByte(envelope: string, index: number): string {
  const data = base64.decode(envelope);
  data[index] = (data[index] ?? 0) ^ 0x01;
  return base64.encode(data);
}

function decryptError(key: Uint8Array, envelope: string): unknown {
  try {
    decrypt(key, envelope);
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('detectVersion', () => {
  it('recognizes the legacy framing', () => {
    expect(detectVersion('YWJj?iv=ZGVm')).toBe('legacy');
  });

  it('treats everything else as current', () => {
    expect(detectVersion('AgAAAA')).toBe('current');
  });
});

describe('calcPaddedLength', () => {
  it.each([
    [1, 32],
    [32, 32],
    [33, 64],
    [64, 64],
    [65, 96],
    [100, 128],
    [200, 224],
    [256, 256],
    [320, 320],
    [383, 384],
    [400, 448],
    [515, 640],
    [900, 1024],
    [65535, 65536],
  ])('pads %i bytes to %i', (length, padded) => {
    expect(calcPaddedLength(length)).toBe(padded);
  });
});

describe('current mode', () => {
  it('round-trips text', () => {
    const envelope = encryptText(KEY, 'hello world');
    expect(decryptText(KEY, envelope)).toBe('hello world');
  });

  it('starts the decoded envelope with version byte 2', () => {
    const data = base64.decode(encryptText(KEY, 'x'));

    expect(data[0]).toBe(2);
    // 1 version + 32 nonce + 34 padded + 32 mac
    expect(data.length).toBe(99);
  });

  it('round-trips the shortest and longest plaintexts', () => {
    const shortest = new Uint8Array([7]);
    const longest = randomBytes(65535);

    expect(decrypt(KEY, encrypt(KEY, shortest))).toEqual(shortest);
    expect(decrypt(KEY, encrypt(KEY, longest))).toEqual(longest);
  });

  it('rejects empty and oversized plaintexts', () => {
    expect(() => encrypt(KEY, new Uint8Array(0))).toThrow(CipherError);
    expect(() => encrypt(KEY, new Uint8Array(65536))).toThrow(
      'plaintext must be between 1 and 65535 bytes, got 65536'
    );
  });

  it('uses a fresh nonce for every message', () => {
    expect(encryptText(KEY, 'same')).not.toBe(encryptText(KEY, 'same'));
  });

  it('is byte-compatible with an independent implementation', () => {
    const nonce = hexToBytes('ab'.repeat(32));
    const ours = encryptCurrent(KEY, new TextEncoder().encode('interop ✓'), nonce);

    expect(ours).toBe(nip44.encrypt('interop ✓', KEY, nonce));
    expect(nip44.decrypt(encryptText(KEY, 'from us'), KEY)).toBe('from us');
    expect(decryptText(KEY, nip44.encrypt('to us', KEY))).toBe('to us');
  });

  it('fails with the wrong key', () => {
    expect(() => decryptText(OTHER_KEY, encryptText(KEY, 'secret'))).toThrow(DecryptionFailedError);
  });

  it('fails when the ciphertext is tampered', () => {
    const envelope = encryptText(KEY, 'secret');
    expect(() => decrypt(KEY, flipByte(envelope, 40))).toThrow(DecryptionFailedError);
  });

  it('fails when the mac is tampered', () => {
    const envelope = encryptText(KEY, 'secret');
    const last = base64.decode(envelope).length - 1;
    expect(() => decrypt(KEY, flipByte(envelope, last))).toThrow(DecryptionFailedError);
  });

  it('fails for an unknown version byte', () => {
    const envelope = encryptText(KEY, 'secret');
    expect(() => decrypt(KEY, flipByte(envelope, 0))).toThrow(DecryptionFailedError);
  });

  it('fails for truncated, non-base64 and future-encoded envelopes', () => {
    const envelope = encryptText(KEY, 'secret');

    expect(() => decrypt(KEY, envelope.slice(0, 100))).toThrow(DecryptionFailedError);
    expect(() => decrypt(KEY, '!'.repeat(200))).toThrow(DecryptionFailedError);
    expect(() => decrypt(KEY, `#${envelope.slice(1)}`)).toThrow(DecryptionFailedError);
  });

  it('reports invalid UTF-8 plaintext as a failed decryption', () => {
    const envelope = encrypt(KEY, new Uint8Array([0xff, 0xfe]));

    expect(decrypt(KEY, envelope)).toEqual(new Uint8Array([0xff, 0xfe]));
    expect(() => decryptText(KEY, envelope)).toThrow(DecryptionFailedError);
  });
});

describe('legacy mode', () => {
  it('round-trips text', () => {
    const envelope = encryptText(KEY, 'hello legacy', 'legacy');
    expect(decryptText(KEY, envelope)).toBe('hello legacy');
  });

  it('frames ciphertext and iv as base64 around the separator', () => {
    const envelope = encryptText(KEY, 'sixteen byte msg', 'legacy');
    const [ciphertext = '', iv = ''] = envelope.split('?iv=');

    // 16 bytes of plaintext gain a full block of padding
    expect(base64.decode(ciphertext).length).toBe(32);
    expect(base64.decode(iv).length).toBe(16);
  });

  it('encrypts deterministically for a fixed iv', () => {
    const iv = new Uint8Array(16);
    const plaintext = new TextEncoder().encode('fixed');

    expect(encryptLegacy(KEY, plaintext, iv)).toBe(encryptLegacy(KEY, plaintext, iv));
    expect(encryptLegacy(KEY, plaintext, iv).endsWith('?iv=AAAAAAAAAAAAAAAAAAAAAA==')).toBe(true);
  });

  it('fails for malformed framing', () => {
    const envelope = encryptText(KEY, 'secret', 'legacy');
    const [ciphertext = ''] = envelope.split('?iv=');

    expect(() => decrypt(KEY, `${envelope}?iv=AAAA`)).toThrow(DecryptionFailedError);
    expect(() => decrypt(KEY, `${ciphertext}?iv=AAAA`)).toThrow(DecryptionFailedError);
    expect(() => decrypt(KEY, `?iv=${base64.encode(new Uint8Array(16))}`)).toThrow(
      DecryptionFailedError
    );
    expect(() =>
      decrypt(KEY, `${base64.encode(new Uint8Array(15))}?iv=${base64.encode(new Uint8Array(16))}`)
    ).toThrow(DecryptionFailedError);
  });

  it('fails for a well-framed envelope whose padding is invalid', () => {
    const iv = new Uint8Array(16);
    const zeroPadByte = new Uint8Array(16);
    const mismatchedPad = new Uint8Array(16);
    mismatchedPad[15] = 5;

    for (const block of [zeroPadByte, mismatchedPad]) {
      const ciphertext = cbc(KEY, iv, { disablePadding: true }).encrypt(block);
      const envelope = `${base64.encode(ciphertext)}?iv=${base64.encode(iv)}`;

      const error = decryptError(KEY, envelope);

      expect(error).toBeInstanceOf(DecryptionFailedError);
      expect(error instanceof Error ? error.message : '').toBe('decryption failed');
    }
  });
});

describe('key handling', () => {
  it('rejects keys that are not 32 bytes', () => {
    expect(() => encryptText(new Uint8Array(16), 'x')).toThrow(CipherError);
    expect(() => decrypt(new Uint8Array(16), 'x')).toThrow(
      'key must be 32 bytes, got 16'
    );
  });
});

describe('failure reporting', () => {
  it('gives the same error whichever check failed', () => {
    const envelope = encryptText(KEY, 'secret');
    const errors = [
      decryptError(OTHER_KEY, envelope),
      decryptError(KEY, flipByte(envelope, 40)),
      decryptError(KEY, 'short'),
      decryptError(KEY, 'abc?iv=def'),
    ];

    for (const error of errors) {
      expect(error).toBeInstanceOf(DecryptionFailedError);
      expect(error instanceof Error ? error.message : '').toBe('decryption failed');
      expect(error instanceof Error ? error.cause : 'not an error').toBeUndefined();
    }
  });
});
