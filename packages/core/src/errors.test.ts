import { describe, it, expect } from 'vitest';
import {
  CipherError,
  DecryptionFailedError,
  InvalidEventError,
  KeyError,
  NostrandError,
  RemoteSignerError,
} from './errors.js';

describe('NostrandError', () => {
  it('should have correct name and code', () => {
    const error = new NostrandError('test', 'TEST_CODE');
    expect(error.name).toBe('NostrandError');
    expect(error.code).toBe('TEST_CODE');
    expect(error.message).toBe('test');
  });

  it('should accept optional cause', () => {
    const cause = new Error('cause');
    const error = new NostrandError('test', 'TEST_CODE', cause);
    expect(error.cause).toBe(cause);
  });

  it('should work without cause', () => {
    expect(new NostrandError('test', 'TEST_CODE').cause).toBeUndefined();
  });
});

describe('KeyError', () => {
  it('should have correct code and name', () => {
    const error = new KeyError('bad key');
    expect(error.code).toBe('INVALID_KEY');
    expect(error.name).toBe('KeyError');
    expect(error).toBeInstanceOf(NostrandError);
  });

  it('should accept optional cause', () => {
    const cause = new Error('point not on curve');
    expect(new KeyError('bad key', cause).cause).toBe(cause);
  });
});

describe('InvalidEventError', () => {
  it('should have correct code and name', () => {
    const error = new InvalidEventError('bad event');
    expect(error.code).toBe('INVALID_EVENT');
    expect(error.name).toBe('InvalidEventError');
    expect(error).toBeInstanceOf(NostrandError);
  });
});

describe('CipherError', () => {
  it('should default to CIPHER_ERROR', () => {
    const error = new CipherError('misuse');
    expect(error.code).toBe('CIPHER_ERROR');
    expect(error.name).toBe('CipherError');
  });

  it('should accept a specific code', () => {
    expect(new CipherError('too long', 'INVALID_PLAINTEXT').code).toBe('INVALID_PLAINTEXT');
  });
});

describe('DecryptionFailedError', () => {
  it('should carry a fixed message and no cause', () => {
    const error = new DecryptionFailedError();
    expect(error.message).toBe('decryption failed');
    expect(error.code).toBe('DECRYPTION_FAILED');
    expect(error.name).toBe('DecryptionFailedError');
    expect(error.cause).toBeUndefined();
  });

  it('should extend CipherError', () => {
    const error = new DecryptionFailedError();
    expect(error).toBeInstanceOf(CipherError);
    expect(error).toBeInstanceOf(NostrandError);
  });
});

describe('RemoteSignerError', () => {
  it('should carry the request id', () => {
    const error = new RemoteSignerError('permission denied', 'req-1');
    expect(error.code).toBe('REMOTE_SIGNER_ERROR');
    expect(error.name).toBe('RemoteSignerError');
    expect(error.message).toBe('permission denied');
    expect(error.requestId).toBe('req-1');
    expect(error).toBeInstanceOf(NostrandError);
  });
});
