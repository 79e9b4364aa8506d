import { describe, it, expect } from 'vitest';
import { createEvent, KeyManager } from '@nostrand/core';
import { encodeClientFrame, parseRelayMessage } from './frames.js';

const event = new KeyManager('a'.repeat(64)).signEvent(
  createEvent({ content: 'hello', created_at: 1700000000 })
);

describe('encodeClientFrame', () => {
  it('encodes REQ with every filter', () => {
    expect(encodeClientFrame(['REQ', 'sub1', { kinds: [1] }, { authors: ['ab'] }])).toBe(
      '["REQ","sub1",{"kinds":[1]},{"authors":["ab"]}]'
    );
  });

  it('encodes CLOSE', () => {
    expect(encodeClientFrame(['CLOSE', 'sub1'])).toBe('["CLOSE","sub1"]');
  });

  it('encodes EVENT with the event object', () => {
    expect(JSON.parse(encodeClientFrame(['EVENT', event]))).toEqual(['EVENT', event]);
  });
});

describe('parseRelayMessage', () => {
  describe('recognized messages', () => {
    it('parses EVENT', () => {
      expect(parseRelayMessage(JSON.stringify(['EVENT', 'sub1', event]))).toEqual({
        ok: true,
        message: { type: 'EVENT', subscriptionId: 'sub1', event },
      });
    });

    it('parses OK', () => {
      expect(parseRelayMessage(JSON.stringify(['OK', event.id, false, 'blocked: spam']))).toEqual({
        ok: true,
        message: { type: 'OK', eventId: event.id, accepted: false, message: 'blocked: spam' },
      });
    });

    it('parses EOSE', () => {
      expect(parseRelayMessage('["EOSE","sub1"]')).toEqual({
        ok: true,
        message: { type: 'EOSE', subscriptionId: 'sub1' },
      });
    });

    it('parses NOTICE', () => {
      expect(parseRelayMessage('["NOTICE","slow down"]')).toEqual({
        ok: true,
        message: { type: 'NOTICE', message: 'slow down' },
      });
    });

    it('parses CLOSED', () => {
      expect(parseRelayMessage('["CLOSED","sub1","auth-required: sign in"]')).toEqual({
        ok: true,
        message: { type: 'CLOSED', subscriptionId: 'sub1', message: 'auth-required: sign in' },
      });
    });

    it('parses AUTH', () => {
      expect(parseRelayMessage('["AUTH","challenge-123"]')).toEqual({
        ok: true,
        message: { type: 'AUTH', challenge: 'challenge-123' },
      });
    });

    it('tolerates trailing elements', () => {
      expect(parseRelayMessage('["EOSE","sub1","extra",42]')).toEqual({
        ok: true,
        message: { type: 'EOSE', subscriptionId: 'sub1' },
      });
    });
  });

  describe('rejected input', () => {
    it('reports invalid JSON', () => {
      expect(parseRelayMessage('not json')).toEqual({ ok: false, reason: 'invalid JSON' });
    });

    it('reports non-arrays and empty arrays', () => {
      expect(parseRelayMessage('{"type":"EOSE"}')).toEqual({
        ok: false,
        reason: 'frame is not a non-empty array',
      });
      expect(parseRelayMessage('[]')).toEqual({
        ok: false,
        reason: 'frame is not a non-empty array',
      });
    });

    it('reports unknown message types', () => {
      expect(parseRelayMessage('["PING"]')).toEqual({
        ok: false,
        reason: 'unknown message type: PING',
      });
      expect(parseRelayMessage('[42]')).toEqual({ ok: false, reason: 'unknown message type: 42' });
    });

    it('reports the offending element of a malformed frame', () => {
      const result = parseRelayMessage(JSON.stringify(['OK', event.id, 'yes', '']));

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.reason).toMatch(/^malformed OK frame: 2: /);
    });

    it('rejects an EVENT whose event is malformed', () => {
      const result = parseRelayMessage(JSON.stringify(['EVENT', 'sub1', { ...event, sig: 'x' }]));

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.reason).toMatch(/^malformed EVENT frame: 2\.sig: /);
    });

    it('rejects frames with missing elements', () => {
      const result = parseRelayMessage('["CLOSED","sub1"]');

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.reason).toMatch(/^malformed CLOSED frame: /);
    });
  });
});
