import { describe, it, expect } from 'vitest';
import { isSignedEvent, parseEvent, RumorSchema } from './parsers.js';
import { createEvent } from './builders.js';
import { InvalidEventError } from '../errors.js';
import { KeyManager } from '../keys/KeyManager.js';
import type { SignedEvent } from '../types.js';

function createSignedTestEvent(): SignedEvent {
  const keys = new KeyManager('a'.repeat(64));
  return keys.signEvent(createEvent({ content: 'hello', created_at: 1700000000 }));
}

describe('parseEvent', () => {
  it('accepts a signed event', () => {
    const event = createSignedTestEvent();

    expect(parseEvent(JSON.parse(JSON.stringify(event)))).toEqual(event);
  });

  it('strips unknown fields', () => {
    const event = createSignedTestEvent();

    const parsed = parseEvent({ ...event, seen_on: 'wss://relay.example.com' });

    expect(parsed).toEqual(event);
    expect('seen_on' in parsed).toBe(false);
  });

  it('rejects a missing signature with the offending path', () => {
    const { sig: _sig, ...unsigned } = createSignedTestEvent();

    expect(() => parseEvent(unsigned)).toThrow(InvalidEventError);
    expect(() => parseEvent(unsigned)).toThrow(/^Invalid event: sig: /);
  });

  it('rejects an uppercase identifier', () => {
    const event = createSignedTestEvent();

    expect(() => parseEvent({ ...event, id: event.id.toUpperCase() })).toThrow(
      /^Invalid event: id: /
    );
  });

  it('rejects a negative created_at', () => {
    expect(() => parseEvent({ ...createSignedTestEvent(), created_at: -1 })).toThrow(
      /^Invalid event: created_at: /
    );
  });

  it('rejects tags containing non-strings', () => {
    expect(() => parseEvent({ ...createSignedTestEvent(), tags: [['e', 5]] })).toThrow(
      /^Invalid event: tags\.0\.1: /
    );
  });

  it('rejects non-object input', () => {
    expect(() => parseEvent('not an event')).toThrow(/^Invalid event: event: /);
    expect(() => parseEvent(null)).toThrow(InvalidEventError);
  });
});

describe('isSignedEvent', () => {
  it('returns true for a signed event', () => {
    expect(isSignedEvent(createSignedTestEvent())).toBe(true);
  });

  it('returns false for a malformed value', () => {
    expect(isSignedEvent({ kind: 1 })).toBe(false);
    expect(isSignedEvent(undefined)).toBe(false);
  });
});

describe('RumorSchema', () => {
  it('accepts an event without a signature', () => {
    const { sig: _sig, ...rumor } = createSignedTestEvent();

    expect(RumorSchema.safeParse(rumor).success).toBe(true);
  });
});
