import { describe, it, expect } from 'vitest';
import { SeenSet } from './SeenSet.js';

describe('SeenSet', () => {
  it('reports whether a key is new', () => {
    const seen = new SeenSet(10);

    expect(seen.add('a')).toBe(true);
    expect(seen.add('a')).toBe(false);
    expect(seen.has('a')).toBe(true);
    expect(seen.size).toBe(1);
  });

  it('evicts the oldest key beyond capacity', () => {
    const seen = new SeenSet(2);
    seen.add('a');
    seen.add('b');
    seen.add('c');

    expect(seen.has('a')).toBe(false);
    expect(seen.has('b')).toBe(true);
    expect(seen.has('c')).toBe(true);
    expect(seen.size).toBe(2);
  });

  it('accepts an evicted key again', () => {
    const seen = new SeenSet(1);
    seen.add('a');
    seen.add('b');

    expect(seen.add('a')).toBe(true);
  });

  it('does not refresh a key on a repeated add', () => {
    const seen = new SeenSet(2);
    seen.add('a');
    seen.add('b');
    seen.add('a');
    seen.add('c');

    expect(seen.has('a')).toBe(false);
  });

  it('clears every key', () => {
    const seen = new SeenSet(5);
    seen.add('a');
    seen.clear();

    expect(seen.size).toBe(0);
    expect(seen.add('a')).toBe(true);
  });

  it('rejects a capacity below one', () => {
    expect(() => new SeenSet(0)).toThrow(RangeError);
    expect(() => new SeenSet(1.5)).toThrow('capacity must be a positive integer, got 1.5');
  });
});
