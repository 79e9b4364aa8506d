/**
 * Bounded set of recently seen keys with oldest-first eviction.
 *
 * A key evicted from the window can be added again, so deduplication holds
 * only within the last `capacity` insertions.
 */
export class SeenSet {
  private readonly keys = new Set<string>();

  constructor(readonly capacity: number) {
    if (!Number.isSafeInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * Records `key`.
   *
   * @returns true if the key was not already in the window
   */
  add(key: string): boolean {
    if (this.keys.has(key)) return false;
    this.keys.add(key);
    if (this.keys.size > this.capacity) {
      // Set iteration follows insertion order
      for (const oldest of this.keys) {
        this.keys.delete(oldest);
        break;
      }
    }
    return true;
  }

  has(key: string): boolean {
    return this.keys.has(key);
  }

  get size(): number {
    return this.keys.size;
  }

  clear(): void {
    this.keys.clear();
  }
}
