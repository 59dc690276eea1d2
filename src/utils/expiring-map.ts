interface Slot<T> {
  value: T;
  expiresAt: number;
}

/**
 * Map whose entries lapse a fixed time after they were written. Expired
 * entries are dropped on read and by `sweep()`.
 */
export class ExpiringMap<T> {
  private slots: Map<string, Slot<T>> = new Map();

  constructor(
    private ttlMs: number,
    private now: () => number = Date.now
  ) {}

  get size(): number {
    return this.slots.size;
  }

  get(key: string): T | null {
    const slot = this.slots.get(key);
    if (!slot) return null;

    if (this.now() > slot.expiresAt) {
      this.slots.delete(key);
      return null;
    }
    return slot.value;
  }

  set(key: string, value: T): void {
    this.slots.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  delete(key: string): boolean {
    return this.slots.delete(key);
  }

  /** Returns the number of entries removed. */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, slot] of this.slots) {
      if (now > slot.expiresAt) {
        this.slots.delete(key);
        removed++;
      }
    }
    return removed;
  }
}
