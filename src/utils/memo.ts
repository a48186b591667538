/**
 * Per-instance compute-once cache. Each key's factory runs at most once;
 * later reads return the stored value, including null.
 */
export class Memo<T extends object> {
  private readonly slots: { [K in keyof T]?: { value: T[K] } } = {};
  private readonly computeCounts = new Map<keyof T, number>();

  get<K extends keyof T>(key: K, compute: () => T[K]): T[K] {
    const slot = this.slots[key];
    if (slot) return slot.value;

    const value = compute();
    this.slots[key] = { value };
    this.computeCounts.set(key, (this.computeCounts.get(key) ?? 0) + 1);
    return value;
  }

  /** How many times a key was computed (0 or 1). */
  computeCount(key: keyof T): number {
    return this.computeCounts.get(key) ?? 0;
  }
}
