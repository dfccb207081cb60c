/**
 * Input-keyed memoisation with no eviction. The working set is one document at a time,
 * so entries live until `clear()`.
 *
 * Pending computations are shared; a rejected computation is dropped so the next call
 * retries it.
 */
export class Memo<V> {
  private entries = new Map<string, Promise<V>>();

  get(key: string, compute: () => Promise<V>): Promise<V> {
    const existing = this.entries.get(key);
    if (existing) return existing;

    const pending = compute();
    this.entries.set(key, pending);
    pending.catch(() => {
      if (this.entries.get(key) === pending) this.entries.delete(key);
    });
    return pending;
  }

  clear(): void {
    this.entries.clear();
  }
}

export function memoKey(...parts: Array<string | number>): string {
  return parts.map(String).join('\u0000');
}
