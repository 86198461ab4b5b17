/**
 * DocumentCache - Path-keyed cache of loaded documents
 *
 * Created once alongside the engine and populated on the first load of each
 * key. Entries stay until `clear()`; there is no implicit eviction.
 *
 * The cache stores the in-flight load promise, so concurrent first loads of
 * the same key share a single load. A load that rejects is removed, and the
 * next caller starts a fresh one.
 */
export class DocumentCache<T> {
  private readonly entries = new Map<string, Promise<T>>();

  get(key: string, load: (key: string) => Promise<T>): Promise<T> {
    const existing = this.entries.get(key);
    if (existing) return existing;

    const pending = load(key).catch((err: unknown) => {
      // A clear() may have run since, and a newer load may own the key.
      if (this.entries.get(key) === pending) this.entries.delete(key);
      throw err;
    });
    this.entries.set(key, pending);
    return pending;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Drops every entry, handing each successfully loaded value to `dispose`.
   */
  async clear(dispose?: (value: T) => Promise<void> | void): Promise<void> {
    const pending = Array.from(this.entries.values());
    this.entries.clear();
    if (!dispose) return;
    const settled = await Promise.allSettled(pending);
    for (const s of settled) {
      if (s.status === 'fulfilled') await dispose(s.value);
    }
  }
}
