export class CacheStore<T> {
  private map = new Map<string, { value: T; expiresAt: number }>();

  constructor(
    private readonly ttlMs: number = 1000 * 60 * 10,
    private readonly maxEntries: number = 500,
    private readonly now: () => number = Date.now
  ) {}

  get(key: string): T | null {
    const hit = this.map.get(key);
    if (!hit) return null;
    if (this.now() >= hit.expiresAt) {
      this.map.delete(key);
      return null;
    }
    return hit.value;
  }

  /** `ttlMs` overrides the store default for this entry, e.g. a token's own lifetime. */
  set(key: string, value: T, ttlMs: number = this.ttlMs): void {
    this.pruneExpired();
    if (this.map.size >= this.maxEntries) {
      const oldestKey = this.map.keys().next().value;
      if (oldestKey !== undefined) {
        this.map.delete(oldestKey);
      }
    }

    this.map.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  delete(key: string): void {
    this.map.delete(key);
  }

  size(): number {
    this.pruneExpired();
    return this.map.size;
  }

  private pruneExpired(): void {
    const now = this.now();
    for (const [key, entry] of this.map.entries()) {
      if (entry.expiresAt <= now) {
        this.map.delete(key);
      }
    }
  }
}
