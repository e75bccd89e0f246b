// TTL-based cache with sliding expiration
// Entries expire `ttl` ms after they were last written or read

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export class TTLCache<K, V> {
  private cache = new Map<K, CacheEntry<V>>();
  private cleanupInterval: ReturnType<typeof setInterval> | null = null;

  constructor(
    private defaultTTL: number = 15 * 60 * 1000,
    private cleanupMs: number = 60 * 1000,
    private now: () => number = Date.now
  ) {
    this.startCleanup();
  }

  private startCleanup(): void {
    this.cleanupInterval = setInterval(() => {
      this.cleanup();
    }, this.cleanupMs);
    // the sweep alone never keeps the process alive
    this.cleanupInterval.unref();
  }

  cleanup(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.cache.entries()) {
      if (entry.expiresAt <= now) {
        this.cache.delete(key);
        removed++;
      }
    }
    return removed;
  }

  set(key: K, value: V, ttl?: number): void {
    const expiresAt = this.now() + (ttl ?? this.defaultTTL);
    this.cache.set(key, { value, expiresAt });
  }

  get(key: K): V | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;

    if (entry.expiresAt <= this.now()) {
      this.cache.delete(key);
      return undefined;
    }

    entry.expiresAt = this.now() + this.defaultTTL;
    return entry.value;
  }

  has(key: K): boolean {
    const entry = this.cache.get(key);
    if (!entry) return false;

    if (entry.expiresAt <= this.now()) {
      this.cache.delete(key);
      return false;
    }

    return true;
  }

  delete(key: K): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.cache.clear();
  }
}
