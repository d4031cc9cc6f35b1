import { createHash } from "node:crypto";

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export interface TtlCacheOptions {
  defaultTtlSeconds: number;
  /** Clock in milliseconds; injectable for tests. */
  now?: () => number;
}

/**
 * In-process cache whose entries expire a fixed time after being written.
 *
 * Every operation is synchronous, so concurrent requests on the event loop never
 * observe a half-written entry. Expired entries are removed when looked up, or in
 * bulk by `sweep()`.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();

  private readonly now: () => number;

  private sweeper: NodeJS.Timeout | null = null;

  constructor(private readonly options: TtlCacheOptions) {
    assertPositiveTtl(options.defaultTtlSeconds);
    this.now = options.now ?? Date.now;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  put(key: string, value: V, ttlSeconds: number = this.options.defaultTtlSeconds): void {
    assertPositiveTtl(ttlSeconds);
    this.entries.set(key, {
      value,
      expiresAt: this.now() + ttlSeconds * 1000,
    });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Number of stored entries, expired ones included until swept. */
  get size(): number {
    return this.entries.size;
  }

  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  startSweeper(intervalMs: number): void {
    if (this.sweeper) {
      return;
    }
    this.sweeper = setInterval(() => this.sweep(), intervalMs);
    this.sweeper.unref();
  }

  dispose(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
    this.entries.clear();
  }
}

/**
 * Stable key for a namespaced tuple of request parameters.
 */
export function cacheKey(namespace: string, ...parts: Array<string | number | boolean>): string {
  const digest = createHash("sha256").update(JSON.stringify(parts)).digest("hex");
  return `${namespace}:${digest}`;
}

function assertPositiveTtl(ttlSeconds: number): void {
  if (!Number.isFinite(ttlSeconds) || ttlSeconds <= 0) {
    throw new RangeError(`TTL must be a positive number of seconds, got ${ttlSeconds}`);
  }
}
