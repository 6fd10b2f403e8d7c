/**
 * TTL Cache
 *
 * In-memory key/value store with per-entry expiry. Expiry is checked on
 * every read; the background sweep only reclaims memory.
 */

export interface TtlCacheOptions {
  /** Default time-to-live for `set()` in milliseconds */
  ttlMs: number;
  /** Interval of the expired-entry sweep (default: 60000, 0 disables it) */
  sweepIntervalMs?: number;
}

export interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

export class TtlCache<T> {
  private entries = new Map<string, CacheEntry<T>>();
  private readonly ttlMs: number;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private hits = 0;
  private misses = 0;

  constructor(options: TtlCacheOptions) {
    this.ttlMs = options.ttlMs;

    const sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    if (sweepIntervalMs > 0) {
      this.sweepTimer = setInterval(() => this.prune(), sweepIntervalMs);
      this.sweepTimer.unref();
    }
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry || Date.now() >= entry.expiresAt) {
      this.misses++;
      return undefined;
    }

    this.hits++;
    return entry.value;
  }

  set(key: string, value: T): void {
    this.setWithTtl(key, value, this.ttlMs);
  }

  setWithTtl(key: string, value: T, ttlMs: number): void {
    this.entries.set(key, { value, expiresAt: Date.now() + ttlMs });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries = new Map();
  }

  /**
   * Remove expired entries
   */
  prune(): number {
    const now = Date.now();
    let pruned = 0;

    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
        pruned++;
      }
    }

    return pruned;
  }

  /** Number of stored entries, expired or not */
  get size(): number {
    return this.entries.size;
  }

  /** Whether the background sweep is scheduled */
  get isSweeping(): boolean {
    return this.sweepTimer !== null;
  }

  /** Stop the background sweep. Entries stay readable. */
  close(): void {
    if (!this.sweepTimer) return;
    clearInterval(this.sweepTimer);
    this.sweepTimer = null;
  }

  getStats(): { size: number; hits: number; misses: number } {
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
    };
  }
}
