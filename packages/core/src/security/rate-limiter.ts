/**
 * In-memory sliding window rate limiter.
 *
 * Uses the RateLimitStore interface so a shared store can be swapped in
 * with setRateLimitStore() when the app runs on more than one instance.
 */
import { RateLimitError } from '@shepherd/shared';

// ── Interfaces ──────────────────────────────────────────────────

export interface RateLimitConfig {
  windowMs: number;     // Time window in milliseconds
  maxRequests: number;  // Max attempts per window per key
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  /** Milliseconds until the oldest attempt in the window expires (0 when none). */
  resetMs: number;
}

interface RateLimitEntry {
  timestamps: number[];
  lastAccess: number;
}

export interface RateLimitStore {
  /** Records an attempt unless the key is already over the limit. */
  check(key: string, config: RateLimitConfig): RateLimitResult;
  /** Same answer as check() without recording anything. */
  peek(key: string, config: RateLimitConfig): RateLimitResult;
  clear(key: string): void;
  /** Drops keys idle for longer than maxIdleMs. Returns how many were dropped. */
  cleanup(maxIdleMs: number): number;
}

// ── Preset Configurations ───────────────────────────────────────

export const DEFAULT_RATE_LIMIT: RateLimitConfig = { windowMs: 300 * 1000, maxRequests: 5 };

export const RATE_LIMITS = {
  login: DEFAULT_RATE_LIMIT,                             // 5 per 5 min
  refresh: { windowMs: 300 * 1000, maxRequests: 20 },    // 20 per 5 min
} as const;

// ── In-Memory Rate Limit Store ──────────────────────────────────

export class InMemoryRateLimitStore implements RateLimitStore {
  private store = new Map<string, RateLimitEntry>();
  private readonly maxStoreSize = 10_000; // LRU eviction threshold

  check(key: string, config: RateLimitConfig): RateLimitResult {
    const now = Date.now();
    this.evictIfNeeded();

    const entry = this.store.get(key) || { timestamps: [], lastAccess: now };
    entry.timestamps = this.inWindow(entry.timestamps, config, now);
    entry.lastAccess = now;

    // LRU touch: move to end of insertion order so active keys survive eviction
    this.store.delete(key);

    if (entry.timestamps.length < config.maxRequests) {
      entry.timestamps.push(now);
      this.store.set(key, entry);
      return this.result(entry.timestamps, config, now, true);
    }

    this.store.set(key, entry);
    return this.result(entry.timestamps, config, now, false);
  }

  peek(key: string, config: RateLimitConfig): RateLimitResult {
    const now = Date.now();
    const timestamps = this.inWindow(this.store.get(key)?.timestamps ?? [], config, now);
    return this.result(timestamps, config, now, timestamps.length < config.maxRequests);
  }

  clear(key: string): void {
    this.store.delete(key);
  }

  cleanup(maxIdleMs: number): number {
    const cutoff = Date.now() - maxIdleMs;
    let removed = 0;
    for (const [key, entry] of this.store) {
      if (entry.lastAccess <= cutoff) {
        this.store.delete(key);
        removed++;
      }
    }
    return removed;
  }

  private inWindow(timestamps: number[], config: RateLimitConfig, now: number): number[] {
    const windowStart = now - config.windowMs;
    return timestamps.filter((t) => t > windowStart);
  }

  private result(
    timestamps: number[],
    config: RateLimitConfig,
    now: number,
    allowed: boolean,
  ): RateLimitResult {
    const oldest = timestamps[0];
    return {
      allowed,
      remaining: Math.max(0, config.maxRequests - timestamps.length),
      resetMs: oldest === undefined ? 0 : oldest + config.windowMs - now,
    };
  }

  private evictIfNeeded() {
    if (this.store.size <= this.maxStoreSize) return;

    // Evict oldest 20% using Map insertion order (LRU approximation).
    const evictCount = Math.floor(this.store.size * 0.2);
    const keysIter = this.store.keys();
    for (let i = 0; i < evictCount; i++) {
      const { value, done } = keysIter.next();
      if (done) break;
      this.store.delete(value);
    }
  }
}

// ── Store Singleton ─────────────────────────────────────────────

let _rateLimitStore: RateLimitStore = new InMemoryRateLimitStore();

/** Replace the default in-memory store with a custom implementation. */
export function setRateLimitStore(store: RateLimitStore): void {
  _rateLimitStore = store;
}

export function getRateLimitStore(): RateLimitStore {
  return _rateLimitStore;
}

// ── Public API ──────────────────────────────────────────────────

export function checkRateLimit(key: string, config: RateLimitConfig = DEFAULT_RATE_LIMIT): RateLimitResult {
  return _rateLimitStore.check(key, config);
}

export function clearRateLimit(key: string): void {
  _rateLimitStore.clear(key);
}

export function getRemaining(key: string, config: RateLimitConfig = DEFAULT_RATE_LIMIT): number {
  return _rateLimitStore.peek(key, config).remaining;
}

/** Seconds until the key has room again; 0 when it has no attempts in the window. */
export function getResetTime(key: string, config: RateLimitConfig = DEFAULT_RATE_LIMIT): number {
  return Math.ceil(_rateLimitStore.peek(key, config).resetMs / 1000);
}

export function cleanupRateLimits(maxIdleMs: number = DEFAULT_RATE_LIMIT.windowMs): number {
  return _rateLimitStore.cleanup(maxIdleMs);
}

/** Records an attempt, or throws RateLimitError once the window is full. */
export function enforceRateLimit(
  key: string,
  config: RateLimitConfig = DEFAULT_RATE_LIMIT,
): RateLimitResult {
  const result = _rateLimitStore.check(key, config);
  if (!result.allowed) {
    const retryAfter = Math.ceil(result.resetMs / 1000);
    const minutes = Math.ceil(retryAfter / 60);
    throw new RateLimitError(
      `Too many requests. Please try again in ${minutes} minute(s).`,
      retryAfter,
    );
  }
  return result;
}

/** Headers a successful rate-limited response carries. */
export function rateLimitHeaders(result: { remaining: number; resetMs: number }): Record<string, string> {
  return {
    'X-RateLimit-Remaining': String(result.remaining),
    'X-RateLimit-Reset': String(Math.ceil(result.resetMs / 1000)),
  };
}
