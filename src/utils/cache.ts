/**
 * TTL-based In-Memory Cache with single-flight loading.
 *
 * Bounds query volume: a completed lookup is reused until its TTL runs out,
 * and concurrent requests for the same key share one computation.
 */

import { createHash } from 'node:crypto';
import { logger } from './logger.js';
import type { SaleOptions } from '../types.js';

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
  createdAt: number;
  lastAccessedAt: number;
}

/**
 * Default maximum cache size to prevent memory exhaustion.
 */
const DEFAULT_MAX_CACHE_SIZE = 10000;

/**
 * Generic TTL cache with lazy expiration and size limits.
 *
 * Expiry is enforced on read; the periodic sweep only reclaims memory.
 * When at capacity, evicts the least-recently-used entry.
 */
export class TtlCache<T> {
  private cache = new Map<string, CacheEntry<T>>();
  private readonly defaultTtlMs: number;
  private readonly maxSize: number;
  private cleanupInterval: ReturnType<typeof setInterval> | null = null;

  constructor(defaultTtlSeconds: number = 300, maxSize: number = DEFAULT_MAX_CACHE_SIZE) {
    this.defaultTtlMs = defaultTtlSeconds * 1000;
    this.maxSize = maxSize;

    // .unref() keeps the sweep from holding the process open
    this.cleanupInterval = setInterval(() => this.cleanup(), 60000);
    this.cleanupInterval.unref();
  }

  /**
   * Get a value if it exists and hasn't expired.
   * An entry is gone from the instant its TTL elapses.
   */
  get(key: string): T | undefined {
    const entry = this.cache.get(key);

    if (!entry) {
      return undefined;
    }

    const now = Date.now();

    if (now >= entry.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }

    entry.lastAccessedAt = now;

    logger.debug('Cache hit', { key, age_ms: now - entry.createdAt });
    return entry.value;
  }

  /**
   * Insert a value with optional custom TTL.
   * A TTL of zero or less stores nothing.
   */
  set(key: string, value: T, ttlMs?: number): void {
    const effectiveTtl = ttlMs ?? this.defaultTtlMs;
    if (effectiveTtl <= 0) {
      this.cache.delete(key);
      return;
    }

    const now = Date.now();

    if (!this.cache.has(key) && this.cache.size >= this.maxSize) {
      this.evictLRU();
    }

    // Replaced, never mutated in place
    this.cache.set(key, {
      value,
      expiresAt: now + effectiveTtl,
      createdAt: now,
      lastAccessedAt: now,
    });

    logger.debug('Cache set', {
      key,
      ttl_ms: effectiveTtl,
      size: this.cache.size,
    });
  }

  private evictLRU(): void {
    let oldestKey: string | null = null;
    let oldestTime = Infinity;

    for (const [key, entry] of this.cache) {
      if (entry.lastAccessedAt < oldestTime) {
        oldestTime = entry.lastAccessedAt;
        oldestKey = key;
      }
    }

    if (oldestKey) {
      this.cache.delete(oldestKey);
      logger.debug('Cache LRU eviction', { evicted_key: oldestKey });
    }
  }

  get size(): number {
    return this.cache.size;
  }

  private cleanup(): void {
    const now = Date.now();
    let removed = 0;

    for (const [key, entry] of this.cache) {
      if (now >= entry.expiresAt) {
        this.cache.delete(key);
        removed++;
      }
    }

    if (removed > 0) {
      logger.debug('Cache cleanup', { removed, remaining: this.cache.size });
    }
  }

  /**
   * Stop the cleanup interval (for testing/shutdown).
   */
  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.cache.clear();
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// Single-flight
// ═══════════════════════════════════════════════════════════════════════════

interface InFlight<T> {
  promise: Promise<T>;
  controller: AbortController;
  waiters: number;
}

export interface GetOrComputeOptions<T> {
  /** TTL for the computed value, in milliseconds */
  ttlMs: (value: T) => number;
  /** Abandons this caller's wait only */
  signal?: AbortSignal;
  /** Error to reject with when `signal` fires */
  onAbort?: () => Error;
}

/**
 * TTL cache that runs at most one computation per key at a time.
 *
 * Callers that arrive while a computation is in flight wait for it. A caller
 * that aborts stops waiting; the computation is aborted only once no caller
 * is left waiting. Rejected computations are not stored.
 */
export class SingleFlightCache<T> {
  private readonly store: TtlCache<T>;
  private readonly inFlight = new Map<string, InFlight<T>>();

  constructor(maxSize: number = DEFAULT_MAX_CACHE_SIZE) {
    this.store = new TtlCache<T>(0, maxSize);
  }

  async getOrCompute(
    key: string,
    compute: (signal: AbortSignal) => Promise<T>,
    options: GetOrComputeOptions<T>,
  ): Promise<{ value: T; fromCache: boolean }> {
    const cached = this.store.get(key);
    if (cached !== undefined) {
      return { value: cached, fromCache: true };
    }

    if (options.signal?.aborted) {
      throw options.onAbort ? options.onAbort() : new Error('Aborted');
    }

    let flight = this.inFlight.get(key);

    if (!flight) {
      const controller = new AbortController();
      const started: InFlight<T> = {
        controller,
        waiters: 0,
        promise: compute(controller.signal).then((value) => {
          if (!controller.signal.aborted) {
            this.store.set(key, value, options.ttlMs(value));
          }
          return value;
        }),
      };
      const settle = () => {
        if (this.inFlight.get(key) === started) {
          this.inFlight.delete(key);
        }
      };
      started.promise.then(settle, settle);
      this.inFlight.set(key, started);
      flight = started;
    } else {
      logger.debug('Joined in-flight computation', { key });
    }

    const value = await this.wait(key, flight, options);
    return { value, fromCache: false };
  }

  private wait(
    key: string,
    flight: InFlight<T>,
    options: GetOrComputeOptions<T>,
  ): Promise<T> {
    const { signal } = options;
    flight.waiters++;

    // Last waiter gone: abandon the work and let the next caller start fresh
    const leave = () => {
      flight.waiters--;
      if (flight.waiters === 0) {
        if (this.inFlight.get(key) === flight) {
          this.inFlight.delete(key);
        }
        flight.controller.abort();
        logger.debug('Abandoned in-flight computation', { key });
      }
    };

    const abortError = () =>
      options.onAbort ? options.onAbort() : new Error('Aborted');

    return new Promise<T>((resolve, reject) => {
      let done = false;

      const onAbort = () => {
        if (done) return;
        done = true;
        leave();
        reject(abortError());
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      flight.promise.then(
        (value) => {
          if (done) return;
          done = true;
          flight.waiters--;
          signal?.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          if (done) return;
          done = true;
          flight.waiters--;
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        },
      );
    });
  }

  /** Number of computations currently running */
  get pending(): number {
    return this.inFlight.size;
  }

  get size(): number {
    return this.store.size;
  }

  destroy(): void {
    for (const flight of this.inFlight.values()) {
      flight.controller.abort();
    }
    this.inFlight.clear();
    this.store.destroy();
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// Keys
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Cache key for a lookup: a hash over the domain and every option, so calls
 * with different options never share an entry.
 */
export function forSaleCacheKey(domain: string, options: SaleOptions): string {
  const canonical = JSON.stringify([
    domain.toLowerCase(),
    options.enableRdapCheck,
    options.cacheTTL,
    options.timeout,
  ]);
  return `forsale:${createHash('sha256').update(canonical).digest('hex')}`;
}
