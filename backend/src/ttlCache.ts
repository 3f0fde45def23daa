import { CacheFetchError } from './errors.js';
import type { Candle, Instrument, TtlClass, TtlPolicy } from './types.js';

export const DEFAULT_TTL_POLICY: TtlPolicy = {
  listing: 5 * 60_000,
  ohlcv: 2 * 60_000,
  fastTimeframe: 60_000,
  slowTimeframe: 15 * 60_000,
};

type CacheEntry<V> = { value: V; fetchedAt: number; ttlMs: number };

export type TtlCacheOptions = {
  policy?: Partial<TtlPolicy>;
  now?: () => number;
};

/**
 * Time-expiring key/value store with per-key single-flight fetching.
 *
 * Expired entries are dropped when read. Concurrent `getOrFetch` calls for a key
 * share one in-flight promise, so the fetcher runs at most once per key at a time
 * and every waiter settles with the same value or the same `CacheFetchError`.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly inflight = new Map<string, Promise<V>>();
  private readonly policy: TtlPolicy;
  private readonly now: () => number;

  constructor(opts: TtlCacheOptions = {}) {
    this.policy = { ...DEFAULT_TTL_POLICY, ...opts.policy };
    this.now = opts.now ?? Date.now;
  }

  ttlFor(ttlClass: TtlClass): number {
    return this.policy[ttlClass];
  }

  peek(key: string): V | undefined {
    const e = this.entries.get(key);
    if (!e) return undefined;
    if (this.now() - e.fetchedAt >= e.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return e.value;
  }

  set(key: string, value: V, ttlClass: TtlClass) {
    this.entries.set(key, { value, fetchedAt: this.now(), ttlMs: this.ttlFor(ttlClass) });
  }

  getOrFetch(key: string, ttlClass: TtlClass, fetcher: () => Promise<V>): Promise<V> {
    const cached = this.peek(key);
    if (cached !== undefined) return Promise.resolve(cached);

    const pending = this.inflight.get(key);
    if (pending) return pending;

    const p = Promise.resolve()
      .then(fetcher)
      .then(
        (value) => {
          this.set(key, value, ttlClass);
          return value;
        },
        (e: unknown) => {
          throw e instanceof CacheFetchError ? e : new CacheFetchError(key, e);
        },
      )
      .finally(() => {
        this.inflight.delete(key);
      });
    this.inflight.set(key, p);
    return p;
  }

  isFetching(key: string) {
    return this.inflight.has(key);
  }

  invalidate(key: string) {
    return this.entries.delete(key);
  }

  /** Removes every expired entry; returns how many were dropped. */
  prune() {
    const now = this.now();
    let dropped = 0;
    for (const [key, e] of this.entries) {
      if (now - e.fetchedAt >= e.ttlMs) {
        this.entries.delete(key);
        dropped++;
      }
    }
    return dropped;
  }

  clear() {
    this.entries.clear();
  }

  get size() {
    return this.entries.size;
  }
}

export type MarketCaches = {
  instruments: TtlCache<Instrument[]>;
  candles: TtlCache<Candle[]>;
};

export function createMarketCaches(policy?: Partial<TtlPolicy>, now?: () => number): MarketCaches {
  return {
    instruments: new TtlCache<Instrument[]>({ policy, now }),
    candles: new TtlCache<Candle[]>({ policy, now }),
  };
}
