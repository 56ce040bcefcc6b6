import type { FetchKlinesParams, KlineFetcher } from "@/lib/market/binance";
import type { Candle } from "@/types";

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export interface TtlCacheOptions {
  ttlMs: number;
  maxEntries?: number;
  now?: () => number;
}

/**
 * Map-backed cache with a per-entry TTL. When `maxEntries` is exceeded the
 * oldest insertion is evicted first.
 */
export class TtlCache<T> {
  private entries = new Map<string, CacheEntry<T>>();

  private readonly ttlMs: number;

  private readonly maxEntries: number;

  private readonly now: () => number;

  constructor(options: TtlCacheOptions) {
    this.ttlMs = Math.max(0, options.ttlMs);
    this.maxEntries = Math.max(1, Math.floor(options.maxEntries ?? 500));
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T, ttlMs: number = this.ttlMs): void {
    this.entries.delete(key);
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }
}

export function klineCacheKey(params: FetchKlinesParams): string {
  return [params.symbol.toUpperCase(), params.interval, params.limit ?? "", params.startTime ?? ""].join(":");
}

export function createCachedCandleSource(fetcher: KlineFetcher, cache: TtlCache<Candle[]>): KlineFetcher {
  return async (params) => {
    const key = klineCacheKey(params);
    const cached = cache.get(key);
    if (cached) {
      return cached.map((candle) => ({ ...candle }));
    }
    const candles = await fetcher(params);
    cache.set(key, candles.map((candle) => ({ ...candle })));
    return candles;
  };
}
