/**
 * Bounded LRU cache with optional TTL and hit/miss/eviction counters.
 *
 * Map iteration order is insertion order, so re-inserting a key on access
 * keeps the least recently used entry at the front. Every operation is
 * synchronous and therefore atomic on the event loop.
 */

export interface CacheStats {
  name: string;
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  puts: number;
  evictions: number;
  hitRate: number;
}

export interface BoundedCacheOptions {
  maxSize: number;
  /** Entries older than this are treated as absent. 0 or undefined disables expiry. */
  ttlMs?: number;
  name?: string;
  now?: () => number;
}

interface CacheEntry<V> {
  value: V;
  timestamp: number;
}

export class BoundedCache<K, V> {
  readonly name: string;
  readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private entries = new Map<K, CacheEntry<V>>();

  private hits = 0;
  private misses = 0;
  private puts = 0;
  private evictions = 0;

  constructor(options: BoundedCacheOptions) {
    if (!Number.isInteger(options.maxSize) || options.maxSize < 1) {
      throw new RangeError(`Cache maxSize must be a positive integer, got ${options.maxSize}`);
    }
    this.name = options.name ?? "cache";
    this.maxSize = options.maxSize;
    this.ttlMs = options.ttlMs ?? 0;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      this.misses++;
      this.evictions++;
      return undefined;
    }

    // Move to most-recently-used position
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry.value;
  }

  put(key: K, value: V): void {
    this.entries.delete(key);
    this.entries.set(key, { value, timestamp: this.now() });
    this.puts++;

    while (this.entries.size > this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }

  remove(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    this.entries.delete(key);
    return entry.value;
  }

  /** Presence check; does not touch LRU order or hit/miss counters. */
  containsKey(key: K): boolean {
    const entry = this.entries.get(key);
    if (!entry) return false;

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      this.evictions++;
      return false;
    }
    return true;
  }

  clear(): void {
    this.entries.clear();
  }

  /** Drop every expired entry, returning how many were removed. */
  cleanupExpired(): number {
    if (this.ttlMs <= 0) return 0;

    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        removed++;
      }
    }
    this.evictions += removed;
    return removed;
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      name: this.name,
      size: this.entries.size,
      maxSize: this.maxSize,
      hits: this.hits,
      misses: this.misses,
      puts: this.puts,
      evictions: this.evictions,
      hitRate: lookups > 0 ? this.hits / lookups : 0,
    };
  }

  logStats(): void {
    const s = this.stats();
    console.error(
      `[cache:${s.name}] size=${s.size}/${s.maxSize} hits=${s.hits} misses=${s.misses} ` +
      `puts=${s.puts} evictions=${s.evictions} hitRate=${(s.hitRate * 100).toFixed(1)}%`
    );
  }

  private isExpired(entry: CacheEntry<V>): boolean {
    return this.ttlMs > 0 && this.now() - entry.timestamp > this.ttlMs;
  }
}

// ============================================================================
// Loading cache
// ============================================================================

export interface LoadingCacheOptions<K, V> extends BoundedCacheOptions {
  loader: (key: K) => Promise<V | null | undefined>;
  /**
   * Share one loader call between concurrent misses for the same key.
   * Off by default: concurrent misses each invoke the loader.
   */
  coalesceConcurrentLoads?: boolean;
}

export class LoadingCache<K, V> {
  private readonly cache: BoundedCache<K, V>;
  private readonly loader: (key: K) => Promise<V | null | undefined>;
  private readonly coalesce: boolean;
  private inFlight = new Map<K, Promise<V | undefined>>();

  constructor(options: LoadingCacheOptions<K, V>) {
    this.cache = new BoundedCache<K, V>(options);
    this.loader = options.loader;
    this.coalesce = options.coalesceConcurrentLoads ?? false;
  }

  async get(key: K): Promise<V | undefined> {
    const cached = this.cache.get(key);
    if (cached !== undefined) return cached;

    if (!this.coalesce) {
      return this.load(key);
    }

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const load = this.load(key).finally(() => this.inFlight.delete(key));
    this.inFlight.set(key, load);
    return load;
  }

  put(key: K, value: V): void {
    this.cache.put(key, value);
  }

  invalidate(key: K): void {
    this.cache.remove(key);
  }

  invalidateAll(): void {
    this.cache.clear();
  }

  stats(): CacheStats {
    return this.cache.stats();
  }

  logStats(): void {
    this.cache.logStats();
  }

  private async load(key: K): Promise<V | undefined> {
    const value = await this.loader(key);
    if (value === null || value === undefined) return undefined;
    this.cache.put(key, value);
    return value;
  }
}
