/**
 * BoundedCache — Size-limited, namespace-scoped memoization.
 *
 * - LRU eviction once `maxSize` entries are held
 * - Write-once per key: a cached value is never replaced by a later load
 * - Single-flight loads: concurrent callers of one key share one promise
 * - Failed loads are not cached
 * - Loads that settle after `clear()` are returned but not cached
 */

/**
 * Counters for one cache namespace.
 */
export interface CacheStats {
  namespace: string;
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  sets: number;
  evictions: number;
  /** Callers that joined a load already in flight */
  coalesced: number;
}

export const DEFAULT_CACHE_SIZE = 256;

interface Slot<V> {
  value: V;
}

export class BoundedCache<V> {
  private readonly entries: Map<string, Slot<V>> = new Map();
  private readonly inFlight: Map<string, Promise<V>> = new Map();
  private hits = 0;
  private misses = 0;
  private sets = 0;
  private evictions = 0;
  private coalesced = 0;
  private generation = 0;

  constructor(
    readonly namespace: string,
    readonly maxSize: number = DEFAULT_CACHE_SIZE
  ) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`Cache '${namespace}' maxSize must be a positive integer, got ${maxSize}`);
    }
  }

  /**
   * Get a cached value, marking it as recently used.
   */
  get(key: string): V | undefined {
    const slot = this.lookup(key);
    if (slot === undefined) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    return slot.value;
  }

  /**
   * Read a value without touching recency or counters.
   */
  peek(key: string): V | undefined {
    return this.entries.get(key)?.value;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  /**
   * Store a value unless the key is already held.
   * Returns the value held for the key afterwards.
   */
  set(key: string, value: V): V {
    const existing = this.entries.get(key);
    if (existing !== undefined) {
      return existing.value;
    }
    this.entries.set(key, { value });
    this.sets++;
    while (this.entries.size > this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
      this.evictions++;
    }
    return value;
  }

  /**
   * Return the cached value, or run `loader` once and cache its result.
   */
  async getOrLoad(key: string, loader: () => Promise<V>): Promise<V> {
    const slot = this.lookup(key);
    if (slot !== undefined) {
      this.hits++;
      return slot.value;
    }

    const pending = this.inFlight.get(key);
    if (pending !== undefined) {
      this.coalesced++;
      return pending;
    }

    this.misses++;
    const generation = this.generation;
    const load = (async () => {
      try {
        const value = await loader();
        return generation === this.generation ? this.set(key, value) : value;
      } finally {
        if (generation === this.generation) {
          this.inFlight.delete(key);
        }
      }
    })();
    this.inFlight.set(key, load);
    return load;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Drop every entry and reset counters. Loads in flight still settle for
   * their callers but no longer write into the cache.
   */
  clear(): void {
    this.generation++;
    this.entries.clear();
    this.inFlight.clear();
    this.hits = 0;
    this.misses = 0;
    this.sets = 0;
    this.evictions = 0;
    this.coalesced = 0;
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    return {
      namespace: this.namespace,
      size: this.entries.size,
      maxSize: this.maxSize,
      hits: this.hits,
      misses: this.misses,
      sets: this.sets,
      evictions: this.evictions,
      coalesced: this.coalesced,
    };
  }

  private lookup(key: string): Slot<V> | undefined {
    const slot = this.entries.get(key);
    if (slot !== undefined) {
      this.entries.delete(key);
      this.entries.set(key, slot);
    }
    return slot;
  }
}
