/**
 * Run-scoped memo cache
 *
 * Get-or-compute cache whose entries live for exactly one screening run.
 * Values are point-in-time facts (a balance at a block, a market's risk tier),
 * so nothing expires or is invalidated mid-run.
 *
 * Keys are explicit value types; `keyOf` maps a key to its identity string.
 *
 * @example
 * ```typescript
 * const balances = new RunCache<BalanceKey, number>(balanceKeyId);
 * const value = await balances.getOrComputeAsync(key, () => readBalance(key));
 * ```
 */

export interface RunCacheStats {
  size: number;
  hits: number;
  misses: number;
  /** Hit rate (0-1) */
  hitRate: number;
}

export class RunCache<K, V> {
  /** Boxed so that a cached `undefined` still counts as a hit */
  private readonly entries: Map<string, { value: V }> = new Map();
  private readonly pending: Map<string, Promise<V>> = new Map();
  private hits = 0;
  private misses = 0;

  constructor(private readonly keyOf: (key: K) => string) {}

  get(key: K): V | undefined {
    return this.entries.get(this.keyOf(key))?.value;
  }

  has(key: K): boolean {
    return this.entries.has(this.keyOf(key));
  }

  /**
   * Return the cached value for `key`, computing and storing it on a miss
   */
  getOrCompute(key: K, compute: () => V): V {
    const id = this.keyOf(key);
    const cached = this.entries.get(id);
    if (cached) {
      this.hits++;
      return cached.value;
    }

    this.misses++;
    const value = compute();
    this.entries.set(id, { value });
    return value;
  }

  /**
   * Async variant. Concurrent callers for the same key share one computation;
   * a rejected computation is not cached, so a later call retries it.
   */
  async getOrComputeAsync(key: K, compute: () => Promise<V>): Promise<V> {
    const id = this.keyOf(key);
    const cached = this.entries.get(id);
    if (cached) {
      this.hits++;
      return cached.value;
    }

    const inFlight = this.pending.get(id);
    if (inFlight) {
      this.hits++;
      return inFlight;
    }

    this.misses++;
    const promise = compute();
    this.pending.set(id, promise);
    try {
      const value = await promise;
      this.entries.set(id, { value });
      return value;
    } finally {
      this.pending.delete(id);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  getStats(): RunCacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups > 0 ? this.hits / lookups : 0,
    };
  }

  clear(): void {
    this.entries.clear();
    this.pending.clear();
    this.hits = 0;
    this.misses = 0;
  }
}
