/**
 * Bounded LRU map for prepared statements
 *
 * Relies on Map insertion order: a hit moves the entry to the end, and the
 * first entry is the least recently used one.
 *
 * @example
 * ```typescript
 * const cache = new LRUCache<string, Statement>({ maxEntries: 256 })
 * cache.set(sql, statement)
 * cache.get(sql)
 * ```
 *
 * @module utils/lru-cache
 */

export interface LRUCacheOptions<K, V> {
  /** Maximum number of entries, at least 1 */
  maxEntries: number
  /** Called for entries dropped to make room */
  onEvict?: ((key: K, value: V) => void) | undefined
}

export interface LRUCacheStats {
  hits: number
  misses: number
  evictions: number
  size: number
}

export class LRUCache<K, V> {
  private readonly entries = new Map<K, V>()
  private readonly maxEntries: number
  private readonly onEvict: ((key: K, value: V) => void) | undefined
  private hits = 0
  private misses = 0
  private evictions = 0

  constructor(options: LRUCacheOptions<K, V>) {
    this.maxEntries = Math.max(1, Math.floor(options.maxEntries))
    this.onEvict = options.onEvict
  }

  get size(): number {
    return this.entries.size
  }

  get(key: K): V | undefined {
    if (!this.entries.has(key)) {
      this.misses++
      return undefined
    }
    const value = this.entries.get(key)
    this.entries.delete(key)
    if (value !== undefined) this.entries.set(key, value)
    this.hits++
    return value
  }

  has(key: K): boolean {
    return this.entries.has(key)
  }

  set(key: K, value: V): void {
    this.entries.delete(key)
    this.entries.set(key, value)
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.entries().next()
      if (oldest.done) break
      const [oldestKey, oldestValue] = oldest.value
      this.entries.delete(oldestKey)
      this.evictions++
      this.onEvict?.(oldestKey, oldestValue)
    }
  }

  delete(key: K): boolean {
    return this.entries.delete(key)
  }

  clear(): void {
    this.entries.clear()
  }

  getStats(): LRUCacheStats {
    return { hits: this.hits, misses: this.misses, evictions: this.evictions, size: this.entries.size }
  }
}
