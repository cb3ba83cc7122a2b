/**
 * Cache Manager Library
 *
 * In-memory key/value store with per-entry TTL, tag-based invalidation and
 * statistics. Holds export sessions and short-lived collection API
 * responses; everything lives in this process and disappears with it.
 *
 * Features:
 * - Automatic TTL management and periodic cleanup
 * - Sliding expiry for entries that should live while they are used
 * - Tag-based invalidation
 * - LRU eviction once the entry limit is reached
 * - Cache statistics and monitoring
 */

export interface CacheEntry<T = unknown> {
  key: string
  value: T
  createdAt: number
  expiresAt: number
  ttl: number
  sliding: boolean
  accessCount: number
  lastAccessed: number
  tags: string[]
}

export interface CacheConfig {
  defaultTtl: number        // Seconds
  maxEntries: number
  cleanupInterval: number   // Seconds, 0 disables the timer
}

export interface CacheStats {
  totalEntries: number
  hits: number
  misses: number
  hitRate: number
  evictionCount: number
}

export interface CacheSetOptions {
  ttl?: number
  tags?: string[]
  sliding?: boolean         // Refresh expiry on every read
}

const DEFAULT_CONFIG: CacheConfig = {
  defaultTtl: 300,
  maxEntries: 1000,
  cleanupInterval: 300
}

export class CacheManager {
  private config: CacheConfig
  private cache = new Map<string, CacheEntry>()
  private stats = { hits: 0, misses: 0, evictions: 0 }
  private cleanupTimer: ReturnType<typeof setInterval> | null = null

  constructor(config: Partial<CacheConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config }

    if (this.config.cleanupInterval > 0) {
      this.cleanupTimer = setInterval(() => this.cleanup(), this.config.cleanupInterval * 1000)
      this.cleanupTimer.unref()
    }
  }

  get<T>(key: string): T | null {
    const entry = this.cache.get(key)

    if (!entry) {
      this.stats.misses++
      return null
    }

    const now = Date.now()
    if (now > entry.expiresAt) {
      this.cache.delete(key)
      this.stats.misses++
      return null
    }

    entry.accessCount++
    entry.lastAccessed = now
    if (entry.sliding) {
      entry.expiresAt = now + entry.ttl * 1000
    }

    // Map keeps insertion order; re-inserting marks the entry most recently used
    this.cache.delete(key)
    this.cache.set(key, entry)

    this.stats.hits++
    return entry.value as T
  }

  set<T>(key: string, value: T, options: CacheSetOptions = {}): void {
    const now = Date.now()
    const ttl = options.ttl ?? this.config.defaultTtl

    this.cache.delete(key)
    if (this.cache.size >= this.config.maxEntries) {
      this.evictLeastRecentlyUsed()
    }

    this.cache.set(key, {
      key,
      value,
      createdAt: now,
      expiresAt: now + ttl * 1000,
      ttl,
      sliding: options.sliding ?? false,
      accessCount: 0,
      lastAccessed: now,
      tags: options.tags ?? []
    })
  }

  /**
   * Return the cached value, or compute, store and return it
   */
  async getOrSet<T>(key: string, factory: () => Promise<T>, options: CacheSetOptions = {}): Promise<T> {
    const cached = this.get<T>(key)
    if (cached !== null) return cached

    const value = await factory()
    this.set(key, value, options)
    return value
  }

  has(key: string): boolean {
    const entry = this.cache.get(key)
    return entry !== undefined && Date.now() <= entry.expiresAt
  }

  delete(key: string): boolean {
    return this.cache.delete(key)
  }

  invalidateByTags(tags: string[]): number {
    let deletedCount = 0
    for (const [key, entry] of this.cache) {
      if (entry.tags.some(tag => tags.includes(tag))) {
        this.cache.delete(key)
        deletedCount++
      }
    }
    return deletedCount
  }

  clear(): number {
    const deletedCount = this.cache.size
    this.cache.clear()
    return deletedCount
  }

  getStats(): CacheStats {
    const lookups = this.stats.hits + this.stats.misses
    return {
      totalEntries: this.cache.size,
      hits: this.stats.hits,
      misses: this.stats.misses,
      hitRate: lookups > 0 ? this.stats.hits / lookups : 0,
      evictionCount: this.stats.evictions
    }
  }

  /**
   * Remove expired entries
   */
  cleanup(): number {
    const now = Date.now()
    let removed = 0
    for (const [key, entry] of this.cache) {
      if (now > entry.expiresAt) {
        this.cache.delete(key)
        removed++
      }
    }
    return removed
  }

  destroy(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer)
      this.cleanupTimer = null
    }
    this.cache.clear()
  }

  private evictLeastRecentlyUsed(): void {
    const oldestKey = this.cache.keys().next()
    if (!oldestKey.done) {
      this.cache.delete(oldestKey.value)
      this.stats.evictions++
    }
  }
}

export function createCacheManager(config?: Partial<CacheConfig>): CacheManager {
  return new CacheManager(config)
}

/**
 * Cache key builders
 */
export const CacheKeys = {
  session: (sessionId: string) => `session:${sessionId}`,
  folders: (username: string) => `discogs:${username}:folders`,
  folderReleases: (username: string, folderId: number) => `discogs:${username}:folder:${folderId}`,
  userTag: (username: string) => `user:${username}`
}
