import type { CacheStats } from "../../ports/cache-stats"

/**
 * Process-local counters fed by the cache manager. Not persisted.
 */
export class CacheStatistics {
  private hits = 0
  private misses = 0
  private sets = 0
  private deletes = 0
  private errors = 0

  recordHit(): void {
    this.hits++
  }

  recordMiss(): void {
    this.misses++
  }

  recordSet(count = 1): void {
    this.sets += count
  }

  recordDelete(count = 1): void {
    this.deletes += count
  }

  recordError(): void {
    this.errors++
  }

  getStats(): CacheStats {
    const reads = this.hits + this.misses

    return {
      hits: this.hits,
      misses: this.misses,
      sets: this.sets,
      deletes: this.deletes,
      errors: this.errors,
      hitRate: reads === 0 ? 0 : this.hits / reads,
    }
  }

  reset(): void {
    this.hits = 0
    this.misses = 0
    this.sets = 0
    this.deletes = 0
    this.errors = 0
  }
}
