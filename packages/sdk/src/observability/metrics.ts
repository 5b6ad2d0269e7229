/**
 * Metrics tracking for alias index operations, per world scope
 */

export interface ScopeMetrics {
  /** Alias lookups that returned at least one live record */
  hitCount: number;
  /** Alias lookups that returned nothing */
  missCount: number;
  /** Stale ids dropped by lazy eviction */
  evictedCount: number;
  rebuildTimeMs: number[];
  /** Distinct aliases after the last rebuild */
  keys: number;
}

const MAX_SAMPLES = 100;

class MetricsCollector {
  #metrics = new Map<string, ScopeMetrics>();

  #getMetrics(scope: string): ScopeMetrics {
    let metrics = this.#metrics.get(scope);
    if (!metrics) {
      metrics = {
        hitCount: 0,
        missCount: 0,
        evictedCount: 0,
        rebuildTimeMs: [],
        keys: 0,
      };
      this.#metrics.set(scope, metrics);
    }
    return metrics;
  }

  recordHit(scope: string): void {
    this.#getMetrics(scope).hitCount++;
  }

  recordMiss(scope: string): void {
    this.#getMetrics(scope).missCount++;
  }

  recordEvictions(scope: string, count: number): void {
    this.#getMetrics(scope).evictedCount += count;
  }

  /**
   * Record rebuild time and the resulting key count
   */
  recordRebuild(scope: string, ms: number, keys: number): void {
    const metrics = this.#getMetrics(scope);
    metrics.rebuildTimeMs.push(ms);
    metrics.keys = keys;

    // Keep only the most recent samples
    if (metrics.rebuildTimeMs.length > MAX_SAMPLES) {
      metrics.rebuildTimeMs.shift();
    }
  }

  getMetrics(scope: string): ScopeMetrics | undefined {
    return this.#metrics.get(scope);
  }

  getAllMetrics(): Map<string, ScopeMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Fraction of alias lookups that found a live record
   */
  getHitRate(scope: string): number {
    const metrics = this.#getMetrics(scope);
    const total = metrics.hitCount + metrics.missCount;
    return total > 0 ? metrics.hitCount / total : 0;
  }

  /**
   * Calculate p95 for a list of samples
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  reset(scope?: string): void {
    if (scope) {
      this.#metrics.delete(scope);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
