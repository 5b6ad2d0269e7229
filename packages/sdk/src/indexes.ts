/**
 * In-memory alias index over the authoritative region store
 *
 * Maps (scope, alias) to the ids of the protected areas believed to carry that alias.
 *
 * Invariants:
 * - Id lists keep store enumeration order and hold no duplicates
 * - An alias bucket may hold stale ids until the next lookup of that alias;
 *   a lookup removes every id that was stale when it ran
 * - Rebuilding a scope discards all previous state for that scope, swapping
 *   the new buckets in at once so lookups never see a half-built scope
 * - Mutations of one scope are serialized via its mutex
 */

import { performance } from "node:perf_hooks";
import { MutexMap } from "./lock.js";
import type { ProtectedAreaRecord } from "./types.js";
import { metrics } from "./observability/metrics.js";
import { logger } from "./observability/logs.js";

/**
 * Alias map of one scope: alias → record ids
 */
export type AliasBuckets = Map<string, string[]>;

/**
 * Result of rebuilding one scope
 */
export interface RebuildStats {
  scope: string;
  /** Records scanned */
  records: number;
  /** Distinct aliases indexed */
  keys: number;
  durationMs: number;
}

/**
 * Per-scope alias → ids index with lazy eviction of stale ids
 */
export class AliasIndex {
  #scopes = new Map<string, AliasBuckets>();
  #locks = new MutexMap();

  /**
   * Recompute a scope's buckets from a full snapshot of its records
   */
  async rebuild(scope: string, records: readonly ProtectedAreaRecord[]): Promise<RebuildStats> {
    return this.#locks.get(scope).withLock(async () => {
      const startTime = performance.now();
      logger.debug("index.rebuild.start", { scope });

      const buckets: AliasBuckets = new Map();
      for (const record of records) {
        if (record.alias === undefined) continue;
        const bucket = buckets.get(record.alias);
        if (!bucket) {
          buckets.set(record.alias, [record.id]);
        } else if (!bucket.includes(record.id)) {
          bucket.push(record.id);
        }
      }
      this.#scopes.set(scope, buckets);

      const durationMs = performance.now() - startTime;
      metrics.recordRebuild(scope, durationMs, buckets.size);
      logger.info("index.rebuild.end", {
        scope,
        details: { durationMs: durationMs.toFixed(2), records: records.length, keys: buckets.size },
      });

      return { scope, records: records.length, keys: buckets.size, durationMs };
    });
  }

  /**
   * Look up an alias, re-checking every id with `fetch`.
   *
   * Ids for which `fetch` yields null are removed from the bucket for good.
   * Survivors are returned in bucket order.
   */
  async lookup<T>(
    scope: string,
    alias: string,
    fetch: (id: string) => Promise<T | null>
  ): Promise<T[]> {
    return this.#locks.get(scope).withLock(async () => {
      const buckets = this.#scopes.get(scope);
      const bucket = buckets?.get(alias);
      if (!buckets || !bucket) {
        metrics.recordMiss(scope);
        return [];
      }

      const live: T[] = [];
      const kept: string[] = [];
      for (const id of bucket) {
        const found = await fetch(id);
        if (found === null) continue;
        kept.push(id);
        live.push(found);
      }

      const evicted = bucket.length - kept.length;
      if (evicted > 0) {
        metrics.recordEvictions(scope, evicted);
        logger.debug("index.evict", { scope, details: { alias, evicted } });
      }

      if (kept.length === 0) {
        buckets.delete(alias);
      } else {
        buckets.set(alias, kept);
      }

      if (live.length > 0) {
        metrics.recordHit(scope);
      } else {
        metrics.recordMiss(scope);
      }
      return live;
    });
  }

  /**
   * Add an id under an alias (no-op if already present)
   */
  async track(scope: string, alias: string, id: string): Promise<void> {
    await this.#locks.get(scope).withLock(async () => {
      let buckets = this.#scopes.get(scope);
      if (!buckets) {
        buckets = new Map();
        this.#scopes.set(scope, buckets);
      }
      const bucket = buckets.get(alias);
      if (!bucket) {
        buckets.set(alias, [id]);
      } else if (!bucket.includes(id)) {
        bucket.push(id);
      }
    });
  }

  /**
   * Remove an id from an alias bucket (no-op if absent)
   */
  async untrack(scope: string, alias: string, id: string): Promise<void> {
    await this.#locks.get(scope).withLock(async () => {
      const buckets = this.#scopes.get(scope);
      const bucket = buckets?.get(alias);
      if (!buckets || !bucket) return;

      const kept = bucket.filter((existing) => existing !== id);
      if (kept.length === 0) {
        buckets.delete(alias);
      } else {
        buckets.set(alias, kept);
      }
    });
  }

  /**
   * Scopes that have been built
   */
  scopes(): string[] {
    return Array.from(this.#scopes.keys());
  }

  hasScope(scope: string): boolean {
    return this.#scopes.has(scope);
  }

  /**
   * Ids currently listed under an alias, without re-checking the store
   */
  ids(scope: string, alias: string): string[] {
    return [...(this.#scopes.get(scope)?.get(alias) ?? [])];
  }

  /**
   * Copy of a scope's buckets for inspection
   */
  snapshot(scope: string): Record<string, string[]> {
    const buckets = this.#scopes.get(scope) ?? new Map<string, string[]>();
    // fromEntries defines own keys, so an alias such as "__proto__" survives
    return Object.fromEntries(
      Array.from(buckets, ([alias, ids]): [string, string[]] => [alias, [...ids]])
    );
  }

  /**
   * Drop every built scope not in `scopes`, each under its own lock
   *
   * @returns the scopes that were dropped
   */
  async retain(scopes: Iterable<string>): Promise<string[]> {
    const keep = new Set(scopes);
    const dropped: string[] = [];
    for (const scope of this.scopes()) {
      if (keep.has(scope)) continue;
      await this.#locks.get(scope).withLock(async () => {
        this.#scopes.delete(scope);
      });
      dropped.push(scope);
    }
    return dropped;
  }
}
