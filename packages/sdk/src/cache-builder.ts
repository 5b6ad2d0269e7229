/**
 * Start-up construction of the alias index and the identity cache
 *
 * Order: every scope's index is rebuilt before build() returns. Identity population
 * either finishes inside build() or runs in the background; in both cases the
 * `identityReady` promise is the join point and never rejects.
 */

import { performance } from "node:perf_hooks";
import { AliasIndex } from "./indexes.js";
import type { RebuildStats } from "./indexes.js";
import { IdentityCache } from "./identity-cache.js";
import type { PopulateSummary } from "./identity-cache.js";
import { DirectoryUnavailableError, ScopeNotFoundError } from "./errors.js";
import { DEFAULT_ID_PREFIX, isProtectedArea } from "./region.js";
import type { IdentityDirectory, ProfileCache, RecordStore } from "./types.js";
import { logger } from "./observability/logs.js";

export interface CacheBuilderOptions {
  idPrefix?: string;
  /** Populate identities in the background (default: false) */
  asyncIdentityLoad?: boolean;
  /** Receives loaded identities for reuse by other subsystems */
  profileCache?: ProfileCache;
}

export interface IdentityLoadSummary extends PopulateSummary {
  /** "unavailable" when the directory failed; entries read before the failure stay cached */
  status: "loaded" | "unavailable";
  /** Profiles forwarded to the profile cache */
  pushed: number;
  durationMs: number;
  error?: DirectoryUnavailableError;
}

export interface BuildResult {
  scopes: RebuildStats[];
  /** True when identities are still loading after build() returned */
  background: boolean;
  identityReady: Promise<IdentityLoadSummary>;
}

export class CacheBuilder {
  #store: RecordStore;
  #directory: IdentityDirectory;
  #index: AliasIndex;
  #identities: IdentityCache;
  #idPrefix: string;
  #asyncIdentityLoad: boolean;
  #profileCache: ProfileCache | undefined;

  constructor(
    store: RecordStore,
    directory: IdentityDirectory,
    index: AliasIndex,
    identities: IdentityCache,
    options: CacheBuilderOptions = {}
  ) {
    this.#store = store;
    this.#directory = directory;
    this.#index = index;
    this.#identities = identities;
    this.#idPrefix = options.idPrefix ?? DEFAULT_ID_PREFIX;
    this.#asyncIdentityLoad = options.asyncIdentityLoad ?? false;
    this.#profileCache = options.profileCache;
  }

  async build(): Promise<BuildResult> {
    const scopes = await this.rebuildIndex();

    logger.info("cache.identity.start", {
      message: this.#asyncIdentityLoad
        ? "loading identities in the background"
        : "loading identities",
    });
    const identityReady = this.loadIdentities();

    if (this.#asyncIdentityLoad) {
      return { scopes, background: true, identityReady };
    }

    await identityReady;
    return { scopes, background: false, identityReady };
  }

  /**
   * Rebuild one scope's index, or every scope's when none is given.
   * A full rebuild swaps in each scope as it is read and then drops scopes the
   * store no longer has; a failed read leaves the remaining scopes as they were.
   *
   * @throws ScopeNotFoundError if the given scope is unknown to the store
   */
  async rebuildIndex(scope?: string): Promise<RebuildStats[]> {
    if (scope !== undefined) {
      if (!(await this.#store.hasScope(scope))) {
        throw new ScopeNotFoundError(scope);
      }
      return [await this.#rebuildScope(scope)];
    }

    const known = await this.#store.scopes();
    const stats: RebuildStats[] = [];
    for (const scope of known) {
      stats.push(await this.#rebuildScope(scope));
    }

    const dropped = await this.#index.retain(known);
    if (dropped.length > 0) {
      logger.info("index.scope.dropped", { details: { scopes: dropped.join(",") } });
    }
    return stats;
  }

  /**
   * Populate the identity cache from the directory and forward it to the profile cache
   */
  async loadIdentities(): Promise<IdentityLoadSummary> {
    const startTime = performance.now();
    let populated: PopulateSummary = { loaded: 0, nameless: 0 };
    let error: DirectoryUnavailableError | undefined;

    try {
      populated = await this.#identities.populate(this.#directory);
    } catch (err) {
      if (!(err instanceof DirectoryUnavailableError)) throw err;
      error = err;
      logger.warn("cache.identity.unavailable", {
        message: `${err.message}; legacy names may stay unconverted`,
      });
    }

    const pushed = await this.#pushProfiles();
    const summary: IdentityLoadSummary = {
      ...populated,
      status: error ? "unavailable" : "loaded",
      pushed,
      durationMs: performance.now() - startTime,
      ...(error ? { error } : {}),
    };

    logger.info("cache.identity.end", {
      details: {
        status: summary.status,
        loaded: summary.loaded,
        cached: this.#identities.size,
        nameless: summary.nameless,
        durationMs: summary.durationMs.toFixed(2),
      },
    });
    return summary;
  }

  async #rebuildScope(scope: string): Promise<RebuildStats> {
    const regions = await this.#store.list(scope);
    const records = regions.filter((region) => isProtectedArea(region, this.#idPrefix));
    return this.#index.rebuild(scope, records);
  }

  async #pushProfiles(): Promise<number> {
    if (!this.#profileCache) return 0;

    const profiles = this.#identities.profiles();
    try {
      await this.#profileCache.put(profiles);
      return profiles.length;
    } catch (err) {
      logger.warn("cache.profiles.failed", {
        message: err instanceof Error ? err.message : String(err),
      });
      return 0;
    }
  }
}
