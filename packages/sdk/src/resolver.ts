/**
 * Resolves caller-supplied tokens (record id or alias) to protected areas
 */

import { AliasIndex } from "./indexes.js";
import { ScopeNotFoundError, RecordNotFoundError } from "./errors.js";
import { DEFAULT_ID_PREFIX, isProtectedArea } from "./region.js";
import { refersTo } from "./principal.js";
import type { ProtectedAreaRecord, RecordStore } from "./types.js";
import { logger } from "./observability/logs.js";

export interface ResolverOptions {
  /** Id prefix that marks protected areas (default: "ps") */
  idPrefix?: string;
}

export interface RecordsOfOptions {
  /** Also return areas where the principal is only a member */
  includeMembers?: boolean;
}

/**
 * Read path over the store and the alias index. Lookups prune the index as a side effect.
 */
export class RecordResolver {
  #store: RecordStore;
  #index: AliasIndex;
  #idPrefix: string;

  constructor(store: RecordStore, index: AliasIndex, options: ResolverOptions = {}) {
    this.#store = store;
    this.#index = index;
    this.#idPrefix = options.idPrefix ?? DEFAULT_ID_PREFIX;
  }

  /**
   * Resolve a token in a scope.
   *
   * An exact id match wins and is returned alone. Otherwise the token is an alias and
   * every live area carrying it is returned. An empty array means no match.
   *
   * @throws ScopeNotFoundError if the store does not know the scope
   */
  async resolve(scope: string, token: string): Promise<ProtectedAreaRecord[]> {
    if (!(await this.#store.hasScope(scope))) {
      throw new ScopeNotFoundError(scope);
    }

    const exact = await this.#live(scope, token);
    if (exact) {
      return [exact];
    }

    return this.#byAlias(scope, token);
  }

  /**
   * Whether any live area in any indexed scope carries the alias
   */
  async aliasExistsAnywhere(alias: string): Promise<boolean> {
    for (const scope of this.#index.scopes()) {
      const live = await this.#byAlias(scope, alias);
      if (live.length > 0) return true;
    }
    return false;
  }

  /**
   * Areas in a scope owned by a principal, optionally including those it is a member of.
   * Scans the store; only identifier-form entries match.
   */
  async recordsOf(
    scope: string,
    principalId: string,
    options: RecordsOfOptions = {}
  ): Promise<ProtectedAreaRecord[]> {
    const regions = await this.#store.list(scope);
    return regions
      .filter((region) => isProtectedArea(region, this.#idPrefix))
      .filter(
        (record) =>
          record.owners.some((ref) => refersTo(ref, principalId)) ||
          (options.includeMembers === true &&
            record.members.some((ref) => refersTo(ref, principalId)))
      );
  }

  /**
   * Set or clear an area's alias through the store and keep the index in step
   *
   * @throws RecordNotFoundError if no live area has the id
   */
  async renameRecord(
    scope: string,
    id: string,
    alias: string | undefined
  ): Promise<ProtectedAreaRecord> {
    const record = await this.#live(scope, id);
    if (!record) {
      throw new RecordNotFoundError(scope, id);
    }

    await this.#store.setAlias(scope, id, alias);

    if (record.alias !== undefined) {
      await this.#index.untrack(scope, record.alias, id);
    }
    if (alias !== undefined) {
      await this.#index.track(scope, alias, id);
    }

    logger.info("record.rename", {
      scope,
      record: id,
      details: { from: record.alias ?? null, to: alias ?? null },
    });

    const renamed: ProtectedAreaRecord = { ...record };
    if (alias === undefined) {
      delete renamed.alias;
    } else {
      renamed.alias = alias;
    }
    return renamed;
  }

  async #byAlias(scope: string, alias: string): Promise<ProtectedAreaRecord[]> {
    // An id is stale once its area is gone or renamed away from this alias
    return this.#index.lookup(scope, alias, async (id) => {
      const record = await this.#live(scope, id);
      return record && record.alias === alias ? record : null;
    });
  }

  async #live(scope: string, id: string): Promise<ProtectedAreaRecord | null> {
    const region = await this.#store.get(scope, id);
    return isProtectedArea(region, this.#idPrefix) ? region : null;
  }
}
