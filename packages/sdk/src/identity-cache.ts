/**
 * Bidirectional principal id ↔ display name cache
 *
 * Invariants:
 * - Ids are stored lower-case; name lookups ignore case
 * - The latest put wins in each direction; entries are never removed during a run
 * - Entries without a name are counted but not cached
 */

import { DirectoryUnavailableError } from "./errors.js";
import type { IdentityDirectory, Profile } from "./types.js";

/**
 * Outcome of one bulk population
 */
export interface PopulateSummary {
  /** Entries cached */
  loaded: number;
  /** Entries the directory returned without a name */
  nameless: number;
}

export class IdentityCache {
  #idToName = new Map<string, string>();
  #nameToId = new Map<string, string>();

  /**
   * Record the current name of a principal
   */
  put(id: string, name: string): void {
    const normalizedId = id.toLowerCase();
    this.#idToName.set(normalizedId, name);
    this.#nameToId.set(name.toLowerCase(), normalizedId);
  }

  nameOf(id: string): string | undefined {
    return this.#idToName.get(id.toLowerCase());
  }

  idOf(name: string): string | undefined {
    return this.#nameToId.get(name.toLowerCase());
  }

  get size(): number {
    return this.#idToName.size;
  }

  /**
   * Latest (id, name) pair of every cached principal
   */
  profiles(): Profile[] {
    return Array.from(this.#idToName, ([id, name]) => ({ id, name }));
  }

  /**
   * Copy every entry of a directory into the cache.
   * Entries read before a failure stay cached.
   *
   * @throws DirectoryUnavailableError if the directory cannot be enumerated
   */
  async populate(directory: IdentityDirectory): Promise<PopulateSummary> {
    const summary: PopulateSummary = { loaded: 0, nameless: 0 };
    try {
      for await (const entry of directory.entries()) {
        if (entry.name === null || entry.name === "") {
          summary.nameless++;
          continue;
        }
        this.put(entry.id, entry.name);
        summary.loaded++;
      }
    } catch (err) {
      if (err instanceof DirectoryUnavailableError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new DirectoryUnavailableError(`${reason} (after ${summary.loaded} entries)`, {
        cause: err,
      });
    }
    return summary;
  }
}
