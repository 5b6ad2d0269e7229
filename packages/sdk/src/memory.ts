/**
 * In-memory collaborators for embedding and tests
 */

import { ScopeNotFoundError, RecordNotFoundError } from "./errors.js";
import { parseConfig } from "./config.js";
import type { PersistentConfig, StonewardConfig } from "./config.js";
import type {
  DirectoryEntry,
  IdentityDirectory,
  Membership,
  PermissionSet,
  Profile,
  ProfileCache,
  RecordStore,
  StoredRegion,
} from "./types.js";

/**
 * Region store kept in maps, one per scope. Reads and writes copy regions.
 */
export class MemoryRecordStore implements RecordStore {
  #scopes = new Map<string, Map<string, StoredRegion>>();
  /** Regions written back through updateMembership, in call order */
  readonly membershipWrites: Array<{ scope: string; id: string }> = [];

  constructor(regions: Iterable<StoredRegion> = [], scopes: Iterable<string> = []) {
    for (const scope of scopes) {
      this.addScope(scope);
    }
    for (const region of regions) {
      this.put(region);
    }
  }

  addScope(scope: string): void {
    if (!this.#scopes.has(scope)) {
      this.#scopes.set(scope, new Map());
    }
  }

  /**
   * Insert or replace a region, creating its scope if needed.
   * Does not notify any index, like a foreign writer.
   */
  put(region: StoredRegion): void {
    this.addScope(region.worldScope);
    this.#scopes.get(region.worldScope)?.set(region.id, structuredClone(region));
  }

  /**
   * Delete a region without notifying any index
   */
  remove(scope: string, id: string): boolean {
    return this.#scopes.get(scope)?.delete(id) ?? false;
  }

  async scopes(): Promise<string[]> {
    return Array.from(this.#scopes.keys());
  }

  async hasScope(scope: string): Promise<boolean> {
    return this.#scopes.has(scope);
  }

  async get(scope: string, id: string): Promise<StoredRegion | null> {
    const region = this.#scopes.get(scope)?.get(id);
    return region ? structuredClone(region) : null;
  }

  async list(scope: string): Promise<StoredRegion[]> {
    return Array.from(this.#regionsOf(scope).values(), (region) => structuredClone(region));
  }

  async updateMembership(scope: string, id: string, membership: Membership): Promise<void> {
    const region = this.#require(scope, id);
    region.owners = structuredClone(membership.owners);
    region.members = structuredClone(membership.members);
    this.membershipWrites.push({ scope, id });
  }

  async setAlias(scope: string, id: string, alias: string | undefined): Promise<void> {
    const region = this.#require(scope, id);
    if (alias === undefined) {
      delete region.alias;
    } else {
      region.alias = alias;
    }
  }

  #regionsOf(scope: string): Map<string, StoredRegion> {
    const regions = this.#scopes.get(scope);
    if (!regions) {
      throw new ScopeNotFoundError(scope);
    }
    return regions;
  }

  #require(scope: string, id: string): StoredRegion {
    const region = this.#regionsOf(scope).get(id);
    if (!region) {
      throw new RecordNotFoundError(scope, id);
    }
    return region;
  }
}

/**
 * Directory over a fixed list of entries
 */
export class MemoryIdentityDirectory implements IdentityDirectory {
  #entries: DirectoryEntry[];

  constructor(entries: Iterable<DirectoryEntry> = []) {
    this.#entries = Array.from(entries);
  }

  add(entry: DirectoryEntry): void {
    this.#entries.push(entry);
  }

  async *entries(): AsyncIterable<DirectoryEntry> {
    for (const entry of this.#entries) {
      yield entry;
    }
  }
}

/**
 * Grants held in a map keyed by principal
 */
export class StaticPermissionSet implements PermissionSet {
  #grants: Map<string, string[]>;

  constructor(grants: Record<string, string[]> = {}) {
    this.#grants = new Map(Object.entries(grants));
  }

  grant(principal: string, ...grants: string[]): void {
    this.#grants.set(principal, [...(this.#grants.get(principal) ?? []), ...grants]);
  }

  effectiveGrants(principal: string): Iterable<string> {
    return [...(this.#grants.get(principal) ?? [])];
  }
}

/**
 * Config held in memory; the guard flag survives for the life of the object
 */
export class MemoryConfig implements PersistentConfig {
  #config: StonewardConfig;
  /** Number of times the guard was persisted */
  guardWrites = 0;

  constructor(raw: unknown = {}) {
    this.#config = parseConfig(raw, "<memory>");
  }

  async read(): Promise<StonewardConfig> {
    return structuredClone(this.#config);
  }

  async setMigrationComplete(complete: boolean): Promise<void> {
    this.#config.migration.identifiersComplete = complete;
    this.guardWrites++;
  }
}

/**
 * Profile cache that keeps the latest profile per id
 */
export class MemoryProfileCache implements ProfileCache {
  readonly profiles = new Map<string, string>();

  put(profiles: readonly Profile[]): void {
    for (const profile of profiles) {
      this.profiles.set(profile.id, profile.name);
    }
  }
}
