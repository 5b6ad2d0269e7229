/**
 * Core types for stoneward
 */

/**
 * Sentinel limit meaning "no explicit cap was granted". Callers treat it as unbounded, never as zero.
 */
export const NO_LIMIT = -1;

/**
 * Reference to a principal (player) that owns or is a member of a protected area.
 * Legacy records name principals by display name; current records use the stable id.
 */
export type PrincipalRef = { kind: "id"; id: string } | { kind: "name"; name: string };

/**
 * Ownership lists of a region, as written back by migration
 */
export interface Membership {
  owners: PrincipalRef[];
  members: PrincipalRef[];
}

/**
 * A region as the authoritative store holds it. Not every stored region is a protected area.
 */
export interface StoredRegion extends Membership {
  /** Globally unique, stable region id */
  id: string;
  /** World scope the region belongs to */
  worldScope: string;
  /** Free-text, non-unique name */
  alias?: string;
  /** Catalog key of the block that created the region; absent on foreign regions */
  blockTypeKey?: string;
}

/**
 * A stored region created by a protection block
 */
export interface ProtectedAreaRecord extends StoredRegion {
  blockTypeKey: string;
}

/**
 * Configured protectable block type
 */
export interface CatalogEntry {
  /** Block type key (e.g. "EMERALD_ORE") */
  key: string;
  /** Quota grouping alias (e.g. "home") */
  alias: string;
  displayName?: string;
  /** Only blocks handed out by the plugin may create regions */
  restrictObtaining?: boolean;
  /** Cost charged by the economy layer; carried through untouched */
  price?: number;
}

/**
 * Limits derived from a principal's grants
 */
export interface QuotaRecord {
  perCategory: Map<CatalogEntry, number>;
  /** Cap over all categories, or NO_LIMIT */
  global: number;
}

/**
 * Authoritative region store, owned outside this subsystem.
 *
 * `get` returns null for an id with no region; unknown scopes are reported by `hasScope`,
 * and `list` on an unknown scope throws ScopeNotFoundError.
 */
export interface RecordStore {
  scopes(): Promise<string[]>;
  hasScope(scope: string): Promise<boolean>;
  get(scope: string, id: string): Promise<StoredRegion | null>;
  list(scope: string): Promise<StoredRegion[]>;
  /** Replace a region's owners and members and persist the change */
  updateMembership(scope: string, id: string, membership: Membership): Promise<void>;
  /** Set or clear a region's alias and persist the change */
  setAlias(scope: string, id: string, alias: string | undefined): Promise<void>;
}

/**
 * Source of a principal's effective permission grants
 */
export interface PermissionSet {
  effectiveGrants(principal: string): Iterable<string>;
}

/**
 * One principal known to the host's identity directory
 */
export interface DirectoryEntry {
  id: string;
  /** Null when the host never learned the principal's name */
  name: string | null;
}

/**
 * Enumerable set of every principal the host has seen
 */
export interface IdentityDirectory {
  entries(): AsyncIterable<DirectoryEntry>;
}

/**
 * A resolved (id, name) pair
 */
export interface Profile {
  id: string;
  name: string;
}

/**
 * External profile cache shared with other host subsystems
 */
export interface ProfileCache {
  put(profiles: readonly Profile[]): void | Promise<void>;
}
