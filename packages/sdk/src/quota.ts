/**
 * Quota resolution from permission grants
 *
 * Grant shapes (namespace defaults to "stoneward"):
 *   <namespace>.limit.<category>.<n>   per-category cap
 *   <namespace>.limit.<n>              cap over all categories
 *
 * Invariants:
 * - Pure: results depend only on the arguments
 * - Grants of any other shape are ignored, as are unknown categories
 * - A malformed count skips that grant only
 * - Several grants for one target resolve to their maximum
 */

import { NO_LIMIT } from "./types.js";
import type { CatalogEntry, PermissionSet, QuotaRecord } from "./types.js";
import { logger } from "./observability/logs.js";

export const DEFAULT_PERMISSION_NAMESPACE = "stoneward";

const INTEGER_PATTERN = /^[+-]?\d+$/;
const INT32_MAX = 2147483647;
const INT32_MIN = -2147483648;

/**
 * Parse a grant's count segment; null when it is not a 32-bit integer
 */
function parseCount(raw: string): number | null {
  if (!INTEGER_PATTERN.test(raw)) return null;
  const value = Number.parseInt(raw, 10);
  if (value > INT32_MAX || value < INT32_MIN) return null;
  return value;
}

/**
 * Segments after "<namespace>.limit.", or null for unrelated grants
 */
function limitSegments(grant: string, namespace: string): string[] | null {
  const prefix = `${namespace}.limit.`;
  if (!grant.startsWith(prefix)) return null;
  return grant.slice(prefix.length).split(".");
}

/**
 * Find a catalog entry by alias or block key, ignoring case
 */
export function findCatalogEntry(
  catalog: readonly CatalogEntry[],
  token: string
): CatalogEntry | undefined {
  const wanted = token.toLowerCase();
  return catalog.find(
    (entry) => entry.alias.toLowerCase() === wanted || entry.key.toLowerCase() === wanted
  );
}

/**
 * Whether a block key is configured as a protection block
 */
export function isProtectBlockType(catalog: readonly CatalogEntry[], key: string): boolean {
  return catalog.some((entry) => entry.key === key);
}

/**
 * Per-category caps granted to a principal. Categories without a grant are absent.
 */
export function perCategoryLimits(
  grants: Iterable<string>,
  catalog: readonly CatalogEntry[],
  namespace: string = DEFAULT_PERMISSION_NAMESPACE
): Map<CatalogEntry, number> {
  const limits = new Map<CatalogEntry, number>();

  for (const grant of grants) {
    const segments = limitSegments(grant, namespace);
    if (!segments || segments.length !== 2) continue;

    const [category, rawCount] = segments;
    if (category === undefined || rawCount === undefined) continue;
    const entry = findCatalogEntry(catalog, category);
    if (!entry) continue;

    const count = parseCount(rawCount);
    if (count === null) {
      logger.debug("quota.grant.malformed", { message: grant });
      continue;
    }

    const current = limits.get(entry);
    if (current === undefined || current < count) {
      limits.set(entry, count);
    }
  }

  return limits;
}

/**
 * Cap over all categories, or NO_LIMIT when no global grant is present
 */
export function globalLimit(
  grants: Iterable<string>,
  namespace: string = DEFAULT_PERMISSION_NAMESPACE
): number {
  let max = NO_LIMIT;

  for (const grant of grants) {
    const segments = limitSegments(grant, namespace);
    if (!segments || segments.length !== 1) continue;

    const count = parseCount(segments[0] ?? "");
    if (count === null) {
      logger.debug("quota.grant.malformed", { message: grant });
      continue;
    }
    max = Math.max(max, count);
  }

  return max;
}

/**
 * Both limit kinds in one record
 */
export function resolveQuota(
  grants: Iterable<string>,
  catalog: readonly CatalogEntry[],
  namespace: string = DEFAULT_PERMISSION_NAMESPACE
): QuotaRecord {
  // Grants may be a one-shot iterable
  const list = Array.from(grants);
  return {
    perCategory: perCategoryLimits(list, catalog, namespace),
    global: globalLimit(list, namespace),
  };
}

/**
 * Areas a principal already holds
 */
export interface PlacementUsage {
  /** Areas of the category being placed */
  category: number;
  /** Areas across all categories */
  total: number;
}

export type PlacementVerdict =
  | { allowed: true }
  | { allowed: false; reason: "category" | "global"; limit: number };

/**
 * Whether one more area of `entry` fits the principal's quota
 */
export function evaluatePlacement(
  quota: QuotaRecord,
  usage: PlacementUsage,
  entry: CatalogEntry
): PlacementVerdict {
  const categoryLimit = quota.perCategory.get(entry) ?? NO_LIMIT;
  if (categoryLimit !== NO_LIMIT && usage.category >= categoryLimit) {
    return { allowed: false, reason: "category", limit: categoryLimit };
  }
  if (quota.global !== NO_LIMIT && usage.total >= quota.global) {
    return { allowed: false, reason: "global", limit: quota.global };
  }
  return { allowed: true };
}

/**
 * Binds the pure resolvers to a permission source and catalog
 */
export class QuotaResolver {
  #permissions: PermissionSet;
  #catalog: readonly CatalogEntry[];
  #namespace: string;

  constructor(
    permissions: PermissionSet,
    catalog: readonly CatalogEntry[],
    namespace: string = DEFAULT_PERMISSION_NAMESPACE
  ) {
    this.#permissions = permissions;
    this.#catalog = catalog;
    this.#namespace = namespace;
  }

  forPrincipal(principal: string): QuotaRecord {
    return resolveQuota(this.#permissions.effectiveGrants(principal), this.#catalog, this.#namespace);
  }

  catalog(): readonly CatalogEntry[] {
    return this.#catalog;
  }
}
