/**
 * Region classification helpers
 */

import type { ProtectedAreaRecord, StoredRegion } from "./types.js";

/**
 * Id prefix every protected area carries
 */
export const DEFAULT_ID_PREFIX = "ps";

/**
 * Whether a stored region was created by a protection block.
 * Regions made by other tools share the store and are ignored.
 */
export function isProtectedArea(
  region: StoredRegion | null | undefined,
  idPrefix: string = DEFAULT_ID_PREFIX
): region is ProtectedAreaRecord {
  return (
    region !== null &&
    region !== undefined &&
    region.id.startsWith(idPrefix) &&
    typeof region.blockTypeKey === "string"
  );
}
