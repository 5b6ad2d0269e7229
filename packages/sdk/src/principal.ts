/**
 * Principal references: stable identifiers and legacy display names
 */

import type { PrincipalRef } from "./types.js";

const IDENTIFIER_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Whether a raw ownership string is in identifier form (canonical UUID)
 */
export function isIdentifierForm(raw: string): boolean {
  return IDENTIFIER_PATTERN.test(raw);
}

export function byId(id: string): PrincipalRef {
  return { kind: "id", id: id.toLowerCase() };
}

export function byName(name: string): PrincipalRef {
  return { kind: "name", name };
}

/**
 * Decode a raw ownership string read from a store
 */
export function parsePrincipalRef(raw: string): PrincipalRef {
  return isIdentifierForm(raw) ? byId(raw) : byName(raw);
}

/**
 * Encode a reference for a store that keeps ownership as strings
 */
export function formatPrincipalRef(ref: PrincipalRef): string {
  return ref.kind === "id" ? ref.id : ref.name;
}

/**
 * Whether a reference names the principal with the given stable id
 */
export function refersTo(ref: PrincipalRef, principalId: string): boolean {
  return ref.kind === "id" && ref.id === principalId.toLowerCase();
}
