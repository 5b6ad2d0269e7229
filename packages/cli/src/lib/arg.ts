/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";

const SAFE_NAME = /^[A-Za-z0-9_-][A-Za-z0-9._-]*$/;

/**
 * Validate a scope or region id: one path segment, no traversal
 */
export function parseName(value: string, name: string): string {
  if (!SAFE_NAME.test(value) || value.includes("..")) {
    throw new InvalidArgumentError(
      `${name} may only contain letters, digits, dot, underscore and dash`
    );
  }
  return value;
}

/**
 * Validate an alias: non-empty, no dots or whitespace
 */
export function parseAlias(value: string): string {
  if (!/^[^.\s]+$/.test(value)) {
    throw new InvalidArgumentError("alias cannot be empty or contain dots or whitespace");
  }
  return value;
}

/**
 * Accumulate a repeatable option
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}
