/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~[\\/](.*)/);
  if (!match) {
    return input;
  }

  return path.join(homedir(), match[1] ?? "");
}

/**
 * Resolve the world directory root
 * Priority: CLI option > STONEWARD_ROOT env var > default "./world"
 */
export function resolveRoot(cliRoot?: string): string {
  const root = cliRoot ?? process.env.STONEWARD_ROOT ?? "./world";
  return path.resolve(expandTilde(root));
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(flag?: boolean): boolean {
  return flag === true || process.env.STONEWARD_CLI_DEBUG === "1";
}
