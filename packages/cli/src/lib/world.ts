/**
 * Runtime over a world directory for one CLI invocation
 */

import { openStoneward, openWorldDirectory, StaticPermissionSet } from "@stoneward/sdk";
import type { StartSummary, Stoneward } from "@stoneward/sdk";
import type { Telemetry } from "./telemetry.js";

export interface CliWorld {
  stoneward: Stoneward;
  summary: StartSummary;
}

/**
 * Open and start a runtime. Starting runs a pending identifier migration.
 * @param grants - Effective grants per principal for limit commands
 */
export async function openCliWorld(
  root: string,
  telemetry: Telemetry,
  grants: Record<string, string[]> = {}
): Promise<CliWorld> {
  const stoneward = openStoneward({
    ...openWorldDirectory(root),
    permissions: new StaticPermissionSet(grants),
  });

  const summary = await stoneward.start();
  telemetry.emit("cli.start", {
    scopes: summary.scopes.length,
    identities: summary.identity?.status ?? "background",
    migration: summary.migration.status,
  });

  return { stoneward, summary };
}
