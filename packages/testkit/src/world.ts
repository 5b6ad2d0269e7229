/**
 * World directory fixtures
 */

import { dirname, join } from "node:path";
import { mkdir, writeFile } from "node:fs/promises";
import {
  openStoneward,
  openWorldDirectory,
  parseConfig,
  parsePrincipalRef,
  PROFILES_FILE,
  StaticPermissionSet,
} from "@stoneward/sdk";
import type { DirectoryEntry, Stoneward, StoredRegion } from "@stoneward/sdk";
import { createTempRoot, removeDir } from "./fs.js";

/**
 * A region as written in a fixture, with ownership in its raw string form
 */
export interface RegionFixture {
  scope: string;
  id: string;
  alias?: string;
  blockType?: string;
  owners?: string[];
  members?: string[];
}

export interface WorldFixture {
  /** Raw config; validated and filled with defaults before writing */
  config?: unknown;
  regions?: RegionFixture[];
  /** Identity directory contents; omitted means no profiles file */
  profiles?: DirectoryEntry[];
  /** Empty scopes to create */
  scopes?: string[];
}

function toRegion(fixture: RegionFixture): StoredRegion {
  const region: StoredRegion = {
    id: fixture.id,
    worldScope: fixture.scope,
    owners: (fixture.owners ?? []).map(parsePrincipalRef),
    members: (fixture.members ?? []).map(parsePrincipalRef),
  };
  if (fixture.alias !== undefined) region.alias = fixture.alias;
  if (fixture.blockType !== undefined) region.blockTypeKey = fixture.blockType;
  return region;
}

/**
 * Write a world directory under root
 */
export async function seedWorld(root: string, fixture: WorldFixture): Promise<void> {
  const world = openWorldDirectory(root);

  await world.config.write(parseConfig(fixture.config ?? {}, world.config.filePath));

  for (const scope of fixture.scopes ?? []) {
    await mkdir(join(root, "worlds", scope), { recursive: true });
  }
  for (const region of fixture.regions ?? []) {
    await world.store.put(toRegion(region));
  }

  if (fixture.profiles) {
    const profilesPath = join(root, PROFILES_FILE);
    await mkdir(dirname(profilesPath), { recursive: true });
    await writeFile(profilesPath, JSON.stringify(fixture.profiles, null, 2) + "\n", "utf-8");
  }
}

/**
 * Seed a temporary world, start a runtime over it, and clean up after fn
 * @param grants - Effective grants per principal
 */
export async function withTempWorld<T>(
  fixture: WorldFixture,
  fn: (stoneward: Stoneward, root: string) => Promise<T>,
  grants: Record<string, string[]> = {}
): Promise<T> {
  const root = await createTempRoot();
  try {
    await seedWorld(root, fixture);
    const stoneward = openStoneward({
      ...openWorldDirectory(root),
      permissions: new StaticPermissionSet(grants),
    });
    await stoneward.start();
    return await fn(stoneward, root);
  } finally {
    await removeDir(root);
  }
}
