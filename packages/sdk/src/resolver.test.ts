import { describe, it, expect, beforeEach, beforeAll, afterAll } from "vitest";
import { RecordResolver } from "./resolver.js";
import { AliasIndex } from "./indexes.js";
import { MemoryRecordStore } from "./memory.js";
import { ScopeNotFoundError, RecordNotFoundError } from "./errors.js";
import { isProtectedArea } from "./region.js";
import { byId, byName } from "./principal.js";
import type { StoredRegion } from "./types.js";
import { logger } from "./observability/logs.js";

const ALICE = "0f8fad5b-d9cb-469f-a165-70867728950e";
const BOB = "7c9e6679-7425-40de-944b-e07fc1f90ae7";

function area(
  id: string,
  alias: string | undefined,
  owners: string[] = [],
  members: string[] = [],
  worldScope = "overworld"
): StoredRegion {
  const region: StoredRegion = {
    id,
    worldScope,
    blockTypeKey: "EMERALD_ORE",
    owners: owners.map(byId),
    members: members.map(byId),
  };
  if (alias !== undefined) region.alias = alias;
  return region;
}

async function indexFrom(store: MemoryRecordStore, index: AliasIndex): Promise<void> {
  for (const scope of await store.scopes()) {
    const regions = await store.list(scope);
    await index.rebuild(
      scope,
      regions.filter((region) => isProtectedArea(region))
    );
  }
}

describe("RecordResolver", () => {
  let store: MemoryRecordStore;
  let index: AliasIndex;
  let resolver: RecordResolver;

  beforeAll(() => {
    logger.setEnabled(false);
  });

  afterAll(() => {
    logger.setEnabled(true);
  });

  beforeEach(async () => {
    store = new MemoryRecordStore([
      area("ps1", "base", [ALICE]),
      area("ps2", "base", [BOB]),
      area("ps3", "home", [ALICE], [BOB]),
      area("ps4", "outpost", [BOB], [], "nether"),
    ]);
    index = new AliasIndex();
    resolver = new RecordResolver(store, index);
    await indexFrom(store, index);
  });

  describe("resolve", () => {
    it("should return every live area sharing an alias", async () => {
      const found = await resolver.resolve("overworld", "base");

      expect(found.map((record) => record.id)).toEqual(["ps1", "ps2"]);
    });

    it("should return only the id match when an alias shares the token", async () => {
      store.put(area("ps5", "ps1"));
      await index.track("overworld", "ps1", "ps5");

      const found = await resolver.resolve("overworld", "ps1");

      expect(found).toHaveLength(1);
      expect(found[0]?.id).toBe("ps1");
      expect(found[0]?.alias).toBe("base");
    });

    it("should return an empty list when nothing matches", async () => {
      expect(await resolver.resolve("overworld", "castle")).toEqual([]);
    });

    it("should throw ScopeNotFoundError for an unknown scope", async () => {
      await expect(resolver.resolve("the_end", "base")).rejects.toThrow(ScopeNotFoundError);
    });

    it("should stop returning an area deleted behind the index", async () => {
      store.remove("overworld", "ps1");

      const found = await resolver.resolve("overworld", "base");

      expect(found.map((record) => record.id)).toEqual(["ps2"]);
      expect(index.ids("overworld", "base")).toEqual(["ps2"]);
    });

    it("should stop returning an area renamed away by a foreign writer", async () => {
      await store.setAlias("overworld", "ps2", "farm");

      const found = await resolver.resolve("overworld", "base");

      expect(found.map((record) => record.id)).toEqual(["ps1"]);
      expect(index.ids("overworld", "base")).toEqual(["ps1"]);
    });

    it("should ignore regions that are not protected areas", async () => {
      store.put({ id: "spawn", worldScope: "overworld", owners: [], members: [] });
      store.put({ id: "psfree", worldScope: "overworld", alias: "base", owners: [], members: [] });
      await index.track("overworld", "base", "psfree");

      expect(await resolver.resolve("overworld", "spawn")).toEqual([]);
      const found = await resolver.resolve("overworld", "base");
      expect(found.map((record) => record.id)).toEqual(["ps1", "ps2"]);
    });

    it("should honor a custom id prefix", async () => {
      store.put({
        id: "stone-1",
        worldScope: "overworld",
        blockTypeKey: "DIAMOND_BLOCK",
        owners: [],
        members: [],
      });
      const custom = new RecordResolver(store, index, { idPrefix: "stone-" });

      expect((await custom.resolve("overworld", "stone-1")).map((r) => r.id)).toEqual([
        "stone-1",
      ]);
      expect(await custom.resolve("overworld", "ps1")).toEqual([]);
    });
  });

  describe("aliasExistsAnywhere", () => {
    it("should find an alias in any indexed scope", async () => {
      expect(await resolver.aliasExistsAnywhere("outpost")).toBe(true);
      expect(await resolver.aliasExistsAnywhere("base")).toBe(true);
      expect(await resolver.aliasExistsAnywhere("castle")).toBe(false);
    });

    it("should report false once every carrier is gone", async () => {
      store.remove("nether", "ps4");

      expect(await resolver.aliasExistsAnywhere("outpost")).toBe(false);
      expect(index.snapshot("nether")).toEqual({});
    });
  });

  describe("recordsOf", () => {
    it("should list owned areas", async () => {
      const owned = await resolver.recordsOf("overworld", ALICE);

      expect(owned.map((record) => record.id)).toEqual(["ps1", "ps3"]);
    });

    it("should include memberships on request", async () => {
      const owned = await resolver.recordsOf("overworld", BOB);
      const all = await resolver.recordsOf("overworld", BOB, { includeMembers: true });

      expect(owned.map((record) => record.id)).toEqual(["ps2"]);
      expect(all.map((record) => record.id)).toEqual(["ps2", "ps3"]);
    });

    it("should match ids regardless of case", async () => {
      const owned = await resolver.recordsOf("overworld", ALICE.toUpperCase());

      expect(owned.map((record) => record.id)).toEqual(["ps1", "ps3"]);
    });

    it("should not match legacy name entries", async () => {
      store.put({
        id: "ps9",
        worldScope: "overworld",
        blockTypeKey: "EMERALD_ORE",
        owners: [byName(ALICE)],
        members: [],
      });

      const owned = await resolver.recordsOf("overworld", ALICE);

      expect(owned.map((record) => record.id)).toEqual(["ps1", "ps3"]);
    });
  });

  describe("renameRecord", () => {
    it("should update the store and the index", async () => {
      const renamed = await resolver.renameRecord("overworld", "ps1", "farm");

      expect(renamed.alias).toBe("farm");
      expect((await store.get("overworld", "ps1"))?.alias).toBe("farm");
      expect(index.ids("overworld", "base")).toEqual(["ps2"]);
      expect(index.ids("overworld", "farm")).toEqual(["ps1"]);
      expect((await resolver.resolve("overworld", "farm")).map((r) => r.id)).toEqual(["ps1"]);
    });

    it("should clear an alias", async () => {
      const renamed = await resolver.renameRecord("overworld", "ps3", undefined);

      expect(renamed.alias).toBeUndefined();
      expect(await store.get("overworld", "ps3")).not.toHaveProperty("alias");
      expect(index.snapshot("overworld")).toEqual({ base: ["ps1", "ps2"] });
    });

    it("should throw RecordNotFoundError for a missing area", async () => {
      const rename = resolver.renameRecord("overworld", "ps404", "farm");

      await expect(rename).rejects.toThrow(RecordNotFoundError);
      await expect(rename).rejects.toMatchObject({ code: "E_RECORD", scope: "overworld", id: "ps404" });
    });
  });
});
