import { describe, it, expect, beforeEach, beforeAll, afterAll, vi } from "vitest";
import { CacheBuilder } from "./cache-builder.js";
import { AliasIndex } from "./indexes.js";
import { IdentityCache } from "./identity-cache.js";
import { MemoryIdentityDirectory, MemoryProfileCache, MemoryRecordStore } from "./memory.js";
import { DirectoryUnavailableError, ScopeNotFoundError } from "./errors.js";
import type { DirectoryEntry, IdentityDirectory, ProtectedAreaRecord, StoredRegion } from "./types.js";
import { logger } from "./observability/logs.js";

const STEVE = "0f8fad5b-d9cb-469f-a165-70867728950e";
const ALEX = "7c9e6679-7425-40de-944b-e07fc1f90ae7";

function area(id: string, alias: string, worldScope = "overworld"): ProtectedAreaRecord {
  return { id, worldScope, alias, blockTypeKey: "EMERALD_ORE", owners: [], members: [] };
}

/**
 * Directory that yields nothing until released
 */
class GatedDirectory implements IdentityDirectory {
  #release: () => void = () => {};
  #gate = new Promise<void>((resolve) => {
    this.#release = resolve;
  });

  constructor(private readonly entriesToYield: DirectoryEntry[]) {}

  release(): void {
    this.#release();
  }

  async *entries(): AsyncIterable<DirectoryEntry> {
    await this.#gate;
    yield* this.entriesToYield;
  }
}

/**
 * Store whose listing of one scope can be made to fail
 */
class FlakyStore extends MemoryRecordStore {
  failingScope: string | null = null;

  override async list(scope: string): Promise<StoredRegion[]> {
    if (scope === this.failingScope) {
      throw new Error(`cannot read ${scope}`);
    }
    return super.list(scope);
  }
}

class BrokenDirectory implements IdentityDirectory {
  async *entries(): AsyncIterable<DirectoryEntry> {
    yield { id: STEVE, name: "Steve" };
    throw new DirectoryUnavailableError("usercache.json is locked");
  }
}

describe("CacheBuilder", () => {
  let store: MemoryRecordStore;
  let index: AliasIndex;
  let identities: IdentityCache;

  beforeAll(() => {
    logger.setEnabled(false);
  });

  afterAll(() => {
    logger.setEnabled(true);
  });

  beforeEach(() => {
    store = new MemoryRecordStore([
      area("ps1", "home"),
      area("ps2", "home"),
      area("ps3", "farm", "nether"),
      { id: "spawn", worldScope: "overworld", alias: "home", owners: [], members: [] },
    ]);
    index = new AliasIndex();
    identities = new IdentityCache();
  });

  describe("build", () => {
    it("should index every scope and load identities before returning", async () => {
      const directory = new MemoryIdentityDirectory([
        { id: STEVE, name: "Steve" },
        { id: ALEX, name: null },
      ]);
      const builder = new CacheBuilder(store, directory, index, identities);

      const result = await builder.build();

      expect(result.background).toBe(false);
      expect(result.scopes.map((stats) => [stats.scope, stats.records])).toEqual([
        ["overworld", 2],
        ["nether", 1],
      ]);
      expect(index.snapshot("overworld")).toEqual({ home: ["ps1", "ps2"] });
      expect(identities.idOf("Steve")).toBe(STEVE);

      const summary = await result.identityReady;
      expect(summary.status).toBe("loaded");
      expect(summary.loaded).toBe(1);
      expect(summary.nameless).toBe(1);
    });

    it("should return before identities load in background mode", async () => {
      const directory = new GatedDirectory([{ id: STEVE, name: "Steve" }]);
      const builder = new CacheBuilder(store, directory, index, identities, {
        asyncIdentityLoad: true,
      });

      const result = await builder.build();

      expect(result.background).toBe(true);
      expect(index.ids("nether", "farm")).toEqual(["ps3"]);
      expect(identities.size).toBe(0);

      directory.release();
      const summary = await result.identityReady;

      expect(summary.loaded).toBe(1);
      expect(identities.nameOf(STEVE)).toBe("Steve");
    });

    it("should finish with partial identities when the directory fails", async () => {
      const builder = new CacheBuilder(store, new BrokenDirectory(), index, identities);

      const result = await builder.build();
      const summary = await result.identityReady;

      expect(summary.status).toBe("unavailable");
      expect(summary.error).toBeInstanceOf(DirectoryUnavailableError);
      expect(identities.idOf("Steve")).toBe(STEVE);
      expect(index.snapshot("overworld")).toEqual({ home: ["ps1", "ps2"] });
    });

    it("should warn when the directory is unavailable", async () => {
      logger.setEnabled(true);
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      vi.spyOn(console, "log").mockImplementation(() => {});

      try {
        const builder = new CacheBuilder(store, new BrokenDirectory(), index, identities);
        await builder.loadIdentities();

        expect(warn).toHaveBeenCalledWith(
          expect.stringContaining(
            "[cache.identity.unavailable] Identity directory unavailable: usercache.json is locked;"
          )
        );
      } finally {
        vi.restoreAllMocks();
        logger.setEnabled(false);
      }
    });
  });

  describe("profile cache", () => {
    it("should forward loaded identities", async () => {
      const profiles = new MemoryProfileCache();
      const directory = new MemoryIdentityDirectory([
        { id: STEVE, name: "Steve" },
        { id: ALEX, name: "Alex" },
      ]);
      const builder = new CacheBuilder(store, directory, index, identities, {
        profileCache: profiles,
      });

      const summary = await builder.loadIdentities();

      expect(summary.pushed).toBe(2);
      expect(profiles.profiles.get(ALEX)).toBe("Alex");
    });

    it("should not fail the load when the profile cache rejects", async () => {
      const builder = new CacheBuilder(
        store,
        new MemoryIdentityDirectory([{ id: STEVE, name: "Steve" }]),
        index,
        identities,
        {
          profileCache: {
            put: async () => {
              throw new Error("profile cache offline");
            },
          },
        }
      );

      const summary = await builder.loadIdentities();

      expect(summary.status).toBe("loaded");
      expect(summary.pushed).toBe(0);
    });
  });

  describe("rebuildIndex", () => {
    it("should rebuild one scope from the store", async () => {
      const builder = new CacheBuilder(store, new MemoryIdentityDirectory(), index, identities);
      await builder.rebuildIndex();
      store.put(area("ps4", "farm"));

      const stats = await builder.rebuildIndex("overworld");

      expect(stats).toHaveLength(1);
      expect(index.snapshot("overworld")).toEqual({ home: ["ps1", "ps2"], farm: ["ps4"] });
    });

    it("should throw ScopeNotFoundError for an unknown scope", async () => {
      const builder = new CacheBuilder(store, new MemoryIdentityDirectory(), index, identities);

      await expect(builder.rebuildIndex("the_end")).rejects.toThrow(ScopeNotFoundError);
    });

    it("should drop indexed scopes the store no longer has on a full rebuild", async () => {
      await index.rebuild("the_end", [area("ps9", "tower", "the_end")]);
      const builder = new CacheBuilder(store, new MemoryIdentityDirectory(), index, identities);

      await builder.rebuildIndex();

      expect(index.scopes()).toEqual(["overworld", "nether"]);
    });

    it("should keep every scope's previous buckets when one scope fails to list", async () => {
      const flaky = new FlakyStore([area("ps1", "home"), area("ps3", "farm", "nether")]);
      const builder = new CacheBuilder(flaky, new MemoryIdentityDirectory(), index, identities);
      await builder.rebuildIndex();
      flaky.put(area("ps5", "farm", "nether"));
      flaky.failingScope = "overworld";

      await expect(builder.rebuildIndex()).rejects.toThrow("cannot read overworld");

      expect(index.scopes()).toEqual(["overworld", "nether"]);
      expect(index.snapshot("overworld")).toEqual({ home: ["ps1"] });
      expect(index.snapshot("nether")).toEqual({ farm: ["ps3"] });
    });

    it("should index under a custom id prefix", async () => {
      store.put({ ...area("stone-1", "vault"), blockTypeKey: "GOLD_BLOCK" });
      const builder = new CacheBuilder(store, new MemoryIdentityDirectory(), index, identities, {
        idPrefix: "stone-",
      });

      await builder.rebuildIndex();

      expect(index.snapshot("overworld")).toEqual({ vault: ["stone-1"] });
    });
  });
});
