import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CONFIG_VERSION, JsonFileConfig, parseConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("parseConfig", () => {
  it("should fill every default", () => {
    expect(parseConfig({}, "test")).toEqual({
      configVersion: CONFIG_VERSION,
      permissionNamespace: "stoneward",
      idPrefix: "ps",
      identity: { asyncLoad: false, pushProfiles: true },
      migration: { identifiersComplete: false },
      blocks: [],
    });
  });

  it("should keep catalog entries and options", () => {
    const config = parseConfig(
      {
        permissionNamespace: "protect.stones",
        identity: { asyncLoad: true },
        blocks: [{ key: "EMERALD_ORE", alias: "home", price: 25, restrictObtaining: true }],
      },
      "test"
    );

    expect(config.permissionNamespace).toBe("protect.stones");
    expect(config.identity).toEqual({ asyncLoad: true, pushProfiles: true });
    expect(config.blocks).toEqual([
      { key: "EMERALD_ORE", alias: "home", price: 25, restrictObtaining: true },
    ]);
  });

  it("should reject duplicate block keys", () => {
    const error = (() => {
      try {
        parseConfig(
          {
            blocks: [
              { key: "EMERALD_ORE", alias: "home" },
              { key: "EMERALD_ORE", alias: "base" },
            ],
          },
          "stoneward.json"
        );
      } catch (err) {
        return err;
      }
      return null;
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toHaveProperty("issues", ['blocks.1.key: duplicate block key "EMERALD_ORE"']);
  });

  it("should reject aliases that cannot appear in a grant", () => {
    expect(() =>
      parseConfig({ blocks: [{ key: "EMERALD_ORE", alias: "my.home" }] }, "test")
    ).toThrow("blocks.0.alias: alias cannot contain dots or whitespace");
  });

  it("should reject a config version newer than supported", () => {
    expect(() => parseConfig({ configVersion: CONFIG_VERSION + 1 }, "test")).toThrow(ConfigError);
  });
});

describe("JsonFileConfig", () => {
  let testDir: string;
  let filePath: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "stoneward-config-"));
    filePath = join(testDir, "stoneward.json");
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("should read a missing file as defaults", async () => {
    const config = new JsonFileConfig(filePath);

    expect((await config.read()).migration.identifiersComplete).toBe(false);
  });

  it("should persist the migration guard and keep the catalog", async () => {
    await writeFile(
      filePath,
      JSON.stringify({ blocks: [{ key: "DIAMOND_BLOCK", alias: "fortress" }] }),
      "utf-8"
    );
    const config = new JsonFileConfig(filePath);

    await config.setMigrationComplete(true);

    const reread = await new JsonFileConfig(filePath).read();
    expect(reread.migration.identifiersComplete).toBe(true);
    expect(reread.blocks).toEqual([{ key: "DIAMOND_BLOCK", alias: "fortress" }]);
    expect(JSON.parse(await readFile(filePath, "utf-8"))).toHaveProperty(
      "migration.identifiersComplete",
      true
    );
  });

  it("should throw ConfigError for invalid JSON", async () => {
    await writeFile(filePath, "{ not json", "utf-8");

    await expect(new JsonFileConfig(filePath).read()).rejects.toThrow(
      `Failed to load configuration: ${filePath}`
    );
  });

  it("should refuse to write an invalid config", async () => {
    const config = new JsonFileConfig(filePath);
    const current = await config.read();

    await expect(
      config.write({ ...current, idPrefix: "" })
    ).rejects.toThrow(ConfigError);
    await expect(readFile(filePath, "utf-8")).rejects.toThrow();
  });
});
