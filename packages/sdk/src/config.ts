/**
 * Configuration schema and persistence
 *
 * The config file holds the block catalog, runtime options and the migration guard:
 *
 * {
 *   "configVersion": 1,
 *   "permissionNamespace": "stoneward",
 *   "identity": { "asyncLoad": false, "pushProfiles": true },
 *   "migration": { "identifiersComplete": false },
 *   "blocks": [{ "key": "EMERALD_ORE", "alias": "home" }]
 * }
 */

import { z } from "zod";
import { atomicWrite, readOptionalDocument } from "./io.js";
import { ConfigError } from "./errors.js";
import { DEFAULT_PERMISSION_NAMESPACE } from "./quota.js";
import { DEFAULT_ID_PREFIX } from "./region.js";

/**
 * Newest config layout this release understands
 */
export const CONFIG_VERSION = 1;

const namespacePattern = /^[a-z0-9_-]+(?:\.[a-z0-9_-]+)*$/;

export const CatalogEntrySchema = z.object({
  key: z.string().min(1),
  alias: z.string().min(1).regex(/^[^.\s]+$/, "alias cannot contain dots or whitespace"),
  displayName: z.string().optional(),
  restrictObtaining: z.boolean().optional(),
  price: z.number().nonnegative().optional(),
});

export const ConfigSchema = z
  .object({
    configVersion: z
      .number()
      .int()
      .positive()
      .max(CONFIG_VERSION, `configVersion newer than supported (${CONFIG_VERSION})`)
      .default(CONFIG_VERSION),
    permissionNamespace: z
      .string()
      .regex(namespacePattern, "permissionNamespace must be dot-separated lowercase segments")
      .default(DEFAULT_PERMISSION_NAMESPACE),
    idPrefix: z.string().min(1).default(DEFAULT_ID_PREFIX),
    identity: z
      .object({
        /** Populate the identity cache in the background instead of blocking start-up */
        asyncLoad: z.boolean().default(false),
        /** Forward loaded identities to the host's profile cache */
        pushProfiles: z.boolean().default(true),
      })
      .default({}),
    migration: z
      .object({
        identifiersComplete: z.boolean().default(false),
      })
      .default({}),
    blocks: z.array(CatalogEntrySchema).default([]),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.blocks.forEach((block, i) => {
      if (seen.has(block.key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["blocks", i, "key"],
          message: `duplicate block key "${block.key}"`,
        });
      }
      seen.add(block.key);
    });
  });

export type StonewardConfig = z.infer<typeof ConfigSchema>;

/**
 * Read/write access to the persisted configuration
 */
export interface PersistentConfig {
  read(): Promise<StonewardConfig>;
  /** Persist the migration guard flag */
  setMigrationComplete(complete: boolean): Promise<void>;
}

/**
 * Validate raw config data, filling defaults
 * @throws ConfigError listing every issue
 */
export function parseConfig(raw: unknown, source: string): StonewardConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new ConfigError(source, issues);
  }
  return result.data;
}

/**
 * Config stored as a JSON file. A missing file reads as all defaults.
 */
export class JsonFileConfig implements PersistentConfig {
  #filePath: string;

  constructor(filePath: string) {
    this.#filePath = filePath;
  }

  get filePath(): string {
    return this.#filePath;
  }

  async read(): Promise<StonewardConfig> {
    return parseConfig(await this.#readRaw(), this.#filePath);
  }

  async setMigrationComplete(complete: boolean): Promise<void> {
    const raw = await this.#readRaw();
    const config = parseConfig(raw, this.#filePath);
    config.migration.identifiersComplete = complete;
    await this.write(config);
  }

  /**
   * Write a full config, validating it first
   */
  async write(config: StonewardConfig): Promise<void> {
    const validated = parseConfig(config, this.#filePath);
    await atomicWrite(this.#filePath, JSON.stringify(validated, null, 2) + "\n");
  }

  async #readRaw(): Promise<unknown> {
    const content = await readOptionalDocument(this.#filePath);
    if (content === null) {
      return {};
    }
    try {
      return JSON.parse(content);
    } catch (err) {
      throw new ConfigError(this.#filePath, [], { cause: err });
    }
  }
}
