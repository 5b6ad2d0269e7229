/**
 * JSON-file world directory
 *
 * Layout:
 *   <root>/stoneward.json             configuration (see config.ts)
 *   <root>/worlds/<scope>/<id>.json   one region document per file
 *   <root>/_meta/profiles.json        identity directory: [{ "id": "...", "name": "..." }]
 *
 * Region documents keep ownership as strings; identifier-form entries are UUIDs.
 * Unknown document fields are preserved on write.
 */

import * as path from "node:path";
import AjvModule from "ajv";
import type { JSONSchemaType, ValidateFunction } from "ajv";
import { z } from "zod";
import { atomicWrite, listDirectories, listFiles, readOptionalDocument } from "./io.js";
import {
  DirectoryUnavailableError,
  RecordNotFoundError,
  RegionDocumentError,
  ScopeNotFoundError,
} from "./errors.js";
import { JsonFileConfig } from "./config.js";
import { formatPrincipalRef, parsePrincipalRef } from "./principal.js";
import type {
  DirectoryEntry,
  IdentityDirectory,
  Membership,
  RecordStore,
  StoredRegion,
} from "./types.js";
import { logger } from "./observability/logs.js";

const Ajv = AjvModule.default;

export const CONFIG_FILE = "stoneward.json";
export const WORLDS_DIR = "worlds";
export const PROFILES_FILE = path.join("_meta", "profiles.json");

const SAFE_NAME = /^[A-Za-z0-9_-][A-Za-z0-9._-]*$/;

/**
 * Region document as stored on disk
 */
export interface RegionDocument {
  id: string;
  alias?: string;
  blockType?: string;
  owners: string[];
  members: string[];
}

const regionSchema: JSONSchemaType<RegionDocument> = {
  type: "object",
  properties: {
    id: { type: "string", minLength: 1 },
    alias: { type: "string", nullable: true },
    blockType: { type: "string", nullable: true },
    owners: { type: "array", items: { type: "string" } },
    members: { type: "array", items: { type: "string" } },
  },
  required: ["id", "owners", "members"],
  additionalProperties: true,
};

const validateRegion: ValidateFunction<RegionDocument> = new Ajv({ allErrors: true }).compile(
  regionSchema
);

function isSafeName(value: string): boolean {
  return SAFE_NAME.test(value) && !value.includes("..");
}

/**
 * Convert a validated document to a region of `scope`
 */
export function fromDocument(scope: string, doc: RegionDocument): StoredRegion {
  const region: StoredRegion = {
    id: doc.id,
    worldScope: scope,
    owners: doc.owners.map(parsePrincipalRef),
    members: doc.members.map(parsePrincipalRef),
  };
  if (typeof doc.alias === "string") region.alias = doc.alias;
  if (typeof doc.blockType === "string") region.blockTypeKey = doc.blockType;
  return region;
}

/**
 * Convert a region to its document form
 */
export function toDocument(region: StoredRegion): RegionDocument {
  const doc: RegionDocument = {
    id: region.id,
    owners: region.owners.map(formatPrincipalRef),
    members: region.members.map(formatPrincipalRef),
  };
  if (region.alias !== undefined) doc.alias = region.alias;
  if (region.blockTypeKey !== undefined) doc.blockType = region.blockTypeKey;
  return doc;
}

/**
 * Region store backed by one JSON file per region
 */
export class JsonRegionStore implements RecordStore {
  #root: string;

  constructor(root: string) {
    this.#root = root;
  }

  get root(): string {
    return this.#root;
  }

  async scopes(): Promise<string[]> {
    return listDirectories(path.join(this.#root, WORLDS_DIR));
  }

  async hasScope(scope: string): Promise<boolean> {
    return isSafeName(scope) && (await this.scopes()).includes(scope);
  }

  /**
   * @throws RegionDocumentError if the file exists but is not a valid region
   */
  async get(scope: string, id: string): Promise<StoredRegion | null> {
    if (!isSafeName(scope) || !isSafeName(id)) return null;
    const doc = await this.#readDocument(scope, id);
    return doc ? fromDocument(scope, doc) : null;
  }

  /**
   * All valid regions of a scope in file-name order. Invalid documents are skipped with a warning.
   */
  async list(scope: string): Promise<StoredRegion[]> {
    await this.#requireScope(scope);

    const regions: StoredRegion[] = [];
    for (const file of await listFiles(this.#scopeDir(scope), ".json")) {
      const id = path.basename(file, ".json");
      try {
        const doc = await this.#readDocument(scope, id);
        if (doc) regions.push(fromDocument(scope, doc));
      } catch (err) {
        if (!(err instanceof RegionDocumentError)) throw err;
        logger.warn("store.document.skip", { scope, record: id, message: err.message });
      }
    }
    return regions;
  }

  async updateMembership(scope: string, id: string, membership: Membership): Promise<void> {
    await this.#rewrite(scope, id, (doc) => ({
      ...doc,
      owners: membership.owners.map(formatPrincipalRef),
      members: membership.members.map(formatPrincipalRef),
    }));
  }

  async setAlias(scope: string, id: string, alias: string | undefined): Promise<void> {
    await this.#rewrite(scope, id, (doc) => {
      const next: RegionDocument = { ...doc };
      if (alias === undefined) {
        delete next.alias;
      } else {
        next.alias = alias;
      }
      return next;
    });
  }

  /**
   * Write a region, creating its scope directory if needed
   */
  async put(region: StoredRegion): Promise<void> {
    if (!isSafeName(region.worldScope) || !isSafeName(region.id)) {
      throw new RegionDocumentError(`${region.worldScope}/${region.id}`, [
        "scope and id may only contain letters, digits, dot, underscore and dash",
      ]);
    }
    await this.#write(region.worldScope, toDocument(region));
  }

  async #rewrite(
    scope: string,
    id: string,
    change: (doc: RegionDocument) => RegionDocument
  ): Promise<void> {
    await this.#requireScope(scope);
    const doc = isSafeName(id) ? await this.#readDocument(scope, id) : null;
    if (!doc) {
      throw new RecordNotFoundError(scope, id);
    }
    await this.#write(scope, change(doc));
  }

  async #readDocument(scope: string, id: string): Promise<RegionDocument | null> {
    const filePath = this.#filePath(scope, id);
    const content = await readOptionalDocument(filePath);
    if (content === null) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      throw new RegionDocumentError(filePath, ["not valid JSON"], { cause: err });
    }

    if (!validateRegion(parsed)) {
      const issues = (validateRegion.errors ?? []).map(
        (e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`
      );
      throw new RegionDocumentError(filePath, issues);
    }
    if (parsed.id !== id) {
      throw new RegionDocumentError(filePath, [`id "${parsed.id}" does not match file name`]);
    }
    return parsed;
  }

  async #write(scope: string, doc: RegionDocument): Promise<void> {
    await atomicWrite(this.#filePath(scope, doc.id), JSON.stringify(doc, null, 2) + "\n");
  }

  async #requireScope(scope: string): Promise<void> {
    if (!(await this.hasScope(scope))) {
      throw new ScopeNotFoundError(scope);
    }
  }

  #scopeDir(scope: string): string {
    return path.join(this.#root, WORLDS_DIR, scope);
  }

  #filePath(scope: string, id: string): string {
    return path.join(this.#scopeDir(scope), `${id}.json`);
  }
}

const ProfilesFileSchema = z.array(
  z.object({
    id: z.string().min(1),
    name: z.string().nullable(),
  })
);

/**
 * Identity directory read from a JSON profiles file
 */
export class JsonIdentityDirectory implements IdentityDirectory {
  #filePath: string;

  constructor(filePath: string) {
    this.#filePath = filePath;
  }

  async *entries(): AsyncIterable<DirectoryEntry> {
    const content = await readOptionalDocument(this.#filePath);
    if (content === null) {
      throw new DirectoryUnavailableError(`${this.#filePath} does not exist`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new DirectoryUnavailableError(`${this.#filePath} is not valid JSON`, { cause: err });
    }

    const result = ProfilesFileSchema.safeParse(raw);
    if (!result.success) {
      throw new DirectoryUnavailableError(
        `${this.#filePath}: ${result.error.issues.map((i) => i.message).join("; ")}`
      );
    }
    yield* result.data;
  }
}

/**
 * Collaborators for a world directory
 */
export function openWorldDirectory(root: string): {
  store: JsonRegionStore;
  directory: JsonIdentityDirectory;
  config: JsonFileConfig;
} {
  return {
    store: new JsonRegionStore(root),
    directory: new JsonIdentityDirectory(path.join(root, PROFILES_FILE)),
    config: new JsonFileConfig(path.join(root, CONFIG_FILE)),
  };
}
