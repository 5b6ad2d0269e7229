/**
 * Runtime facade: owns the caches and wires the components to the host's collaborators
 *
 * Start-up sequence:
 * 1. read config (catalog, options, migration guard)
 * 2. rebuild every scope's alias index
 * 3. load identities, in the background if configured
 * 4. if the migration is pending, join the identity load and run it
 *
 * No operation that reads ownership is served before start() resolves.
 */

import { AliasIndex } from "./indexes.js";
import type { RebuildStats } from "./indexes.js";
import { IdentityCache } from "./identity-cache.js";
import { RecordResolver } from "./resolver.js";
import type { RecordsOfOptions } from "./resolver.js";
import { CacheBuilder } from "./cache-builder.js";
import type { IdentityLoadSummary } from "./cache-builder.js";
import { MigrationEngine } from "./migration.js";
import type { MigrationOptions, MigrationReport, UnresolvedLegacyOwner } from "./migration.js";
import {
  QuotaResolver,
  evaluatePlacement,
  globalLimit,
  perCategoryLimits,
} from "./quota.js";
import type { PlacementVerdict } from "./quota.js";
import { CommandRegistry } from "./commands.js";
import { NotStartedError, UnknownBlockTypeError } from "./errors.js";
import type { PersistentConfig, StonewardConfig } from "./config.js";
import type {
  CatalogEntry,
  IdentityDirectory,
  PermissionSet,
  ProfileCache,
  ProtectedAreaRecord,
  QuotaRecord,
  RecordStore,
} from "./types.js";
import { logger } from "./observability/logs.js";

export interface StonewardOptions {
  store: RecordStore;
  directory: IdentityDirectory;
  config: PersistentConfig;
  permissions: PermissionSet;
  profileCache?: ProfileCache;
  /** Called for every legacy name the migration cannot convert */
  onUnresolved?: (event: UnresolvedLegacyOwner) => void;
}

export interface StartSummary {
  scopes: RebuildStats[];
  /** Null while identities are still loading in the background */
  identity: IdentityLoadSummary | null;
  migration: MigrationReport;
}

export interface ReloadSummary {
  scopes: RebuildStats[];
  /** Null when only one scope was rebuilt */
  identity: IdentityLoadSummary | null;
}

/**
 * Context handed to registered command handlers
 */
export interface CommandInvocation {
  sender: string;
  stoneward: Stoneward;
}

export interface Stoneward {
  start(): Promise<StartSummary>;
  readonly started: boolean;
  readonly identities: IdentityCache;
  readonly index: AliasIndex;
  readonly commands: CommandRegistry<CommandInvocation>;

  resolve(scope: string, token: string): Promise<ProtectedAreaRecord[]>;
  aliasExistsAnywhere(alias: string): Promise<boolean>;
  recordsOf(
    scope: string,
    principalId: string,
    options?: RecordsOfOptions
  ): Promise<ProtectedAreaRecord[]>;
  renameRecord(scope: string, id: string, alias: string | undefined): Promise<ProtectedAreaRecord>;

  catalog(): readonly CatalogEntry[];
  perCategoryLimits(principal: string): Map<CatalogEntry, number>;
  globalLimit(principal: string): number;
  quotaFor(principal: string): QuotaRecord;
  /** Whether the principal may create one more area with the given block */
  checkPlacement(principal: string, blockType: string): Promise<PlacementVerdict>;

  runMigrationIfPending(): Promise<MigrationReport>;
  runMigration(options?: MigrationOptions): Promise<MigrationReport>;
  /** Rebuild one scope's index, or reload config, every index and the identities */
  rebuildCaches(scope?: string): Promise<ReloadSummary>;
  /** Resolves once the latest identity load has finished */
  identityReady(): Promise<IdentityLoadSummary>;
}

interface Components {
  config: StonewardConfig;
  resolver: RecordResolver;
  quota: QuotaResolver;
  builder: CacheBuilder;
  migration: MigrationEngine;
}

class StonewardRuntime implements Stoneward {
  #options: StonewardOptions;
  #parts: Components | null = null;
  #starting: Promise<StartSummary> | null = null;
  #identityReady: Promise<IdentityLoadSummary> | null = null;
  #started = false;

  readonly identities = new IdentityCache();
  readonly index = new AliasIndex();
  readonly commands = new CommandRegistry<CommandInvocation>();

  constructor(options: StonewardOptions) {
    this.#options = options;
  }

  get started(): boolean {
    return this.#started;
  }

  async start(): Promise<StartSummary> {
    if (!this.#starting) {
      this.#starting = this.#start().catch((err: unknown) => {
        this.#starting = null;
        throw err;
      });
    }
    return this.#starting;
  }

  async resolve(scope: string, token: string): Promise<ProtectedAreaRecord[]> {
    return this.#require("resolve records").resolver.resolve(scope, token);
  }

  async aliasExistsAnywhere(alias: string): Promise<boolean> {
    return this.#require("check aliases").resolver.aliasExistsAnywhere(alias);
  }

  async recordsOf(
    scope: string,
    principalId: string,
    options?: RecordsOfOptions
  ): Promise<ProtectedAreaRecord[]> {
    return this.#require("list records").resolver.recordsOf(scope, principalId, options);
  }

  async renameRecord(
    scope: string,
    id: string,
    alias: string | undefined
  ): Promise<ProtectedAreaRecord> {
    return this.#require("rename records").resolver.renameRecord(scope, id, alias);
  }

  catalog(): readonly CatalogEntry[] {
    return this.#require("read the catalog").quota.catalog();
  }

  perCategoryLimits(principal: string): Map<CatalogEntry, number> {
    const { config } = this.#require("resolve limits");
    return perCategoryLimits(
      this.#options.permissions.effectiveGrants(principal),
      config.blocks,
      config.permissionNamespace
    );
  }

  globalLimit(principal: string): number {
    const { config } = this.#require("resolve limits");
    return globalLimit(this.#options.permissions.effectiveGrants(principal), config.permissionNamespace);
  }

  quotaFor(principal: string): QuotaRecord {
    return this.#require("resolve limits").quota.forPrincipal(principal);
  }

  async checkPlacement(principal: string, blockType: string): Promise<PlacementVerdict> {
    const { quota, resolver } = this.#require("check placement");
    const entry = quota.catalog().find((candidate) => candidate.key === blockType);
    if (!entry) {
      throw new UnknownBlockTypeError(blockType);
    }

    const usage = { category: 0, total: 0 };
    for (const scope of await this.#options.store.scopes()) {
      const owned = await resolver.recordsOf(scope, principal);
      usage.total += owned.length;
      usage.category += owned.filter((record) => record.blockTypeKey === entry.key).length;
    }

    return evaluatePlacement(quota.forPrincipal(principal), usage, entry);
  }

  async runMigrationIfPending(): Promise<MigrationReport> {
    const { migration } = this.#require("run the migration");
    await this.identityReady();
    return migration.runMigrationIfPending({ onUnresolved: this.#options.onUnresolved });
  }

  async runMigration(options: MigrationOptions = {}): Promise<MigrationReport> {
    const { migration } = this.#require("run the migration");
    await this.identityReady();
    return migration.runMigration({ onUnresolved: this.#options.onUnresolved, ...options });
  }

  async rebuildCaches(scope?: string): Promise<ReloadSummary> {
    const parts = this.#require("rebuild caches");

    if (scope !== undefined) {
      return { scopes: await parts.builder.rebuildIndex(scope), identity: null };
    }

    const config = await this.#options.config.read();
    const next = this.#assemble(config);
    this.#parts = next;

    const scopes = await next.builder.rebuildIndex();
    const identityReady = next.builder.loadIdentities();
    this.#identityReady = identityReady;
    const identity = await identityReady;

    logger.info("runtime.reload", {
      details: { scopes: scopes.length, blocks: config.blocks.length },
    });
    return { scopes, identity };
  }

  async identityReady(): Promise<IdentityLoadSummary> {
    if (!this.#identityReady) {
      throw new NotStartedError("wait for identities");
    }
    return this.#identityReady;
  }

  async #start(): Promise<StartSummary> {
    const config = await this.#options.config.read();
    const parts = this.#assemble(config);

    const build = await parts.builder.build();
    this.#identityReady = build.identityReady;
    let identity = build.background ? null : await build.identityReady;

    if ((await parts.migration.state()) === "PENDING") {
      // Legacy names only resolve against a fully loaded identity cache
      identity = await build.identityReady;
    }
    const migration = await parts.migration.runMigrationIfPending({
      onUnresolved: this.#options.onUnresolved,
    });

    this.#parts = parts;
    this.#started = true;

    logger.info("runtime.ready", {
      details: {
        scopes: build.scopes.length,
        identitiesInBackground: identity === null,
        migration: migration.status,
      },
    });

    return { scopes: build.scopes, identity, migration };
  }

  #assemble(config: StonewardConfig): Components {
    const { store, directory, permissions, profileCache } = this.#options;
    const idPrefix = config.idPrefix;

    return {
      config,
      resolver: new RecordResolver(store, this.index, { idPrefix }),
      quota: new QuotaResolver(permissions, config.blocks, config.permissionNamespace),
      builder: new CacheBuilder(store, directory, this.index, this.identities, {
        idPrefix,
        asyncIdentityLoad: config.identity.asyncLoad,
        profileCache: config.identity.pushProfiles ? profileCache : undefined,
      }),
      migration: new MigrationEngine(store, this.identities, this.#options.config, { idPrefix }),
    };
  }

  #require(operation: string): Components {
    if (!this.#started || !this.#parts) {
      throw new NotStartedError(operation);
    }
    return this.#parts;
  }
}

/**
 * Create a runtime over the host's collaborators. Call start() before anything else.
 */
export function openStoneward(options: StonewardOptions): Stoneward {
  return new StonewardRuntime(options);
}
