/**
 * One-shot migration of legacy name-keyed ownership to identifier-keyed ownership
 *
 * States: PENDING (guard flag false) → COMPLETE (guard flag true).
 *
 * Invariants:
 * - Identifier-form entries are never modified
 * - A name the identity cache cannot resolve stays as-is and is reported; the pass continues
 * - The guard is persisted once the whole enumeration finishes, whatever was unresolved
 * - Names left unresolved are not revisited by later guarded runs; `force` reruns the pass
 * - Concurrent calls share the pass already in flight
 */

import { IdentityCache } from "./identity-cache.js";
import { DEFAULT_ID_PREFIX, isProtectedArea } from "./region.js";
import { byId } from "./principal.js";
import type { PersistentConfig } from "./config.js";
import type { PrincipalRef, ProtectedAreaRecord, RecordStore } from "./types.js";
import { logger } from "./observability/logs.js";

export type MigrationState = "PENDING" | "COMPLETE";

export type MembershipRole = "owner" | "member";

/**
 * A legacy name that could not be mapped to an identifier
 */
export interface UnresolvedLegacyOwner {
  scope: string;
  recordId: string;
  role: MembershipRole;
  name: string;
}

export interface MigrationReport {
  /** "skipped" when the guard was already set and the run was not forced */
  status: "completed" | "skipped";
  /** Protected areas inspected */
  scanned: number;
  /** Areas rewritten and handed to the store */
  converted: Array<{ scope: string; recordId: string }>;
  unresolved: UnresolvedLegacyOwner[];
}

export interface MigrationOptions {
  /** Run the pass even though the guard is set */
  force?: boolean;
  /** Called for each unresolved name as it is found */
  onUnresolved?: (event: UnresolvedLegacyOwner) => void;
}

export interface MigrationEngineOptions {
  idPrefix?: string;
}

export class MigrationEngine {
  #store: RecordStore;
  #identities: IdentityCache;
  #config: PersistentConfig;
  #idPrefix: string;
  #running: { force: boolean; report: Promise<MigrationReport> } | null = null;

  constructor(
    store: RecordStore,
    identities: IdentityCache,
    config: PersistentConfig,
    options: MigrationEngineOptions = {}
  ) {
    this.#store = store;
    this.#identities = identities;
    this.#config = config;
    this.#idPrefix = options.idPrefix ?? DEFAULT_ID_PREFIX;
  }

  async state(): Promise<MigrationState> {
    const config = await this.#config.read();
    return config.migration.identifiersComplete ? "COMPLETE" : "PENDING";
  }

  /**
   * Run the pass if the guard is not yet set; otherwise report "skipped"
   */
  async runMigrationIfPending(
    options: Omit<MigrationOptions, "force"> = {}
  ): Promise<MigrationReport> {
    return this.runMigration({ ...options, force: false });
  }

  /**
   * Run the pass. A call made while a pass with the same `force` is running shares
   * that pass; a call with a different `force` runs after it.
   */
  async runMigration(options: MigrationOptions = {}): Promise<MigrationReport> {
    const force = options.force === true;
    const current = this.#running;
    if (current && current.force === force) {
      return current.report;
    }

    const report = current
      ? current.report.then(
          () => this.#guardedPass(options),
          () => this.#guardedPass(options)
        )
      : this.#guardedPass(options);
    const running = { force, report };
    this.#running = running;
    try {
      return await report;
    } finally {
      if (this.#running === running) {
        this.#running = null;
      }
    }
  }

  async #guardedPass(options: MigrationOptions): Promise<MigrationReport> {
    if (options.force !== true && (await this.state()) === "COMPLETE") {
      logger.debug("migration.skip", { message: "identifier migration already complete" });
      return { status: "skipped", scanned: 0, converted: [], unresolved: [] };
    }

    logger.info("migration.start", { details: { forced: options.force === true } });

    const report: MigrationReport = {
      status: "completed",
      scanned: 0,
      converted: [],
      unresolved: [],
    };

    for (const scope of await this.#store.scopes()) {
      const regions = await this.#store.list(scope);
      for (const region of regions) {
        if (!isProtectedArea(region, this.#idPrefix)) continue;
        report.scanned++;
        await this.#migrateRecord(scope, region, report, options.onUnresolved);
      }
    }

    await this.#config.setMigrationComplete(true);

    if (report.unresolved.length > 0) {
      logger.warn("migration.unresolved.summary", {
        message: `${report.unresolved.length} legacy name(s) could not be converted`,
        details: {
          entries: report.unresolved.map((u) => `${u.scope}/${u.recordId}:${u.role}:${u.name}`),
        },
      });
    }
    logger.info("migration.end", {
      details: {
        scanned: report.scanned,
        converted: report.converted.length,
        unresolved: report.unresolved.length,
      },
    });

    return report;
  }

  async #migrateRecord(
    scope: string,
    record: ProtectedAreaRecord,
    report: MigrationReport,
    onUnresolved: ((event: UnresolvedLegacyOwner) => void) | undefined
  ): Promise<void> {
    const unresolved: UnresolvedLegacyOwner[] = [];
    const owners = this.#convert(record.owners, "owner", scope, record.id, unresolved);
    const members = this.#convert(record.members, "member", scope, record.id, unresolved);

    for (const event of unresolved) {
      report.unresolved.push(event);
      logger.warn("migration.unresolved", {
        scope,
        record: record.id,
        message: `no identifier known for ${event.role} "${event.name}"`,
      });
      onUnresolved?.(event);
    }

    if (!owners.changed && !members.changed) return;

    await this.#store.updateMembership(scope, record.id, {
      owners: owners.refs,
      members: members.refs,
    });
    report.converted.push({ scope, recordId: record.id });
    logger.debug("migration.record", { scope, record: record.id });
  }

  /**
   * Rewrite resolvable names to ids in place. A converted id already listed is dropped.
   */
  #convert(
    refs: readonly PrincipalRef[],
    role: MembershipRole,
    scope: string,
    recordId: string,
    unresolved: UnresolvedLegacyOwner[]
  ): { refs: PrincipalRef[]; changed: boolean } {
    const result: PrincipalRef[] = [];
    const seenIds = new Set<string>();
    for (const ref of refs) {
      if (ref.kind === "id") seenIds.add(ref.id);
    }
    let changed = false;

    for (const ref of refs) {
      if (ref.kind === "id") {
        result.push(ref);
        continue;
      }

      const id = this.#identities.idOf(ref.name);
      if (id === undefined) {
        unresolved.push({ scope, recordId, role, name: ref.name });
        result.push(ref);
        continue;
      }

      changed = true;
      if (!seenIds.has(id)) {
        seenIds.add(id);
        result.push(byId(id));
      }
    }

    return { refs: result, changed };
  }
}
