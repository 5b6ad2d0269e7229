/**
 * Stoneward SDK
 *
 * Alias index, identity cache, quota resolution and ownership migration for
 * protected areas kept in an authoritative region store
 */

// Re-export types
export { NO_LIMIT } from "./types.js";
export type {
  PrincipalRef,
  Membership,
  StoredRegion,
  ProtectedAreaRecord,
  CatalogEntry,
  QuotaRecord,
  RecordStore,
  PermissionSet,
  DirectoryEntry,
  IdentityDirectory,
  Profile,
  ProfileCache,
} from "./types.js";

// Runtime facade
export { openStoneward } from "./runtime.js";
export type {
  Stoneward,
  StonewardOptions,
  StartSummary,
  ReloadSummary,
  CommandInvocation,
} from "./runtime.js";

// Components
export { AliasIndex } from "./indexes.js";
export type { AliasBuckets, RebuildStats } from "./indexes.js";
export { RecordResolver } from "./resolver.js";
export type { ResolverOptions, RecordsOfOptions } from "./resolver.js";
export { IdentityCache } from "./identity-cache.js";
export type { PopulateSummary } from "./identity-cache.js";
export { CacheBuilder } from "./cache-builder.js";
export type { CacheBuilderOptions, IdentityLoadSummary, BuildResult } from "./cache-builder.js";
export { MigrationEngine } from "./migration.js";
export type {
  MigrationState,
  MembershipRole,
  UnresolvedLegacyOwner,
  MigrationReport,
  MigrationOptions,
  MigrationEngineOptions,
} from "./migration.js";
export {
  QuotaResolver,
  DEFAULT_PERMISSION_NAMESPACE,
  perCategoryLimits,
  globalLimit,
  resolveQuota,
  evaluatePlacement,
  findCatalogEntry,
  isProtectBlockType,
} from "./quota.js";
export type { PlacementUsage, PlacementVerdict } from "./quota.js";
export { CommandRegistry } from "./commands.js";
export type { RegisteredCommand } from "./commands.js";

// Utilities
export {
  isIdentifierForm,
  byId,
  byName,
  parsePrincipalRef,
  formatPrincipalRef,
  refersTo,
} from "./principal.js";
export { isProtectedArea, DEFAULT_ID_PREFIX } from "./region.js";
export { Mutex } from "./lock.js";

// Configuration
export {
  CONFIG_VERSION,
  ConfigSchema,
  CatalogEntrySchema,
  parseConfig,
  JsonFileConfig,
} from "./config.js";
export type { StonewardConfig, PersistentConfig } from "./config.js";

// Collaborator implementations
export {
  MemoryRecordStore,
  MemoryIdentityDirectory,
  StaticPermissionSet,
  MemoryConfig,
  MemoryProfileCache,
} from "./memory.js";
export {
  JsonRegionStore,
  JsonIdentityDirectory,
  openWorldDirectory,
  fromDocument,
  toDocument,
  CONFIG_FILE,
  WORLDS_DIR,
  PROFILES_FILE,
} from "./json-store.js";
export type { RegionDocument } from "./json-store.js";

// Observability
export { logger } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { ScopeMetrics } from "./observability/metrics.js";

// Errors
export {
  StonewardError,
  ScopeNotFoundError,
  RecordNotFoundError,
  DirectoryUnavailableError,
  ConfigError,
  RegionDocumentError,
  DocumentReadError,
  DocumentWriteError,
  ListFilesError,
  DuplicateCommandError,
  NotStartedError,
  UnknownBlockTypeError,
} from "./errors.js";
