/**
 * Error types for stoneward operations
 *
 * Invariants:
 * - All errors name the scope, record or file they concern in the message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all stoneward errors
 */
export abstract class StonewardError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a world scope has no authoritative store behind it
 */
export class ScopeNotFoundError extends StonewardError {
  readonly code = "E_SCOPE";

  constructor(
    public readonly scope: string,
    options?: ErrorOptions
  ) {
    super(`World scope not found: ${scope}`, options);
  }
}

/**
 * Thrown when a record id is required to exist but does not
 */
export class RecordNotFoundError extends StonewardError {
  readonly code = "E_RECORD";

  constructor(
    public readonly scope: string,
    public readonly id: string,
    options?: ErrorOptions
  ) {
    super(`Protected area not found: ${scope}/${id}`, options);
  }
}

/**
 * Thrown when the identity directory cannot be enumerated
 */
export class DirectoryUnavailableError extends StonewardError {
  readonly code = "E_DIRECTORY";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Identity directory unavailable: ${reason}`, options);
  }
}

/**
 * Thrown when the configuration file is missing required structure or has invalid values
 */
export class ConfigError extends StonewardError {
  readonly code = "E_CONFIG";

  constructor(
    filePath: string,
    public readonly issues: string[] = [],
    options?: ErrorOptions
  ) {
    super(
      issues.length > 0
        ? `Invalid configuration ${filePath}: ${issues.join("; ")}`
        : `Failed to load configuration: ${filePath}`,
      options
    );
  }
}

/**
 * Thrown when a stored region document does not match the region schema
 */
export class RegionDocumentError extends StonewardError {
  readonly code = "E_REGION_DOC";

  constructor(
    filePath: string,
    public readonly issues: string[],
    options?: ErrorOptions
  ) {
    super(`Invalid region document ${filePath}: ${issues.join("; ")}`, options);
  }
}

/**
 * Thrown when reading a file the store owns fails
 */
export class DocumentReadError extends StonewardError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read document: ${filePath}`, options);
  }
}

/**
 * Thrown when writing a file the store owns fails
 */
export class DocumentWriteError extends StonewardError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write document: ${filePath}`, options);
  }
}

/**
 * Thrown when listing a world directory fails
 */
export class ListFilesError extends StonewardError {
  readonly code = "LIST_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Failed to list files in directory: ${dirPath}`, options);
  }
}

/**
 * Thrown when a command label is registered twice
 */
export class DuplicateCommandError extends StonewardError {
  readonly code = "E_COMMAND_DUP";

  constructor(
    public readonly label: string,
    options?: ErrorOptions
  ) {
    super(`Command label already registered: ${label}`, options);
  }
}

/**
 * Thrown when the runtime is used before start() has finished
 */
export class NotStartedError extends StonewardError {
  readonly code = "E_NOT_STARTED";

  constructor(operation: string, options?: ErrorOptions) {
    super(`Cannot ${operation} before the runtime has started`, options);
  }
}

/**
 * Thrown when a block key is not in the configured catalog
 */
export class UnknownBlockTypeError extends StonewardError {
  readonly code = "E_BLOCK";

  constructor(
    public readonly blockType: string,
    options?: ErrorOptions
  ) {
    super(`Block type is not a configured protection block: ${blockType}`, options);
  }
}
