/**
 * @module core/errors
 * Custom error types for migstate operations.
 */

/**
 * Machine-readable codes carried by every {@link MigstateError}.
 */
export type MigstateErrorCode =
  | 'MIGRATIONS_DIRECTORY_INVALID'
  | 'MIGRATION_PARSE_FAILED'
  | 'MIGRATION_DUPLICATED'
  | 'SOURCE_FAILED'
  | 'LOG_FAILED'
  | 'INVALID_LOG_TABLE'
  | 'CONNECTION_FAILED';

/**
 * Base error class for all migstate errors.
 * Provides a consistent error hierarchy with error codes for programmatic handling.
 */
export class MigstateError extends Error {
  /** Machine-readable error code for programmatic handling */
  readonly Code: MigstateErrorCode;

  constructor(code: MigstateErrorCode, message: string, cause?: Error) {
    super(message);
    this.name = 'MigstateError';
    this.Code = code;
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * Thrown when the configured migrations directory does not exist or is
 * not a directory. This is a configuration error raised before any scan.
 */
export class MigrationsDirectoryError extends MigstateError {
  /** The path that was configured */
  readonly Path: string;

  constructor(path: string, message: string, cause?: Error) {
    super('MIGRATIONS_DIRECTORY_INVALID', message, cause);
    this.name = 'MigrationsDirectoryError';
    this.Path = path;
  }
}

/**
 * Thrown when a migration file has an invalid name that cannot be parsed.
 * The catalog builder treats this as a skip, not a failure.
 */
export class MigrationParseError extends MigstateError {
  /** The filename that could not be parsed */
  readonly Filename: string;

  constructor(filename: string, reason: string) {
    super('MIGRATION_PARSE_FAILED', `Migration file name is invalid: ${filename} ${reason}`);
    this.name = 'MigrationParseError';
    this.Filename = filename;
  }
}

/**
 * Thrown when two migration files share a version but disagree on the name.
 */
export class DuplicateMigrationError extends MigstateError {
  /** The conflicting version */
  readonly Version: bigint;

  /** Name recorded first for this version */
  readonly ExistingName: string;

  /** Name found on the later file */
  readonly ConflictingName: string;

  constructor(version: bigint, existingName: string, conflictingName: string) {
    super(
      'MIGRATION_DUPLICATED',
      `Migration version already exists with a different name: ` +
        `version ${version} has conflicting names "${existingName}" and "${conflictingName}"`
    );
    this.name = 'DuplicateMigrationError';
    this.Version = version;
    this.ExistingName = existingName;
    this.ConflictingName = conflictingName;
  }
}

/**
 * Thrown when the migration source or the migration log fails during a
 * status check. The original failure is kept as `cause`.
 */
export class StatusCheckError extends MigstateError {
  constructor(code: 'SOURCE_FAILED' | 'LOG_FAILED', message: string, cause: Error) {
    super(code, `${message}: ${cause.message}`, cause);
    this.name = 'StatusCheckError';
  }
}

/**
 * Thrown when a row of the migration log table cannot be interpreted.
 */
export class MigrationLogError extends MigstateError {
  constructor(message: string) {
    super('INVALID_LOG_TABLE', `An error has occurred when reading the log table: ${message}`);
    this.name = 'MigrationLogError';
  }
}

/**
 * Thrown when the connection to SQL Server cannot be established.
 */
export class ConnectionError extends MigstateError {
  constructor(message: string, cause?: Error) {
    super('CONNECTION_FAILED', message, cause);
    this.name = 'ConnectionError';
  }
}

/**
 * Normalizes an unknown thrown value into an `Error`.
 */
export function ToError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
