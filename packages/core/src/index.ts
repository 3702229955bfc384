/**
 * @module @migstate/core
 *
 * migstate — discovers migration files and reconciles them against the
 * log of applied migrations kept in SQL Server.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { MigrationTracker } from '@migstate/core';
 *
 * const tracker = new MigrationTracker({
 *   Database: {
 *     Server: 'localhost',
 *     Database: 'my_app',
 *     User: 'sa',
 *     Password: 'secret',
 *   },
 *   Migrations: {
 *     Location: './migrations',
 *   },
 * });
 *
 * const result = await tracker.Validate();
 * console.log(`${result.MissingCount} missing migration(s)`);
 *
 * await tracker.Close();
 * ```
 *
 * The catalog builder and reconciler are pure and can be used without a
 * database:
 *
 * ```typescript
 * import { BuildCatalog, ReconcileMigrations } from '@migstate/core';
 *
 * const catalog = BuildCatalog(entries);
 * const result = ReconcileMigrations(catalog, logEntries);
 * ```
 *
 * @packageDocumentation
 */

// ─── Main API ────────────────────────────────────────────────────────
export { MigrationTracker } from './core/tracker';
export type { TrackerCallbacks, MigrationLogFactory } from './core/tracker';

// ─── Configuration ───────────────────────────────────────────────────
export { resolveConfig } from './core/config';
export type { MigstateConfig, MigrationConfig, ResolvedConfig } from './core/config';

// ─── Database ────────────────────────────────────────────────────────
export type { DatabaseConfig, DatabaseConnectionOptions } from './db/types';
export { ConnectionManager, BuildPoolConfig } from './db/connection';

// ─── Migration Types ─────────────────────────────────────────────────
export type {
  Version,
  Direction,
  Migration,
  MigrationDescription,
  LogEntry,
  MigrationStatus,
  MigrationState,
  ValidationResult,
} from './migration/types';
export { CompareVersions } from './migration/types';

// ─── Catalog & Reconciliation ────────────────────────────────────────
export {
  ParseMigrationFilename,
  FormatMigrationFilename,
  FormatVersion,
  MIGRATION_PREFIX,
  MIGRATION_SUFFIXES,
  VERSION_LENGTH,
} from './migration/parser';
export type { ParsedMigrationFile } from './migration/parser';
export { BuildCatalog } from './migration/catalog';
export type { DirectoryEntry, ScanWarningCallback } from './migration/catalog';
export { FoldMigrationLog, ReconcileMigrations } from './migration/reconciler';
export { ValidateMigrations } from './migration/validate';

// ─── Migration Source ────────────────────────────────────────────────
export type { MigrationSource, MigrationFileSystem, PathKind } from './source/types';
export { FileMigrationSource } from './source/file-source';
export { NodeFileSystem } from './source/file-system';

// ─── Migration Log ───────────────────────────────────────────────────
export type { MigrationLog, LogDirectionCode } from './log/types';
export { MigrationLogTable, MapRowToLogEntry, QuoteIdentifier } from './log/log-table';

// ─── Errors ──────────────────────────────────────────────────────────
export {
  MigstateError,
  MigrationsDirectoryError,
  MigrationParseError,
  DuplicateMigrationError,
  StatusCheckError,
  MigrationLogError,
  ConnectionError,
  ToError,
} from './core/errors';
export type { MigstateErrorCode } from './core/errors';
