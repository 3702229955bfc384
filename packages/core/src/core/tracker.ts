/**
 * @module core/tracker
 * Main orchestrator for migstate status checks.
 *
 * The `MigrationTracker` class is the primary public API for programmatic
 * usage. It wires the migrations directory and the SQL Server migration
 * log together and reconciles them.
 *
 * @example
 * ```typescript
 * import { MigrationTracker } from '@migstate/core';
 *
 * const tracker = new MigrationTracker({
 *   Database: { Server: 'localhost', Database: 'mydb', User: 'sa', Password: 'secret' },
 *   Migrations: { Location: './migrations' },
 * });
 *
 * const result = await tracker.Validate();
 * console.log(`${result.PendingCount} pending, ${result.MissingCount} missing`);
 *
 * await tracker.Close();
 * ```
 */

import * as sql from 'mssql';
import { MigstateConfig, ResolvedConfig, resolveConfig } from './config';
import { ConnectionManager } from '../db/connection';
import { MigrationLogTable } from '../log/log-table';
import { MigrationLog } from '../log/types';
import { FileMigrationSource } from '../source/file-source';
import { MigrationFileSystem } from '../source/types';
import { NodeFileSystem } from '../source/file-system';
import { ValidateMigrations } from '../migration/validate';
import { ValidationResult } from '../migration/types';

/**
 * Callback interface for observing progress.
 */
export interface TrackerCallbacks {
  /** Called for informational log messages */
  OnLog?: (message: string) => void;

  /** Called for each migration file name that was skipped */
  OnWarning?: (message: string) => void;
}

/**
 * Builds the migration log once the pool is connected.
 */
export type MigrationLogFactory = (
  pool: sql.ConnectionPool,
  schema: string,
  tableName: string
) => MigrationLog;

const createLogTable: MigrationLogFactory = (pool, schema, tableName) =>
  new MigrationLogTable(pool, schema, tableName);

/**
 * The migstate status engine.
 *
 * - `Validate()` — Classify every migration as pending, applied or missing
 * - `Close()` — Release the database connection
 */
export class MigrationTracker {
  private readonly config: ResolvedConfig;
  private readonly connectionManager: ConnectionManager;
  private readonly fileSystem: MigrationFileSystem;
  private readonly logFactory: MigrationLogFactory;
  private callbacks: TrackerCallbacks = {};

  /**
   * @param config - Connection and migration settings
   * @param fileSystem - Filesystem the migrations are read from. Defaults to the local disk
   * @param logFactory - Builds the migration log. Defaults to {@link MigrationLogTable}
   */
  constructor(
    config: MigstateConfig,
    fileSystem: MigrationFileSystem = new NodeFileSystem(),
    logFactory: MigrationLogFactory = createLogTable
  ) {
    this.config = resolveConfig(config);
    this.connectionManager = new ConnectionManager(this.config.Database);
    this.fileSystem = fileSystem;
    this.logFactory = logFactory;
  }

  /**
   * Registers callbacks for observing progress.
   * Returns `this` for chaining.
   *
   * @example
   * ```typescript
   * await tracker.OnProgress({ OnLog: (msg) => console.log(msg) }).Validate();
   * ```
   */
  OnProgress(callbacks: TrackerCallbacks): this {
    this.callbacks = callbacks;
    return this;
  }

  /**
   * Reconciles the migrations directory against the migration log.
   *
   * The workflow:
   * 1. Check the migrations directory (before any connection is made)
   * 2. Connect to the database
   * 3. Scan the directory and read the log table
   * 4. Reconcile the two
   *
   * @throws MigrationsDirectoryError if the configured location is not a directory
   * @throws ConnectionError if the database cannot be reached
   * @throws StatusCheckError if scanning or reading the log fails
   */
  async Validate(): Promise<ValidationResult> {
    const source = await FileMigrationSource.Open(
      this.config.Migrations.Location,
      this.fileSystem
    );

    await this.connectionManager.Connect();
    const log = this.logFactory(
      this.connectionManager.GetPool(),
      this.config.Migrations.DefaultSchema,
      this.config.Migrations.LogTable
    );

    this.callbacks.OnLog?.(`Scanning ${source.Directory}...`);
    const result = await ValidateMigrations(
      source,
      log,
      (warning) => this.callbacks.OnWarning?.(warning)
    );

    this.callbacks.OnLog?.(
      `Found ${result.Migrations.length} migration(s): ` +
        `${result.AppliedCount} applied, ${result.PendingCount} pending, ${result.MissingCount} missing`
    );
    return result;
  }

  /**
   * Closes the database connection pool.
   * Should be called when done with the tracker.
   */
  async Close(): Promise<void> {
    await this.connectionManager.Disconnect();
  }
}
