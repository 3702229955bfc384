/**
 * @module core/config
 * migstate configuration types and defaults.
 */

import { DatabaseConfig } from '../db/types';

/**
 * Complete configuration for a migstate status check.
 */
export interface MigstateConfig {
  /** SQL Server connection settings for the migration log */
  Database: DatabaseConfig;

  /** Migration discovery and log table settings */
  Migrations: MigrationConfig;
}

/**
 * Configuration for where migrations and their log live.
 */
export interface MigrationConfig {
  /**
   * Directory holding the `V{version}_{name}.{up|down}.sql` files.
   * Only its direct children are scanned.
   *
   * @example `'./migrations'`
   */
  Location: string;

  /**
   * Schema that holds the migration log table.
   * Defaults to `'dbo'`.
   */
  DefaultSchema?: string;

  /**
   * Name of the migration log table.
   * Defaults to `'migration_log'`.
   */
  LogTable?: string;
}

/**
 * Configuration with every default applied.
 */
export type ResolvedConfig = MigstateConfig & { Migrations: Required<MigrationConfig> };

/**
 * Merges user-provided config with defaults.
 * @param config - Configuration provided by the user
 * @returns Complete configuration with all defaults applied
 */
export function resolveConfig(config: MigstateConfig): ResolvedConfig {
  return {
    Database: config.Database,
    Migrations: {
      Location: config.Migrations.Location,
      DefaultSchema: config.Migrations.DefaultSchema ?? 'dbo',
      LogTable: config.Migrations.LogTable ?? 'migration_log',
    },
  };
}
