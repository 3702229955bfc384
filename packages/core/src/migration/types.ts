/**
 * @module migration/types
 * Type definitions for migrations, their discovered descriptions, the
 * application log, and the reconciled state report.
 */

/**
 * A migration version: an unsigned 64-bit integer parsed from the
 * 14-digit prefix of a migration filename (e.g. `20211224091800n`).
 * Versions are totally ordered by integer comparison.
 */
export type Version = bigint;

/**
 * Which script of a migration is meant.
 *
 * - `'up'` — Forward script (`.up.sql`)
 * - `'down'` — Reverse script (`.down.sql`)
 */
export type Direction = 'up' | 'down';

/**
 * A single migration, identified by its version.
 */
export interface Migration {
  /** Version parsed from the filename prefix */
  Version: Version;

  /** Name following the version underscore (e.g. "add_users_table") */
  Name: string;
}

/**
 * A migration as discovered in the migrations directory.
 */
export interface MigrationDescription extends Migration {
  /** True when a `.down.sql` script exists for this version */
  CanUndo: boolean;
}

/**
 * One historical application event from the migration log.
 * Entries are supplied in the log store's insertion order.
 */
export interface LogEntry extends Migration {
  /** Whether the migration was applied or reverted */
  Direction: Direction;

  /** When the event was recorded (null if the store had no usable timestamp) */
  AppliedAt: Date | null;
}

/**
 * The state of a migration relative to the database.
 */
export type MigrationStatus =
  | 'PENDING'   // Discovered on disk but not applied (or reverted)
  | 'APPLIED'   // Last logged event was an `up`
  | 'MISSING';  // In the log but no longer found on disk

/**
 * Combined view of a migration's description and its database state.
 */
export interface MigrationState extends MigrationDescription {
  /** Current status relative to the database */
  Status: MigrationStatus;

  /** When the migration was applied; null unless the last logged event was an `up` */
  AppliedAt: Date | null;
}

/**
 * Result of reconciling the catalog against the migration log.
 */
export interface ValidationResult {
  /** One entry per version, ascending by version */
  Migrations: MigrationState[];

  /** Catalog migrations whose last logged event is an `up` */
  AppliedCount: number;

  /** Catalog migrations never applied, or reverted */
  PendingCount: number;

  /** Logged migrations no longer present in the catalog */
  MissingCount: number;
}

/**
 * Orders two versions ascending. Suitable for `Array.prototype.sort`.
 */
export function CompareVersions(a: Version, b: Version): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
