/**
 * @module migration/reconciler
 * Determines the state of every migration by replaying the migration log
 * against the catalog of migrations found on disk.
 *
 * The log is replayed in the order the store returned it, never re-sorted
 * by timestamp: each event fully replaces the previous state of its
 * version, so `up`, `down`, `up` leaves the migration applied at the time
 * of the last `up`.
 */

import {
  LogEntry,
  MigrationDescription,
  MigrationState,
  ValidationResult,
  Version,
  CompareVersions,
} from './types';

/**
 * Reduces the migration log to the last known state of each version.
 *
 * @param log - Log entries in store insertion order
 * @returns Map of version to the state left by its last event
 */
export function FoldMigrationLog(log: readonly LogEntry[]): Map<Version, MigrationState> {
  const states = new Map<Version, MigrationState>();

  for (const entry of log) {
    const applied = entry.Direction === 'up';
    states.set(entry.Version, {
      Version: entry.Version,
      Name: entry.Name,
      CanUndo: false,
      Status: applied ? 'APPLIED' : 'PENDING',
      AppliedAt: applied ? entry.AppliedAt : null,
    });
  }

  return states;
}

/**
 * Reconciles the catalog against the migration log.
 *
 * - Catalog migrations take their status from the folded log, or are
 *   `PENDING` when the log never mentions them.
 * - Logged versions absent from the catalog are reported as `MISSING`
 *   whatever their last event was, since their scripts can no longer be
 *   inspected or reverted.
 *
 * @param catalog - Descriptions from the catalog builder, ascending by version
 * @param log - Log entries in store insertion order
 * @returns Every version exactly once, ascending, with per-status counts
 */
export function ReconcileMigrations(
  catalog: readonly MigrationDescription[],
  log: readonly LogEntry[]
): ValidationResult {
  const folded = FoldMigrationLog(log);
  const result: ValidationResult = {
    Migrations: [],
    AppliedCount: 0,
    PendingCount: 0,
    MissingCount: 0,
  };

  const catalogVersions = new Set<Version>();
  for (const description of catalog) {
    catalogVersions.add(description.Version);

    const logged = folded.get(description.Version);
    const status = logged?.Status ?? 'PENDING';

    if (status === 'PENDING') {
      result.PendingCount++;
    } else {
      result.AppliedCount++;
    }

    result.Migrations.push({
      ...description,
      Status: status,
      AppliedAt: logged?.AppliedAt ?? null,
    });
  }

  // --- Logged migrations whose files are gone ---
  for (const logged of folded.values()) {
    if (catalogVersions.has(logged.Version)) {
      continue;
    }

    result.Migrations.push({
      ...logged,
      CanUndo: false,
      Status: 'MISSING',
    });
    result.MissingCount++;
  }

  result.Migrations.sort((a, b) => CompareVersions(a.Version, b.Version));
  return result;
}
