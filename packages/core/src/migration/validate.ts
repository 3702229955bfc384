/**
 * @module migration/validate
 * Runs a status check: fetches the catalog and the log from their
 * collaborators, then reconciles them.
 */

import { LogEntry, MigrationDescription, ValidationResult } from './types';
import { ScanWarningCallback } from './catalog';
import { ReconcileMigrations } from './reconciler';
import { MigrationSource } from '../source/types';
import { MigrationLog } from '../log/types';
import { StatusCheckError, ToError } from '../core/errors';

/**
 * Reports the state of every migration known to the source or the log.
 *
 * @param source - Provides the catalog of available migrations
 * @param log - Provides the migration log in insertion order
 * @param onWarning - Optional callback for filenames the source skipped
 * @throws StatusCheckError if either collaborator fails; the original error is the `cause`
 */
export async function ValidateMigrations(
  source: MigrationSource,
  log: MigrationLog,
  onWarning?: ScanWarningCallback
): Promise<ValidationResult> {
  let available: MigrationDescription[];
  try {
    available = await source.GetAvailableMigrations(onWarning);
  } catch (err) {
    throw new StatusCheckError(
      'SOURCE_FAILED',
      'Failed to get the list of available migrations',
      ToError(err)
    );
  }

  let entries: LogEntry[];
  try {
    entries = await log.ListMigrationsLog();
  } catch (err) {
    throw new StatusCheckError(
      'LOG_FAILED',
      'Failed to get the list of applied migrations',
      ToError(err)
    );
  }

  return ReconcileMigrations(available, entries);
}
