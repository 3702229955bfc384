/**
 * @module migration/catalog
 * Builds the migration catalog from a directory listing.
 *
 * Every regular file whose name follows the migration naming convention
 * contributes to one {@link MigrationDescription} per version. Files with
 * other names are skipped (and reported through the warning callback) so
 * that stray files never block a scan. Two files that share a version but
 * not a name abort the build.
 */

import { Direction, Migration, MigrationDescription, Version, CompareVersions } from './types';
import { ParseMigrationFilename, ParsedMigrationFile } from './parser';
import { DuplicateMigrationError, MigrationParseError } from '../core/errors';

/**
 * One entry of a directory listing.
 */
export interface DirectoryEntry {
  /** Basename of the entry */
  Name: string;

  /** True for directories */
  IsDirectory: boolean;

  /** True only for regular files (false for symlinks, devices, sockets, FIFOs) */
  IsRegularFile: boolean;
}

/**
 * Callback for reporting non-fatal scan issues (e.g., unparseable filenames).
 */
export type ScanWarningCallback = (message: string) => void;

/**
 * Builds an ascending-by-version catalog from a directory listing.
 *
 * Entries are processed in listing order. The first file seen for a
 * version seeds its description; a later `down` file for the same
 * version and name marks it undoable.
 *
 * @param entries - Directory entries of the migrations directory
 * @param onWarning - Optional callback for skipped filenames
 * @returns Descriptions sorted ascending by version, one per version
 * @throws DuplicateMigrationError if a version appears with two different names
 */
export function BuildCatalog(
  entries: readonly DirectoryEntry[],
  onWarning?: ScanWarningCallback
): MigrationDescription[] {
  const byVersion = new Map<Version, MigrationDescription>();

  for (const entry of entries) {
    if (entry.IsDirectory || !entry.IsRegularFile) {
      continue;
    }

    const parsed = tryParseFilename(entry.Name, onWarning);
    if (parsed === null) {
      continue;
    }

    mergeDescription(byVersion, parsed, parsed.Direction);
  }

  return [...byVersion.values()].sort((a, b) => CompareVersions(a.Version, b.Version));
}

/**
 * Parses a filename, turning a naming violation into a reported skip.
 */
function tryParseFilename(
  filename: string,
  onWarning?: ScanWarningCallback
): ParsedMigrationFile | null {
  try {
    return ParseMigrationFilename(filename);
  } catch (err) {
    if (err instanceof MigrationParseError) {
      onWarning?.(err.message);
      return null;
    }
    throw err;
  }
}

/**
 * Folds one parsed file into the version map.
 */
function mergeDescription(
  byVersion: Map<Version, MigrationDescription>,
  migration: Migration,
  direction: Direction
): void {
  const existing = byVersion.get(migration.Version);

  if (!existing) {
    byVersion.set(migration.Version, {
      Version: migration.Version,
      Name: migration.Name,
      CanUndo: direction === 'down',
    });
    return;
  }

  if (existing.Name !== migration.Name) {
    throw new DuplicateMigrationError(migration.Version, existing.Name, migration.Name);
  }

  if (direction === 'down' && !existing.CanUndo) {
    byVersion.set(migration.Version, { ...existing, CanUndo: true });
  }
}
