/**
 * @module migration/parser
 * Parses migration filenames into structured metadata.
 *
 * A migration file is named `V{version}_{name}.{up|down}.sql`, where the
 * version is exactly 14 decimal digits (typically a `YYYYMMDDHHMMSS`
 * timestamp) and the name is any non-empty text:
 *
 * - `V20211224091800_add_users_table.up.sql`
 * - `V20211224091800_add_users_table.down.sql`
 */

import { Direction, Migration, Version } from './types';
import { MigrationParseError } from '../core/errors';

/** Literal prefix every migration filename starts with */
export const MIGRATION_PREFIX = 'V';

/** Number of digits in the version segment */
export const VERSION_LENGTH = 14;

/**
 * Filename suffix for each direction. A filename must end with exactly
 * one of these to be recognized.
 */
export const MIGRATION_SUFFIXES: Readonly<Record<Direction, string>> = {
  up: '.up.sql',
  down: '.down.sql',
};

const VERSION_PATTERN = /^[0-9]{14}$/;

/**
 * Metadata parsed from a migration filename.
 */
export interface ParsedMigrationFile extends Migration {
  /** Which script this file holds */
  Direction: Direction;

  /** The original filename */
  Filename: string;
}

/**
 * Parses a migration filename into its version, name and direction.
 *
 * @param filename - Basename of the file (no directory part)
 * @throws MigrationParseError if the filename does not follow the naming convention
 *
 * @example
 * ```typescript
 * const parsed = ParseMigrationFilename('V20211224091800_add_users_table.down.sql');
 * // parsed.Version === 20211224091800n
 * // parsed.Name === 'add_users_table'
 * // parsed.Direction === 'down'
 * ```
 */
export function ParseMigrationFilename(filename: string): ParsedMigrationFile {
  if (!filename.startsWith(MIGRATION_PREFIX)) {
    throw new MigrationParseError(filename, `does not start with "${MIGRATION_PREFIX}"`);
  }

  const direction = matchDirection(filename);
  if (direction === null) {
    throw new MigrationParseError(
      filename,
      `does not end with "${MIGRATION_SUFFIXES.up}" or "${MIGRATION_SUFFIXES.down}"`
    );
  }

  const fullName = filename.slice(
    MIGRATION_PREFIX.length,
    filename.length - MIGRATION_SUFFIXES[direction].length
  );

  // Offsets below are in code points, not UTF-16 units.
  const characters = Array.from(fullName);
  if (characters.length < VERSION_LENGTH + 1) {
    throw new MigrationParseError(filename, 'is too short');
  }

  const versionText = characters.slice(0, VERSION_LENGTH).join('');
  if (!VERSION_PATTERN.test(versionText)) {
    throw new MigrationParseError(filename, 'does not contain a valid version');
  }

  const separator = characters[VERSION_LENGTH];
  if (separator !== '_') {
    throw new MigrationParseError(
      filename,
      `is missing an underscore after version ("${separator}" given)`
    );
  }

  const name = characters.slice(VERSION_LENGTH + 1).join('');
  if (name.length === 0) {
    throw new MigrationParseError(filename, 'is missing name section');
  }

  return {
    Version: BigInt(versionText),
    Name: name,
    Direction: direction,
    Filename: filename,
  };
}

/**
 * Builds the filename holding one direction of a migration. The inverse
 * of {@link ParseMigrationFilename}.
 *
 * @example
 * ```typescript
 * FormatMigrationFilename({ Version: 20211224091800n, Name: 'add_users_table' }, 'up');
 * // 'V20211224091800_add_users_table.up.sql'
 * ```
 */
export function FormatMigrationFilename(migration: Migration, direction: Direction): string {
  return (
    MIGRATION_PREFIX +
    FormatVersion(migration.Version) +
    '_' +
    migration.Name +
    MIGRATION_SUFFIXES[direction]
  );
}

/**
 * Renders a version as its zero-padded 14-digit form.
 */
export function FormatVersion(version: Version): string {
  return version.toString().padStart(VERSION_LENGTH, '0');
}

function matchDirection(filename: string): Direction | null {
  if (filename.endsWith(MIGRATION_SUFFIXES.up)) {
    return 'up';
  }
  if (filename.endsWith(MIGRATION_SUFFIXES.down)) {
    return 'down';
  }
  return null;
}
