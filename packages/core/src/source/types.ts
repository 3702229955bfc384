/**
 * @module source/types
 * Collaborator interfaces for discovering migration definitions.
 */

import { Direction, Migration, MigrationDescription } from '../migration/types';
import { DirectoryEntry, ScanWarningCallback } from '../migration/catalog';

/**
 * What a path refers to on disk.
 *
 * - `'directory'` — A directory
 * - `'file'` — A regular file
 * - `'special'` — A device, socket or FIFO
 * - `'missing'` — Nothing exists at the path
 */
export type PathKind = 'directory' | 'file' | 'special' | 'missing';

/**
 * The filesystem operations a migration source needs. Implemented by
 * {@link NodeFileSystem}; tests substitute an in-memory version.
 */
export interface MigrationFileSystem {
  /** Reports what the path refers to, following symlinks */
  Stat(path: string): Promise<PathKind>;

  /** Lists the direct children of a directory */
  ReadDirectory(path: string): Promise<DirectoryEntry[]>;

  /** Reads a file as UTF-8 text */
  ReadFile(path: string): Promise<string>;
}

/**
 * Provides the catalog of available migrations and their scripts.
 */
export interface MigrationSource {
  /**
   * Lists every available migration, ascending by version.
   *
   * @param onWarning - Optional callback for skipped filenames
   */
  GetAvailableMigrations(onWarning?: ScanWarningCallback): Promise<MigrationDescription[]>;

  /**
   * Reads the script for one direction of a migration.
   */
  ReadMigration(migration: Migration, direction: Direction): Promise<string>;
}
