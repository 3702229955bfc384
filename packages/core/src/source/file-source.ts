/**
 * @module source/file-source
 * A {@link MigrationSource} backed by a single migrations directory.
 */

import * as path from 'path';
import { Direction, Migration, MigrationDescription } from '../migration/types';
import { BuildCatalog, ScanWarningCallback } from '../migration/catalog';
import { FormatMigrationFilename } from '../migration/parser';
import { MigrationsDirectoryError } from '../core/errors';
import { MigrationFileSystem, MigrationSource } from './types';
import { NodeFileSystem } from './file-system';

/**
 * Discovers migrations in one directory (non-recursive).
 *
 * @example
 * ```typescript
 * const source = await FileMigrationSource.Open('./migrations');
 * const catalog = await source.GetAvailableMigrations((w) => console.warn(w));
 * const sql = await source.ReadMigration(catalog[0], 'up');
 * ```
 */
export class FileMigrationSource implements MigrationSource {
  private readonly directory: string;
  private readonly fileSystem: MigrationFileSystem;

  private constructor(directory: string, fileSystem: MigrationFileSystem) {
    this.directory = directory;
    this.fileSystem = fileSystem;
  }

  /**
   * Opens a migrations directory after checking that it exists and is a
   * directory.
   *
   * @param directory - Path of the migrations directory
   * @param fileSystem - Filesystem to read from. Defaults to the local disk
   * @throws MigrationsDirectoryError if the path is missing or not a directory
   */
  static async Open(
    directory: string,
    fileSystem: MigrationFileSystem = new NodeFileSystem()
  ): Promise<FileMigrationSource> {
    const kind = await fileSystem.Stat(directory);

    switch (kind) {
      case 'directory':
        return new FileMigrationSource(directory, fileSystem);
      case 'missing':
        throw new MigrationsDirectoryError(
          directory,
          `Migrations directory does not exist: ${directory}`
        );
      case 'file':
      case 'special':
        throw new MigrationsDirectoryError(
          directory,
          `Migrations directory is not a directory: ${directory}`
        );
    }
  }

  /** The directory this source reads from */
  get Directory(): string {
    return this.directory;
  }

  async GetAvailableMigrations(onWarning?: ScanWarningCallback): Promise<MigrationDescription[]> {
    const entries = await this.fileSystem.ReadDirectory(this.directory);
    return BuildCatalog(entries, onWarning);
  }

  async ReadMigration(migration: Migration, direction: Direction): Promise<string> {
    const filename = FormatMigrationFilename(migration, direction);
    return this.fileSystem.ReadFile(path.join(this.directory, filename));
  }
}
