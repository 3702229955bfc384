/**
 * @module source/file-system
 * Node.js implementation of {@link MigrationFileSystem}.
 */

import * as fs from 'fs';
import fg from 'fast-glob';
import { DirectoryEntry } from '../migration/catalog';
import { MigrationFileSystem, PathKind } from './types';

/**
 * Reads migration directories from the local filesystem.
 *
 * Directory listings are not recursive and do not follow symbolic links,
 * so a symlink is reported as neither a directory nor a regular file.
 */
export class NodeFileSystem implements MigrationFileSystem {
  async Stat(path: string): Promise<PathKind> {
    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(path);
    } catch (err) {
      if (isNotFound(err)) {
        return 'missing';
      }
      throw err;
    }

    if (stats.isDirectory()) {
      return 'directory';
    }
    if (stats.isFile()) {
      return 'file';
    }
    return 'special';
  }

  async ReadDirectory(path: string): Promise<DirectoryEntry[]> {
    const entries = await fg('*', {
      cwd: path,
      deep: 1,
      dot: true,
      onlyFiles: false,
      followSymbolicLinks: false,
      objectMode: true,
    });

    return entries.map((entry) => ({
      Name: entry.name,
      IsDirectory: entry.dirent.isDirectory(),
      IsRegularFile: entry.dirent.isFile(),
    }));
  }

  async ReadFile(path: string): Promise<string> {
    return fs.promises.readFile(path, 'utf-8');
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}
