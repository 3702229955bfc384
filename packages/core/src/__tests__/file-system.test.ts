import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { NodeFileSystem } from '../source/file-system';
import { FileMigrationSource } from '../source/file-source';

let root: string;
const fileSystem = new NodeFileSystem();

beforeAll(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), 'migstate-'));

  fs.writeFileSync(path.join(root, 'V20211224081255_initial.up.sql'), 'CREATE TABLE a (id INT);');
  fs.writeFileSync(path.join(root, 'V20211224091800_add_users_table.up.sql'), 'CREATE TABLE users (id INT);');
  fs.writeFileSync(path.join(root, 'V20211224091800_add_users_table.down.sql'), 'DROP TABLE users;');
  fs.writeFileSync(path.join(root, '.hidden'), '');
  fs.mkdirSync(path.join(root, 'V20220101000000_folder.up.sql'));
  fs.mkdirSync(path.join(root, 'nested'));
  fs.writeFileSync(path.join(root, 'nested', 'V20220201000000_deep.up.sql'), '');
  fs.symlinkSync(
    path.join(root, 'V20211224081255_initial.up.sql'),
    path.join(root, 'V20220301000000_linked.up.sql')
  );
});

afterAll(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

describe('NodeFileSystem.Stat', () => {
  it('reports directories', async () => {
    expect(await fileSystem.Stat(root)).toBe('directory');
  });

  it('reports regular files', async () => {
    expect(await fileSystem.Stat(path.join(root, '.hidden'))).toBe('file');
  });

  it('reports missing paths', async () => {
    expect(await fileSystem.Stat(path.join(root, 'does-not-exist'))).toBe('missing');
  });

  it('reports a path beneath a regular file as missing', async () => {
    expect(await fileSystem.Stat(path.join(root, '.hidden', 'child'))).toBe('missing');
  });
});

describe('NodeFileSystem.ReadDirectory', () => {
  it('lists direct children only, including dotfiles', async () => {
    const entries = await fileSystem.ReadDirectory(root);
    const names = entries.map((e) => e.Name).sort();

    expect(names).toEqual([
      '.hidden',
      'V20211224081255_initial.up.sql',
      'V20211224091800_add_users_table.down.sql',
      'V20211224091800_add_users_table.up.sql',
      'V20220101000000_folder.up.sql',
      'V20220301000000_linked.up.sql',
      'nested',
    ]);
  });

  it('reports the kind of each entry without following symlinks', async () => {
    const entries = await fileSystem.ReadDirectory(root);
    const byName = new Map(entries.map((e) => [e.Name, e]));

    expect(byName.get('V20211224081255_initial.up.sql')).toEqual({
      Name: 'V20211224081255_initial.up.sql',
      IsDirectory: false,
      IsRegularFile: true,
    });
    expect(byName.get('nested')?.IsDirectory).toBe(true);
    expect(byName.get('V20220301000000_linked.up.sql')).toEqual({
      Name: 'V20220301000000_linked.up.sql',
      IsDirectory: false,
      IsRegularFile: false,
    });
  });
});

describe('NodeFileSystem.ReadFile', () => {
  it('reads UTF-8 content', async () => {
    const content = await fileSystem.ReadFile(path.join(root, 'V20211224091800_add_users_table.down.sql'));
    expect(content).toBe('DROP TABLE users;');
  });
});

describe('FileMigrationSource on disk', () => {
  it('catalogs regular migration files and ignores everything else', async () => {
    const source = await FileMigrationSource.Open(root);
    const catalog = await source.GetAvailableMigrations();

    expect(catalog).toEqual([
      { Version: 20211224081255n, Name: 'initial', CanUndo: false },
      { Version: 20211224091800n, Name: 'add_users_table', CanUndo: true },
    ]);
  });

  it('rejects a file given as the migrations directory', async () => {
    await expect(FileMigrationSource.Open(path.join(root, '.hidden'))).rejects.toThrow(
      `Migrations directory is not a directory: ${path.join(root, '.hidden')}`
    );
  });
});
