import { describe, it, expect } from 'vitest';
import { FoldMigrationLog, ReconcileMigrations } from '../migration/reconciler';
import { LogEntry, MigrationDescription } from '../migration/types';

// ─── Test Helpers ────────────────────────────────────────────────────

function makeDescription(version: bigint, name: string, canUndo = false): MigrationDescription {
  return { Version: version, Name: name, CanUndo: canUndo };
}

function up(version: bigint, name: string, at: number): LogEntry {
  return { Version: version, Name: name, Direction: 'up', AppliedAt: new Date(at) };
}

function down(version: bigint, name: string, at: number): LogEntry {
  return { Version: version, Name: name, Direction: 'down', AppliedAt: new Date(at) };
}

// ─── Log Replay ──────────────────────────────────────────────────────

describe('FoldMigrationLog', () => {
  it('leaves a migration applied at its last up event', () => {
    const folded = FoldMigrationLog([up(1n, 'first', 100), down(1n, 'first', 200), up(1n, 'first', 300)]);

    expect(folded.get(1n)).toEqual({
      Version: 1n,
      Name: 'first',
      CanUndo: false,
      Status: 'APPLIED',
      AppliedAt: new Date(300),
    });
  });

  it('leaves a reverted migration pending with no application time', () => {
    const folded = FoldMigrationLog([up(1n, 'first', 100), down(1n, 'first', 200)]);

    expect(folded.get(1n)?.Status).toBe('PENDING');
    expect(folded.get(1n)?.AppliedAt).toBeNull();
  });

  it('replays in the given order rather than by timestamp', () => {
    const folded = FoldMigrationLog([up(1n, 'first', 300), down(1n, 'first', 100)]);

    expect(folded.get(1n)?.Status).toBe('PENDING');
  });

  it('keeps one state per version', () => {
    const folded = FoldMigrationLog([up(1n, 'first', 100), up(2n, 'second', 200), up(1n, 'first', 300)]);

    expect([...folded.keys()]).toEqual([1n, 2n]);
  });

  it('returns an empty map for an empty log', () => {
    expect(FoldMigrationLog([]).size).toBe(0);
  });
});

// ─── Reconciliation ──────────────────────────────────────────────────

describe('ReconcileMigrations', () => {
  it('classifies applied, pending and missing migrations', () => {
    const catalog = [makeDescription(1n, 'first', true), makeDescription(2n, 'second')];
    const log = [up(1n, 'first', 100), up(3n, 'third', 200)];

    const result = ReconcileMigrations(catalog, log);

    expect(result).toEqual({
      Migrations: [
        { Version: 1n, Name: 'first', CanUndo: true, Status: 'APPLIED', AppliedAt: new Date(100) },
        { Version: 2n, Name: 'second', CanUndo: false, Status: 'PENDING', AppliedAt: null },
        { Version: 3n, Name: 'third', CanUndo: false, Status: 'MISSING', AppliedAt: new Date(200) },
      ],
      AppliedCount: 1,
      PendingCount: 1,
      MissingCount: 1,
    });
  });

  it('reports every catalog migration as pending when the log is empty', () => {
    const result = ReconcileMigrations([makeDescription(1n, 'first'), makeDescription(2n, 'second')], []);

    expect(result.Migrations.map((m) => m.Status)).toEqual(['PENDING', 'PENDING']);
    expect(result.PendingCount).toBe(2);
    expect(result.AppliedCount).toBe(0);
    expect(result.MissingCount).toBe(0);
  });

  it('returns an empty result for empty inputs', () => {
    expect(ReconcileMigrations([], [])).toEqual({
      Migrations: [],
      AppliedCount: 0,
      PendingCount: 0,
      MissingCount: 0,
    });
  });

  it('uses the application time of the last up event', () => {
    const result = ReconcileMigrations(
      [makeDescription(1n, 'first', true)],
      [up(1n, 'first', 100), down(1n, 'first', 200), up(1n, 'first', 300)]
    );

    expect(result.Migrations[0].Status).toBe('APPLIED');
    expect(result.Migrations[0].AppliedAt).toEqual(new Date(300));
  });

  it('treats a reverted catalog migration as pending', () => {
    const result = ReconcileMigrations(
      [makeDescription(1n, 'first', true)],
      [up(1n, 'first', 100), down(1n, 'first', 200)]
    );

    expect(result.Migrations[0]).toEqual({
      Version: 1n,
      Name: 'first',
      CanUndo: true,
      Status: 'PENDING',
      AppliedAt: null,
    });
    expect(result.PendingCount).toBe(1);
  });

  it('keeps the catalog name and undo flag for logged migrations', () => {
    const result = ReconcileMigrations(
      [makeDescription(1n, 'create_users', true)],
      [up(1n, 'old_name', 100)]
    );

    expect(result.Migrations[0].Name).toBe('create_users');
    expect(result.Migrations[0].CanUndo).toBe(true);
  });

  it('reports an orphan as missing even when its last event was down', () => {
    const result = ReconcileMigrations([], [up(5n, 'gone', 100), down(5n, 'gone', 200)]);

    expect(result.Migrations).toEqual([
      { Version: 5n, Name: 'gone', CanUndo: false, Status: 'MISSING', AppliedAt: null },
    ]);
    expect(result.MissingCount).toBe(1);
    expect(result.PendingCount).toBe(0);
  });

  it('names an orphan after its last log entry', () => {
    const result = ReconcileMigrations([], [up(5n, 'before', 100), up(5n, 'after', 200)]);

    expect(result.Migrations[0].Name).toBe('after');
  });

  it('sorts orphans among catalog migrations by version', () => {
    const result = ReconcileMigrations(
      [makeDescription(2n, 'second')],
      [up(3n, 'third', 100), up(1n, 'first', 200)]
    );

    expect(result.Migrations.map((m) => m.Version)).toEqual([1n, 2n, 3n]);
    expect(result.Migrations.map((m) => m.Status)).toEqual(['MISSING', 'PENDING', 'MISSING']);
  });

  it('lists each version exactly once', () => {
    const result = ReconcileMigrations(
      [makeDescription(1n, 'first')],
      [up(1n, 'first', 100), up(1n, 'first', 200), up(2n, 'second', 300), up(2n, 'second', 400)]
    );

    expect(result.Migrations).toHaveLength(2);
    expect(result.AppliedCount + result.PendingCount + result.MissingCount).toBe(2);
  });
});
