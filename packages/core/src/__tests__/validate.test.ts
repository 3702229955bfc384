import { describe, it, expect, vi } from 'vitest';
import { ValidateMigrations } from '../migration/validate';
import { LogEntry, MigrationDescription } from '../migration/types';
import { MigrationSource } from '../source/types';
import { MigrationLog } from '../log/types';
import { DuplicateMigrationError, StatusCheckError } from '../core/errors';

// ─── Test Helpers ────────────────────────────────────────────────────

function makeSource(catalog: MigrationDescription[] | Error): MigrationSource {
  return {
    GetAvailableMigrations: vi.fn(async () => {
      if (catalog instanceof Error) {
        throw catalog;
      }
      return catalog;
    }),
    ReadMigration: vi.fn(async () => ''),
  };
}

function makeLog(entries: LogEntry[] | Error): MigrationLog {
  return {
    ListMigrationsLog: vi.fn(async () => {
      if (entries instanceof Error) {
        throw entries;
      }
      return entries;
    }),
  };
}

// ─── Tests ───────────────────────────────────────────────────────────

describe('ValidateMigrations', () => {
  it('reconciles the catalog against the log', async () => {
    const source = makeSource([
      { Version: 1n, Name: 'first', CanUndo: true },
      { Version: 2n, Name: 'second', CanUndo: false },
    ]);
    const log = makeLog([
      { Version: 1n, Name: 'first', Direction: 'up', AppliedAt: new Date(100) },
      { Version: 3n, Name: 'third', Direction: 'up', AppliedAt: new Date(200) },
    ]);

    const result = await ValidateMigrations(source, log);

    expect(result.Migrations.map((m) => [m.Version, m.Status])).toEqual([
      [1n, 'APPLIED'],
      [2n, 'PENDING'],
      [3n, 'MISSING'],
    ]);
    expect(result.AppliedCount).toBe(1);
    expect(result.PendingCount).toBe(1);
    expect(result.MissingCount).toBe(1);
  });

  it('passes the warning callback to the source', async () => {
    const source = makeSource([]);
    const onWarning = vi.fn();

    await ValidateMigrations(source, makeLog([]), onWarning);

    expect(source.GetAvailableMigrations).toHaveBeenCalledWith(onWarning);
  });

  it('wraps a source failure and keeps it as the cause', async () => {
    const failure = new DuplicateMigrationError(1n, 'first', 'other');
    const log = makeLog([]);

    const error = await ValidateMigrations(makeSource(failure), log).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(StatusCheckError);
    if (error instanceof StatusCheckError) {
      expect(error.Code).toBe('SOURCE_FAILED');
      expect(error.cause).toBe(failure);
      expect(error.message).toBe(`Failed to get the list of available migrations: ${failure.message}`);
    }
    expect(log.ListMigrationsLog).not.toHaveBeenCalled();
  });

  it('wraps a log failure and keeps it as the cause', async () => {
    const failure = new Error('Invalid object name');

    const error = await ValidateMigrations(makeSource([]), makeLog(failure)).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(StatusCheckError);
    if (error instanceof StatusCheckError) {
      expect(error.Code).toBe('LOG_FAILED');
      expect(error.cause).toBe(failure);
      expect(error.message).toBe('Failed to get the list of applied migrations: Invalid object name');
    }
  });

  it('wraps non-Error rejections', async () => {
    const log: MigrationLog = {
      ListMigrationsLog: () => Promise.reject('timeout'),
    };

    await expect(ValidateMigrations(makeSource([]), log)).rejects.toThrow(
      'Failed to get the list of applied migrations: timeout'
    );
  });
});
