/**
 * @module log/log-table
 * Manages the migration log table — creating it if it doesn't exist and
 * reading the recorded events in insertion order.
 *
 * Table layout:
 *
 * | column           | type            | notes                         |
 * |------------------|-----------------|-------------------------------|
 * | `id`             | `INT IDENTITY`  | primary key, insertion order  |
 * | `version`        | `BIGINT`        | migration version             |
 * | `migration_name` | `NVARCHAR(100)` | nullable                      |
 * | `direction`      | `CHAR(1)`       | `u` or `d`                    |
 * | `start_time`     | `DATETIME`      | defaults to `GETDATE()`       |
 * | `end_time`       | `DATETIME`      | nullable                      |
 */

import * as sql from 'mssql';
import { LogEntry, Direction } from '../migration/types';
import { MigrationLogError } from '../core/errors';
import { LogDirectionCode, MigrationLog } from './types';

const DIRECTION_CODES: Readonly<Record<LogDirectionCode, Direction>> = {
  u: 'up',
  d: 'down',
};

/**
 * Reads the migration log from a SQL Server table.
 */
export class MigrationLogTable implements MigrationLog {
  private readonly schema: string;
  private readonly tableName: string;
  private readonly pool: sql.ConnectionPool;

  /**
   * @param pool - Connected SQL Server connection pool
   * @param schema - Schema name (e.g., "dbo")
   * @param tableName - Log table name (default: "migration_log")
   */
  constructor(pool: sql.ConnectionPool, schema: string, tableName: string = 'migration_log') {
    this.pool = pool;
    this.schema = schema;
    this.tableName = tableName;
  }

  /**
   * The fully qualified, bracket-quoted table name: `[schema].[tableName]`.
   */
  get QualifiedName(): string {
    return `${QuoteIdentifier(this.schema)}.${QuoteIdentifier(this.tableName)}`;
  }

  /**
   * Creates the schema (if needed) and log table (if it doesn't exist).
   */
  async EnsureExists(): Promise<void> {
    const schemaRequest = new sql.Request(this.pool);
    schemaRequest.input('schema', sql.NVarChar(128), this.schema);
    schemaRequest.input('createSchema', sql.NVarChar(300), `CREATE SCHEMA ${QuoteIdentifier(this.schema)}`);
    await schemaRequest.query(`
      IF NOT EXISTS (SELECT 1 FROM sys.schemas WHERE name = @schema)
      BEGIN
        EXEC(@createSchema)
      END
    `);

    const tableRequest = new sql.Request(this.pool);
    tableRequest.input('schema', sql.NVarChar(128), this.schema);
    tableRequest.input('table', sql.NVarChar(128), this.tableName);
    await tableRequest.query(`
      IF NOT EXISTS (
        SELECT 1 FROM INFORMATION_SCHEMA.TABLES
        WHERE TABLE_SCHEMA = @schema AND TABLE_NAME = @table
      )
      BEGIN
        CREATE TABLE ${this.QualifiedName} (
          [id]             INT            IDENTITY(1,1) NOT NULL,
          [version]        BIGINT         NOT NULL,
          [migration_name] NVARCHAR(100)  NULL,
          [direction]      CHAR(1)        NOT NULL,
          [start_time]     DATETIME       NOT NULL DEFAULT GETDATE(),
          [end_time]       DATETIME       NULL,
          PRIMARY KEY ([id])
        );
      END
    `);
  }

  /**
   * Returns every logged event ordered by `id`, creating the table first
   * if it does not exist yet.
   *
   * @throws MigrationLogError if a row has an unknown direction or an invalid version
   */
  async ListMigrationsLog(): Promise<LogEntry[]> {
    await this.EnsureExists();

    const request = new sql.Request(this.pool);
    const result = await request.query<Record<string, unknown>>(
      `SELECT [version], [migration_name], [direction], [start_time] FROM ${this.QualifiedName} ORDER BY [id]`
    );

    return result.recordset.map(MapRowToLogEntry);
  }
}

/**
 * Maps a raw database row to a typed {@link LogEntry}.
 *
 * `mssql` returns `BIGINT` columns as strings, so the version is accepted
 * as a string, number or bigint.
 *
 * @throws MigrationLogError on an unknown direction or an invalid version
 */
export function MapRowToLogEntry(row: Record<string, unknown>): LogEntry {
  return {
    Version: parseVersion(row.version),
    Name: typeof row.migration_name === 'string' ? row.migration_name : '',
    Direction: parseDirection(row.direction),
    AppliedAt: row.start_time instanceof Date && !isNaN(row.start_time.getTime()) ? row.start_time : null,
  };
}

/**
 * Quotes a SQL Server identifier with brackets, doubling any `]`.
 */
export function QuoteIdentifier(identifier: string): string {
  return `[${identifier.replace(/]/g, ']]')}]`;
}

function parseVersion(value: unknown): bigint {
  if (typeof value === 'bigint' && value >= 0n) {
    return value;
  }
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
    return BigInt(value);
  }
  if (typeof value === 'string' && /^[0-9]+$/.test(value)) {
    return BigInt(value);
  }
  throw new MigrationLogError(`version "${String(value)}" is invalid`);
}

function parseDirection(value: unknown): Direction {
  const code = typeof value === 'string' ? value.trim().toLowerCase() : '';
  if (code === 'u' || code === 'd') {
    return DIRECTION_CODES[code];
  }
  throw new MigrationLogError(`direction "${String(value)}" is unknown`);
}
