/**
 * @module db/connection
 * SQL Server connection pool management for reading the migration log.
 */

import * as sql from 'mssql';
import { DatabaseConfig } from './types';
import { ConnectionError, ToError } from '../core/errors';

/**
 * Manages a single-connection SQL Server pool. Status checks issue a
 * handful of sequential queries, so one connection is enough.
 */
export class ConnectionManager {
  private pool: sql.ConnectionPool | null = null;
  private readonly config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  /**
   * Opens the connection pool. Must be called before executing any SQL.
   * Safe to call multiple times; subsequent calls are no-ops if already connected.
   *
   * @throws ConnectionError if the server cannot be reached or rejects the login
   */
  async Connect(): Promise<void> {
    if (this.pool?.connected) {
      return;
    }

    const pool = new sql.ConnectionPool(BuildPoolConfig(this.config));
    try {
      await pool.connect();
    } catch (err) {
      const cause = ToError(err);
      throw new ConnectionError(
        `Cannot connect to ${this.config.Server}:${this.config.Port ?? 1433}/${this.config.Database}: ${cause.message}`,
        cause
      );
    }
    this.pool = pool;
  }

  /**
   * Returns the active connection pool.
   * @throws ConnectionError if the pool has not been connected yet.
   */
  GetPool(): sql.ConnectionPool {
    if (!this.pool?.connected) {
      throw new ConnectionError(
        'Connection pool is not connected. Call Connect() before accessing the pool.'
      );
    }
    return this.pool;
  }

  /**
   * Closes the connection pool and releases all resources.
   * Safe to call multiple times.
   */
  async Disconnect(): Promise<void> {
    if (this.pool) {
      await this.pool.close();
      this.pool = null;
    }
  }

  /**
   * Returns true if the connection pool is currently connected.
   */
  get IsConnected(): boolean {
    return this.pool?.connected ?? false;
  }
}

/**
 * Translates a {@link DatabaseConfig} into `mssql` pool options, applying
 * defaults for anything left unset.
 */
export function BuildPoolConfig(config: DatabaseConfig): sql.config {
  return {
    server: config.Server,
    port: config.Port ?? 1433,
    user: config.User,
    password: config.Password,
    database: config.Database,
    options: {
      encrypt: config.Options?.Encrypt ?? false,
      trustServerCertificate: config.Options?.TrustServerCertificate ?? true,
    },
    pool: {
      max: 1,
      min: 0,
    },
    requestTimeout: config.Options?.RequestTimeout ?? 30_000,
    connectionTimeout: config.Options?.ConnectionTimeout ?? 15_000,
  };
}
