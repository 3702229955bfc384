/**
 * @module db/types
 * Database connection configuration types for the migration log store.
 */

/**
 * Configuration for connecting to the SQL Server instance holding the
 * migration log. Maps directly to the `mssql` package connection options.
 */
export interface DatabaseConfig {
  /** SQL Server hostname or IP address */
  Server: string;

  /** SQL Server port. Defaults to 1433 */
  Port?: number;

  /** Database name to connect to */
  Database: string;

  /** SQL Server login username */
  User: string;

  /** SQL Server login password */
  Password: string;

  /** Additional connection options */
  Options?: DatabaseConnectionOptions;
}

/**
 * Extended connection options for fine-tuning SQL Server connectivity.
 */
export interface DatabaseConnectionOptions {
  /** Whether to encrypt the connection. Defaults to false */
  Encrypt?: boolean;

  /** Whether to trust self-signed certificates. Defaults to true */
  TrustServerCertificate?: boolean;

  /** Request timeout in milliseconds. Defaults to 30000 (30 seconds) */
  RequestTimeout?: number;

  /** Connection timeout in milliseconds. Defaults to 15000 (15 seconds) */
  ConnectionTimeout?: number;
}
