/**
 * @module config-loader
 * Loads migstate configuration from files and environment variables.
 *
 * Configuration is loaded in order of precedence (highest first):
 * 1. CLI flags (passed directly)
 * 2. Environment variables
 * 3. .env file in the working directory (via dotenv)
 * 4. Config file (migstate.json or migstate.config.json)
 * 5. Built-in defaults
 */

import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import type { MigstateConfig } from '@migstate/core';

/**
 * Configuration file names searched in order.
 */
const CONFIG_FILE_NAMES = ['migstate.json', 'migstate.config.json'];

/**
 * CLI options that can override config file settings.
 */
export interface CLIOptions {
  /** Database server hostname */
  Server?: string;

  /** Database server port */
  Port?: number;

  /** Database name */
  Database?: string;

  /** Database user */
  User?: string;

  /** Database password */
  Password?: string;

  /** Migrations directory */
  Location?: string;

  /** Schema of the log table */
  Schema?: string;

  /** Log table name */
  Table?: string;

  /** Trust server certificate */
  TrustServerCertificate?: boolean;

  /** Path to config file */
  Config?: string;
}

/**
 * The subset of configuration a config file may provide. Every field is
 * optional; missing values fall through to lower-precedence sources.
 */
export interface FileConfig {
  Database?: {
    Server?: string;
    Port?: number;
    Database?: string;
    User?: string;
    Password?: string;
    Options?: {
      Encrypt?: boolean;
      TrustServerCertificate?: boolean;
      RequestTimeout?: number;
      ConnectionTimeout?: number;
    };
  };
  Migrations?: {
    Location?: string;
    DefaultSchema?: string;
    LogTable?: string;
  };
}

/**
 * Loads and merges configuration from all sources.
 *
 * @param cliOptions - Options passed via CLI flags
 * @param cwd - Working directory for config file discovery
 * @param env - Environment variables to read. Defaults to `process.env`
 * @returns Merged MigstateConfig
 * @throws Error if required configuration is missing
 */
export function LoadConfig(
  cliOptions: CLIOptions,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): MigstateConfig {
  env = { ...loadDotEnv(cwd), ...env };
  const fileConfig = loadConfigFile(cliOptions.Config, cwd);

  // Merge: CLI > env > .env > file > defaults
  const server = cliOptions.Server
    ?? env.MIGSTATE_SERVER ?? env.DB_HOST
    ?? fileConfig?.Database?.Server
    ?? 'localhost';

  const port = cliOptions.Port
    ?? ParsePort(env.MIGSTATE_PORT)
    ?? ParsePort(env.DB_PORT)
    ?? fileConfig?.Database?.Port
    ?? 1433;

  const database = cliOptions.Database
    ?? env.MIGSTATE_DATABASE ?? env.DB_DATABASE
    ?? fileConfig?.Database?.Database;

  const user = cliOptions.User
    ?? env.MIGSTATE_USER ?? env.DB_USER
    ?? fileConfig?.Database?.User;

  const password = cliOptions.Password
    ?? env.MIGSTATE_PASSWORD ?? env.DB_PASSWORD
    ?? fileConfig?.Database?.Password;

  if (!database) {
    throw new Error('Database name is required. Set via --database, MIGSTATE_DATABASE env var, or config file.');
  }
  if (!user) {
    throw new Error('Database user is required. Set via --user, MIGSTATE_USER env var, or config file.');
  }
  if (!password) {
    throw new Error('Database password is required. Set via --password, MIGSTATE_PASSWORD env var, or config file.');
  }

  const location = cliOptions.Location
    ?? env.MIGSTATE_LOCATION
    ?? fileConfig?.Migrations?.Location
    ?? './migrations';

  return {
    Database: {
      Server: server,
      Port: port,
      Database: database,
      User: user,
      Password: password,
      Options: {
        TrustServerCertificate: cliOptions.TrustServerCertificate
          ?? fileConfig?.Database?.Options?.TrustServerCertificate
          ?? true,
        Encrypt: fileConfig?.Database?.Options?.Encrypt ?? false,
        RequestTimeout: fileConfig?.Database?.Options?.RequestTimeout,
        ConnectionTimeout: fileConfig?.Database?.Options?.ConnectionTimeout,
      },
    },
    Migrations: {
      Location: path.resolve(cwd, location),
      DefaultSchema: cliOptions.Schema
        ?? env.MIGSTATE_SCHEMA
        ?? fileConfig?.Migrations?.DefaultSchema
        ?? 'dbo',
      LogTable: cliOptions.Table
        ?? env.MIGSTATE_TABLE
        ?? fileConfig?.Migrations?.LogTable
        ?? 'migration_log',
    },
  };
}

/**
 * Reads `.env` from the working directory, if present. Its values never
 * override variables already set in the environment.
 */
function loadDotEnv(cwd: string): dotenv.DotenvParseOutput {
  const envPath = path.join(cwd, '.env');
  if (!fs.existsSync(envPath)) {
    return {};
  }
  return dotenv.parse(fs.readFileSync(envPath));
}

/**
 * Searches for and loads a config file.
 */
function loadConfigFile(explicitPath: string | undefined, cwd: string): FileConfig | null {
  if (explicitPath) {
    const fullPath = path.resolve(cwd, explicitPath);
    if (fs.existsSync(fullPath)) {
      return loadFile(fullPath);
    }
    throw new Error(`Config file not found: ${fullPath}`);
  }

  for (const name of CONFIG_FILE_NAMES) {
    const fullPath = path.join(cwd, name);
    if (fs.existsSync(fullPath)) {
      return loadFile(fullPath);
    }
  }

  return null;
}

/**
 * Loads a single JSON config file.
 */
function loadFile(filePath: string): FileConfig {
  const content = fs.readFileSync(filePath, 'utf-8');
  return ParseConfigFile(JSON.parse(content), filePath);
}

/**
 * Reads a parsed config file into a {@link FileConfig}. Keys may be
 * written in camelCase or PascalCase; unknown keys are ignored.
 *
 * @param raw - Parsed JSON
 * @param source - File name used in error messages
 * @throws Error if a known key holds a value of the wrong type
 */
export function ParseConfigFile(raw: unknown, source: string = 'config file'): FileConfig {
  const root = asObject(raw, source);
  const database = readObject(root, 'Database', source);
  const options = database && readObject(database, 'Options', source);
  const migrations = readObject(root, 'Migrations', source);

  return {
    Database: database && {
      Server: readString(database, 'Server', source),
      Port: readNumber(database, 'Port', source),
      Database: readString(database, 'Database', source),
      User: readString(database, 'User', source),
      Password: readString(database, 'Password', source),
      Options: options && {
        Encrypt: readBoolean(options, 'Encrypt', source),
        TrustServerCertificate: readBoolean(options, 'TrustServerCertificate', source),
        RequestTimeout: readNumber(options, 'RequestTimeout', source),
        ConnectionTimeout: readNumber(options, 'ConnectionTimeout', source),
      },
    },
    Migrations: migrations && {
      Location: readString(migrations, 'Location', source),
      DefaultSchema: readString(migrations, 'DefaultSchema', source),
      LogTable: readString(migrations, 'LogTable', source),
    },
  };
}

/**
 * Parses a port number. Returns `undefined` for an empty value or
 * anything other than a decimal integer in the TCP port range.
 */
export function ParsePort(value: string | undefined): number | undefined {
  if (!value || !/^[0-9]+$/.test(value.trim())) {
    return undefined;
  }
  const port = parseInt(value, 10);
  return port > 0 && port <= 65535 ? port : undefined;
}

// ─── Helpers ────────────────────────────────────────────────────────

type JSONObject = Record<string, unknown>;

/**
 * Looks a key up by its PascalCase name, falling back to camelCase.
 */
function lookup(obj: JSONObject, key: string): unknown {
  if (key in obj) {
    return obj[key];
  }
  return obj[key.charAt(0).toLowerCase() + key.slice(1)];
}

function asObject(value: unknown, source: string): JSONObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`Invalid ${source}: expected a JSON object`);
  }
  return Object.fromEntries(Object.entries(value));
}

function readObject(obj: JSONObject, key: string, source: string): JSONObject | undefined {
  const value = lookup(obj, key);
  return value === undefined ? undefined : asObject(value, `${source} (${key})`);
}

function readString(obj: JSONObject, key: string, source: string): string | undefined {
  const value = lookup(obj, key);
  if (value === undefined || typeof value === 'string') {
    return value;
  }
  throw new Error(`Invalid ${source}: "${key}" must be a string`);
}

function readNumber(obj: JSONObject, key: string, source: string): number | undefined {
  const value = lookup(obj, key);
  if (value === undefined || typeof value === 'number') {
    return value;
  }
  throw new Error(`Invalid ${source}: "${key}" must be a number`);
}

function readBoolean(obj: JSONObject, key: string, source: string): boolean | undefined {
  const value = lookup(obj, key);
  if (value === undefined || typeof value === 'boolean') {
    return value;
  }
  throw new Error(`Invalid ${source}: "${key}" must be a boolean`);
}
