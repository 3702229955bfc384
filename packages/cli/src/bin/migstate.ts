#!/usr/bin/env node
/**
 * @module bin/migstate
 * CLI entry point for migstate.
 *
 * Usage:
 *   migstate status [options]
 *   migstate validate [options]
 */

import { Command, InvalidArgumentError, OptionValues } from 'commander';
import { LoadConfig, ParsePort, CLIOptions } from '../config-loader';
import { PrintBanner, LogError } from '../formatting';
import { RunStatus } from '../commands/status';
import { RunValidate } from '../commands/validate';

const program = new Command();

program
  .name('migstate')
  .description('migstate — migration status for SQL Server')
  .version('0.1.0');

// ─── Shared Options ─────────────────────────────────────────────────

function addSharedOptions(cmd: Command): Command {
  return cmd
    .option('-s, --server <host>', 'SQL Server hostname')
    .option('-p, --port <port>', 'SQL Server port', parsePort)
    .option('-d, --database <name>', 'Database name')
    .option('-u, --user <user>', 'Database user')
    .option('-P, --password <password>', 'Database password')
    .option('-l, --location <path>', 'Migrations directory')
    .option('--schema <schema>', 'Schema of the migration log table')
    .option('--table <table>', 'Migration log table name')
    .option('--trust-server-certificate', 'Trust self-signed certificates')
    .option('--config <path>', 'Path to config file');
}

// ─── Commands ───────────────────────────────────────────────────────

addSharedOptions(
  program
    .command('status')
    .description('Show the state of every migration')
).action(async (opts: OptionValues) => {
  PrintBanner();
  const config = LoadConfig(mapOptions(opts));
  const success = await RunStatus(config);
  process.exit(success ? 0 : 1);
});

addSharedOptions(
  program
    .command('validate')
    .description('Fail if a logged migration is missing from the migrations directory')
).action(async (opts: OptionValues) => {
  PrintBanner();
  const config = LoadConfig(mapOptions(opts));
  const success = await RunValidate(config);
  process.exit(success ? 0 : 1);
});

// ─── Helpers ────────────────────────────────────────────────────────

/**
 * Maps commander options to CLIOptions.
 */
function mapOptions(opts: OptionValues): CLIOptions {
  return {
    Server: optionalString(opts.server),
    Port: typeof opts.port === 'number' ? opts.port : undefined,
    Database: optionalString(opts.database),
    User: optionalString(opts.user),
    Password: optionalString(opts.password),
    Location: optionalString(opts.location),
    Schema: optionalString(opts.schema),
    Table: optionalString(opts.table),
    TrustServerCertificate: opts.trustServerCertificate === true ? true : undefined,
    Config: optionalString(opts.config),
  };
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function parsePort(value: string): number {
  const port = ParsePort(value);
  if (port === undefined) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

// Run
program.parseAsync().catch((err: unknown) => {
  LogError(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
