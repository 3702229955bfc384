/**
 * @module @migstate/cli
 *
 * CLI package for migstate.
 * This module exports the config loader and command implementations
 * for programmatic use of the CLI functionality.
 *
 * @packageDocumentation
 */

export { LoadConfig, ParseConfigFile, ParsePort } from './config-loader';
export type { CLIOptions, FileConfig } from './config-loader';
export { RunStatus } from './commands/status';
export { RunValidate } from './commands/validate';
