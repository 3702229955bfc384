/**
 * @module formatting
 * Console output formatting for the migstate CLI.
 * Provides colored, structured output for migration status.
 */

import chalk from 'chalk';
import { FormatVersion } from '@migstate/core';
import type { MigrationState, MigrationStatus, ValidationResult } from '@migstate/core';

/**
 * Prints the migstate banner to the console.
 */
export function PrintBanner(): void {
  console.log(chalk.cyan.bold('\n  migstate') + chalk.gray(' — migration status for SQL Server'));
  console.log(chalk.gray('  ─────────────────────────────────────────\n'));
}

/**
 * Formats a migration status table for the `status` command.
 */
export function PrintStatusTable(states: MigrationState[]): void {
  if (states.length === 0) {
    console.log(chalk.yellow('  No migrations found.'));
    return;
  }

  for (const line of FormatStatusTable(states)) {
    console.log(line);
  }
  console.log();
}

/**
 * Builds the lines of the status table, header first. Status cells are
 * colored; everything else is plain text.
 */
export function FormatStatusTable(states: MigrationState[]): string[] {
  const lines = [
    '  ' +
      padRight('Version', 16) +
      padRight('Name', 42) +
      padRight('Status', 10) +
      padRight('Undo', 6) +
      'Applied At',
    chalk.gray('  ' + '─'.repeat(98)),
  ];

  for (const state of states) {
    const statusColor = getStatusColor(state.Status);
    lines.push(
      '  ' +
        padRight(FormatVersion(state.Version), 16) +
        padRight(truncate(state.Name, 40), 42) +
        statusColor(padRight(state.Status, 10)) +
        padRight(state.CanUndo ? 'yes' : 'no', 6) +
        chalk.gray(state.AppliedAt?.toISOString() ?? '')
    );
  }

  return lines;
}

/**
 * Prints the applied / pending / missing counts.
 */
export function PrintStatusSummary(result: ValidationResult): void {
  console.log(chalk.gray('  ' + '─'.repeat(50)));
  console.log('  ' + FormatStatusSummary(result));
  console.log(chalk.gray('  ' + '─'.repeat(50)));
  console.log();
}

/**
 * Renders the counts as one line, e.g. `3 applied, 1 pending, 0 missing`.
 */
export function FormatStatusSummary(result: ValidationResult): string {
  return (
    chalk.green(`${result.AppliedCount} applied`) +
    ', ' +
    chalk.yellow(`${result.PendingCount} pending`) +
    ', ' +
    (result.MissingCount > 0 ? chalk.red : chalk.gray)(`${result.MissingCount} missing`)
  );
}

/**
 * Logs an informational message.
 */
export function LogInfo(message: string): void {
  console.log(chalk.gray('  ') + message);
}

/**
 * Logs a success summary.
 */
export function LogSuccess(message: string): void {
  console.log(chalk.green('\n  ' + message));
}

/**
 * Logs a warning.
 */
export function LogWarning(message: string): void {
  console.log(chalk.yellow('  WARNING: ' + message));
}

/**
 * Logs an error message.
 */
export function LogError(message: string): void {
  console.log(chalk.red('\n  ERROR: ' + message));
}

/**
 * Returns a chalk color function for a migration status.
 */
function getStatusColor(status: MigrationStatus): chalk.Chalk {
  switch (status) {
    case 'APPLIED':
      return chalk.green;
    case 'PENDING':
      return chalk.yellow;
    case 'MISSING':
      return chalk.red;
  }
}

/**
 * Right-pads a string to a given width, counted in code points.
 */
function padRight(str: string, width: number): string {
  const length = Array.from(str).length;
  return length >= width ? str : str + ' '.repeat(width - length);
}

/**
 * Truncates a string to a maximum number of code points, appending '...'
 * if needed. Never splits a surrogate pair.
 */
function truncate(str: string, maxLen: number): string {
  const chars = Array.from(str);
  return chars.length <= maxLen ? str : chars.slice(0, maxLen - 3).join('') + '...';
}
