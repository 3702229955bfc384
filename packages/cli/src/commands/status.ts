/**
 * @module commands/status
 * Implementation of the `migstate status` CLI command.
 */

import { MigrationTracker } from '@migstate/core';
import type { MigstateConfig } from '@migstate/core';
import { PrintStatusTable, PrintStatusSummary, LogInfo, LogWarning, LogError } from '../formatting';

/**
 * Executes the status command: displays the state of every migration.
 *
 * @param config - Resolved migstate configuration
 */
export async function RunStatus(config: MigstateConfig): Promise<boolean> {
  const tracker = new MigrationTracker(config);
  tracker.OnProgress({ OnLog: LogInfo, OnWarning: LogWarning });

  try {
    LogInfo(`Database: ${config.Database.Server}:${config.Database.Port ?? 1433}/${config.Database.Database}`);
    LogInfo(`Location: ${config.Migrations.Location}`);
    console.log();

    const result = await tracker.Validate();
    console.log();
    PrintStatusTable(result.Migrations);
    PrintStatusSummary(result);

    return true;
  } catch (err) {
    LogError(err instanceof Error ? err.message : String(err));
    return false;
  } finally {
    await tracker.Close();
  }
}
