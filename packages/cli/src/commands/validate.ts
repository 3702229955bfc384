/**
 * @module commands/validate
 * Implementation of the `migstate validate` CLI command.
 */

import { MigrationTracker, FormatVersion } from '@migstate/core';
import type { MigstateConfig } from '@migstate/core';
import { LogInfo, LogSuccess, LogWarning, LogError } from '../formatting';

/**
 * Executes the validate command: fails when a logged migration is no
 * longer present in the migrations directory.
 *
 * @param config - Resolved migstate configuration
 */
export async function RunValidate(config: MigstateConfig): Promise<boolean> {
  const tracker = new MigrationTracker(config);
  tracker.OnProgress({ OnWarning: LogWarning });

  try {
    LogInfo(`Validating migrations against ${config.Database.Database}...`);
    console.log();

    const result = await tracker.Validate();

    if (result.MissingCount === 0) {
      LogSuccess('All logged migrations are present on disk');
    } else {
      LogError(`${result.MissingCount} logged migration(s) missing from ${config.Migrations.Location}:`);
      for (const state of result.Migrations) {
        if (state.Status === 'MISSING') {
          console.log(`    - ${FormatVersion(state.Version)} ${state.Name}`);
        }
      }
    }

    console.log();
    return result.MissingCount === 0;
  } catch (err) {
    LogError(err instanceof Error ? err.message : String(err));
    return false;
  } finally {
    await tracker.Close();
  }
}
