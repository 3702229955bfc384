/**
 * @module log/types
 * Collaborator interface for the migration application log.
 */

import { LogEntry } from '../migration/types';

/**
 * The persistent record of every migration applied or reverted.
 */
export interface MigrationLog {
  /**
   * Returns every recorded event in the store's insertion order.
   */
  ListMigrationsLog(): Promise<LogEntry[]>;
}

/**
 * Values of the `direction` column: `'u'` for up, `'d'` for down.
 */
export type LogDirectionCode = 'u' | 'd';
