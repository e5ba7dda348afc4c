/**
 * Configuration Defaults
 *
 * Lowest-precedence values, overridden by file, environment and overrides.
 */

import { DEFAULT_PRAGMAS } from '@worklane/storage';
import type { Configuration, StorageSettings } from './types.js';

/** One second in milliseconds */
export const ONE_SECOND = 1000;

/** One minute in milliseconds */
export const ONE_MINUTE = 60 * ONE_SECOND;

export const DEFAULT_DATABASE = 'worklane.db';

export const DEFAULT_STORAGE_SETTINGS: StorageSettings = {
  journalMode: DEFAULT_PRAGMAS.journal_mode,
  busyTimeout: DEFAULT_PRAGMAS.busy_timeout,
};

export const DEFAULT_CONFIG: Configuration = {
  actor: undefined,
  database: DEFAULT_DATABASE,
  storage: DEFAULT_STORAGE_SETTINGS,
  logLevel: 'INFO',
};

/**
 * Upper bound for the busy timeout
 */
export const MAX_BUSY_TIMEOUT = ONE_MINUTE;

/**
 * Creates a fresh copy of the default configuration.
 * Use this rather than DEFAULT_CONFIG to avoid shared mutation.
 */
export function getDefaultConfig(): Configuration {
  return {
    actor: undefined,
    database: DEFAULT_CONFIG.database,
    storage: { ...DEFAULT_STORAGE_SETTINGS },
    logLevel: DEFAULT_CONFIG.logLevel,
  };
}
