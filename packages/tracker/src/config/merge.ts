/**
 * Configuration Merging
 *
 * Combines configuration from several sources. Later sources win field by
 * field; undefined never overrides a value.
 */

import type { Configuration, PartialConfiguration } from './types.js';
import { getDefaultConfig } from './defaults.js';

/**
 * Merges a partial configuration into a complete one
 */
export function mergeConfiguration(base: Configuration, partial: PartialConfiguration): Configuration {
  return {
    actor: partial.actor !== undefined ? partial.actor : base.actor,
    database: partial.database !== undefined ? partial.database : base.database,
    storage: {
      journalMode:
        partial.storage?.journalMode !== undefined ? partial.storage.journalMode : base.storage.journalMode,
      busyTimeout:
        partial.storage?.busyTimeout !== undefined ? partial.storage.busyTimeout : base.storage.busyTimeout,
    },
    logLevel: partial.logLevel !== undefined ? partial.logLevel : base.logLevel,
  };
}

/**
 * Merges partial configurations in order; later ones override earlier ones
 */
export function mergeConfigurations(base: Configuration, ...partials: PartialConfiguration[]): Configuration {
  let result = base;
  for (const partial of partials) {
    result = mergeConfiguration(result, partial);
  }
  return result;
}

/**
 * Creates a configuration by merging defaults with a partial config
 */
export function createConfiguration(partial?: PartialConfiguration): Configuration {
  const defaults = getDefaultConfig();
  return partial ? mergeConfiguration(defaults, partial) : defaults;
}
