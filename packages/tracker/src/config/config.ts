/**
 * Configuration Loading
 *
 * Implements the precedence chain: overrides > environment > file > defaults,
 * and opens storage from a loaded configuration.
 */

import * as path from 'node:path';
import { createStorage, initializeSchema, type StorageBackend } from '@worklane/storage';
import type { Configuration, LoadConfigOptions } from './types.js';
import { getDefaultConfig } from './defaults.js';
import { mergeConfiguration } from './merge.js';
import { validateConfiguration, validatePartialConfiguration } from './validation.js';
import { discoverConfigFile, readConfigFile } from './file.js';
import { loadEnvConfig, getEnvConfigPath } from './env.js';
import { createLogger } from '../utils/logger.js';

export const IN_MEMORY_DATABASE = ':memory:';

/**
 * Loads configuration with the full precedence chain
 *
 * Precedence (highest to lowest):
 * 1. `options.overrides`
 * 2. Environment variables
 * 3. Config file (`.worklane/config.yaml`, or WORKLANE_CONFIG)
 * 4. Built-in defaults
 *
 * A relative database path is resolved against the directory of the config
 * file when one was found, else against the start directory.
 *
 * @throws ValidationError when any source carries an invalid value
 */
export function loadConfig(options: LoadConfigOptions = {}): Configuration {
  const startDir = options.startDir ?? process.cwd();
  let config = getDefaultConfig();

  const discovery = options.skipFile
    ? { exists: false }
    : discoverConfigFile(options.configPath ?? (options.skipEnv ? undefined : getEnvConfigPath()), startDir);

  if (discovery.exists && discovery.path) {
    config = mergeConfiguration(config, readConfigFile(discovery.path));
  }

  if (!options.skipEnv) {
    const envConfig = loadEnvConfig();
    validatePartialConfiguration(envConfig);
    config = mergeConfiguration(config, envConfig);
  }

  if (options.overrides) {
    validatePartialConfiguration(options.overrides);
    config = mergeConfiguration(config, options.overrides);
  }

  validateConfiguration(config);

  return {
    ...config,
    database: resolveDatabasePath(config.database, discovery.worklaneDir ?? startDir),
  };
}

/**
 * Resolves a database setting to an absolute path; ':memory:' is kept
 */
export function resolveDatabasePath(database: string, baseDir: string): string {
  if (database === IN_MEMORY_DATABASE) {
    return database;
  }
  return path.resolve(baseDir, database);
}

/**
 * Opens the SQLite backend described by a configuration and brings its
 * schema up to date
 */
export function openStorageFromConfig(config: Configuration): StorageBackend {
  const logger = createLogger('storage', config.logLevel);
  const backend = createStorage({
    path: config.database,
    pragmas: {
      journal_mode: config.storage.journalMode,
      busy_timeout: config.storage.busyTimeout,
    },
  });

  const result = initializeSchema(backend);
  if (result.applied.length > 0) {
    logger.info(`Applied migrations ${result.applied.join(', ')} to ${config.database}`);
  } else {
    logger.debug(`Schema of ${config.database} is at version ${result.toVersion}`);
  }
  return backend;
}
