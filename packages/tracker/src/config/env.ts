/**
 * Environment Variable Configuration
 */

import type { EnvVar, PartialConfiguration } from './types.js';
import { EnvVars } from './types.js';
import { parseDurationValue } from './duration.js';
import { isLogLevel } from '../utils/logger.js';

/**
 * Gets a raw environment variable value, treating empty strings as unset
 */
export function getEnvVar(name: EnvVar): string | undefined {
  const value = process.env[name];
  return value !== undefined && value !== '' ? value : undefined;
}

/**
 * Loads configuration from environment variables.
 *
 * An unrecognized LOG_LEVEL is ignored, matching the logger's own fallback.
 * A malformed WORKLANE_BUSY_TIMEOUT throws a ValidationError.
 */
export function loadEnvConfig(): PartialConfiguration {
  const config: PartialConfiguration = {};

  const actor = getEnvVar(EnvVars.ACTOR);
  if (actor !== undefined) {
    config.actor = actor;
  }

  const database = getEnvVar(EnvVars.DATABASE);
  if (database !== undefined) {
    config.database = database;
  }

  const busyTimeout = getEnvVar(EnvVars.BUSY_TIMEOUT);
  if (busyTimeout !== undefined) {
    config.storage = { busyTimeout: parseDurationValue(busyTimeout, EnvVars.BUSY_TIMEOUT) };
  }

  const logLevel = getEnvVar(EnvVars.LOG_LEVEL)?.toUpperCase();
  if (isLogLevel(logLevel)) {
    config.logLevel = logLevel;
  }

  return config;
}

/**
 * Gets the config file path override from the environment
 */
export function getEnvConfigPath(): string | undefined {
  return getEnvVar(EnvVars.CONFIG);
}
