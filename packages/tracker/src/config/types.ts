/**
 * Configuration System Types
 *
 * Configuration for the task tracker. Values come from built-in defaults,
 * a YAML file, environment variables and explicit overrides, in increasing
 * order of precedence.
 */

import type { SqlitePragmas } from '@worklane/storage';
import type { LogLevel } from '../utils/logger.js';

/**
 * Duration in milliseconds
 */
export type Duration = number;

export type JournalMode = NonNullable<SqlitePragmas['journal_mode']>;

export const VALID_JOURNAL_MODES: readonly JournalMode[] = [
  'delete',
  'truncate',
  'persist',
  'memory',
  'wal',
  'off',
] as const;

// ============================================================================
// Configuration Interfaces
// ============================================================================

/**
 * SQLite connection settings
 */
export interface StorageSettings {
  /** Journal mode (default: 'wal') */
  journalMode: JournalMode;
  /** How long a writer waits on a locked database (default: 5000ms) */
  busyTimeout: Duration;
}

/**
 * Complete tracker configuration
 */
export interface Configuration {
  /** Caller identity used to attribute log lines */
  actor?: string;
  /** Database file path, or ':memory:' (default: 'worklane.db') */
  database: string;
  storage: StorageSettings;
  /** Minimum level for service loggers (default: 'INFO') */
  logLevel: LogLevel;
}

/**
 * Partial configuration for merging
 */
export type PartialConfiguration = {
  actor?: string;
  database?: string;
  storage?: Partial<StorageSettings>;
  logLevel?: LogLevel;
};

// ============================================================================
// YAML File Format Types
// ============================================================================

/**
 * YAML configuration file structure (snake_case keys)
 */
export interface YamlConfigFile {
  actor?: unknown;
  database?: unknown;
  log_level?: unknown;
  storage?: {
    journal_mode?: unknown;
    busy_timeout?: unknown;
  };
}

// ============================================================================
// Environment Variable Mapping
// ============================================================================

export const EnvVars = {
  /** Caller identity */
  ACTOR: 'WORKLANE_ACTOR',
  /** Database file path */
  DATABASE: 'WORKLANE_DB',
  /** Config file path override */
  CONFIG: 'WORKLANE_CONFIG',
  /** SQLite busy timeout (ms or duration string) */
  BUSY_TIMEOUT: 'WORKLANE_BUSY_TIMEOUT',
  /** Minimum log level */
  LOG_LEVEL: 'LOG_LEVEL',
} as const;

export type EnvVar = (typeof EnvVars)[keyof typeof EnvVars];

// ============================================================================
// Configuration Operations
// ============================================================================

export interface LoadConfigOptions {
  /** Override config file path */
  configPath?: string;
  /** Directory the file search starts from (default: cwd) */
  startDir?: string;
  /** Skip environment variables */
  skipEnv?: boolean;
  /** Skip config file loading */
  skipFile?: boolean;
  /** Highest-precedence overrides */
  overrides?: PartialConfiguration;
}

/**
 * Result of configuration file discovery
 */
export interface ConfigFileDiscovery {
  /** Path to the config file, if one was located or given */
  path?: string;
  exists: boolean;
  /** Directory containing the config file */
  worklaneDir?: string;
}
