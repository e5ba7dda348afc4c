/**
 * Configuration Module
 */

export type {
  Duration,
  JournalMode,
  StorageSettings,
  Configuration,
  PartialConfiguration,
  YamlConfigFile,
  EnvVar,
  LoadConfigOptions,
  ConfigFileDiscovery,
} from './types.js';
export { EnvVars, VALID_JOURNAL_MODES } from './types.js';

export {
  DEFAULT_CONFIG,
  DEFAULT_DATABASE,
  DEFAULT_STORAGE_SETTINGS,
  MAX_BUSY_TIMEOUT,
  getDefaultConfig,
} from './defaults.js';

export { parseDuration, parseDurationValue } from './duration.js';

export {
  isValidActor,
  validateActor,
  validateDatabase,
  isValidJournalMode,
  validateJournalMode,
  validateBusyTimeout,
  validateLogLevel,
  validateConfiguration,
  validatePartialConfiguration,
} from './validation.js';

export { mergeConfiguration, mergeConfigurations, createConfiguration } from './merge.js';

export {
  CONFIG_FILE_NAME,
  WORKLANE_DIR,
  findWorklaneDir,
  discoverConfigFile,
  parseYamlConfig,
  convertYamlToConfig,
  readConfigFile,
  convertConfigToYaml,
  serializeConfigToYaml,
  writeConfigFile,
} from './file.js';

export { getEnvVar, loadEnvConfig, getEnvConfigPath } from './env.js';

export { IN_MEMORY_DATABASE, loadConfig, resolveDatabasePath, openStorageFromConfig } from './config.js';
