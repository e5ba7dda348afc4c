/**
 * Configuration File Loading
 *
 * Handles YAML configuration file discovery, parsing and writing.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'yaml';
import { ValidationError, ErrorCode } from '@worklane/core';
import type { ConfigFileDiscovery, PartialConfiguration, YamlConfigFile } from './types.js';
import { parseDurationValue } from './duration.js';
import { validatePartialConfiguration, validateJournalMode, validateLogLevel } from './validation.js';

// ============================================================================
// Constants
// ============================================================================

export const CONFIG_FILE_NAME = 'config.yaml';

export const WORKLANE_DIR = '.worklane';

// ============================================================================
// File Discovery
// ============================================================================

function isDirectory(candidate: string): boolean {
  return fs.statSync(candidate, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

/**
 * Finds the nearest .worklane directory by walking up from the given directory
 */
export function findWorklaneDir(startDir: string): string | undefined {
  let currentDir = path.resolve(startDir);

  for (;;) {
    const candidate = path.join(currentDir, WORKLANE_DIR);
    if (isDirectory(candidate)) {
      return candidate;
    }
    const parent = path.dirname(currentDir);
    if (parent === currentDir) {
      return undefined;
    }
    currentDir = parent;
  }
}

/**
 * Discovers the configuration file location
 *
 * @param overridePath - Explicit file path; skips the directory search
 * @param startDir - Directory to start searching from (default: cwd)
 */
export function discoverConfigFile(
  overridePath?: string,
  startDir: string = process.cwd()
): ConfigFileDiscovery {
  if (overridePath) {
    const resolvedPath = path.resolve(startDir, overridePath);
    const exists = fs.existsSync(resolvedPath);
    return {
      path: resolvedPath,
      exists,
      worklaneDir: exists ? path.dirname(resolvedPath) : undefined,
    };
  }

  const worklaneDir = findWorklaneDir(startDir);
  if (worklaneDir) {
    const configPath = path.join(worklaneDir, CONFIG_FILE_NAME);
    return {
      path: configPath,
      exists: fs.existsSync(configPath),
      worklaneDir,
    };
  }

  return { exists: false };
}

// ============================================================================
// YAML Parsing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses YAML content into a config file structure
 *
 * @param filePath - Used in error messages only
 */
export function parseYamlConfig(content: string, filePath?: string): YamlConfigFile {
  const where = filePath ? ` (${filePath})` : '';
  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (err) {
    throw new ValidationError(
      `Failed to parse YAML configuration${where}: ${err instanceof Error ? err.message : String(err)}`,
      ErrorCode.INVALID_INPUT,
      { filePath },
      err instanceof Error ? err : undefined
    );
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ValidationError(`Configuration file must contain an object${where}`, ErrorCode.INVALID_INPUT, {
      value: parsed,
    });
  }

  const result: YamlConfigFile = {
    actor: parsed.actor,
    database: parsed.database,
    log_level: parsed.log_level,
  };
  if (parsed.storage !== undefined) {
    if (!isRecord(parsed.storage)) {
      throw new ValidationError(`'storage' must be a mapping${where}`, ErrorCode.INVALID_INPUT, {
        field: 'storage',
        value: parsed.storage,
      });
    }
    result.storage = {
      journal_mode: parsed.storage.journal_mode,
      busy_timeout: parsed.storage.busy_timeout,
    };
  }
  return result;
}

/**
 * Converts YAML config (snake_case) to internal format (camelCase) and
 * validates every value it carries
 */
export function convertYamlToConfig(yamlConfig: YamlConfigFile): PartialConfiguration {
  const result: PartialConfiguration = {};

  if (yamlConfig.actor !== undefined && yamlConfig.actor !== null) {
    result.actor = String(yamlConfig.actor);
  }
  if (yamlConfig.database !== undefined && yamlConfig.database !== null) {
    result.database = String(yamlConfig.database);
  }
  if (yamlConfig.log_level !== undefined) {
    result.logLevel = validateLogLevel(
      typeof yamlConfig.log_level === 'string' ? yamlConfig.log_level.toUpperCase() : yamlConfig.log_level
    );
  }

  if (yamlConfig.storage) {
    result.storage = {};
    if (yamlConfig.storage.journal_mode !== undefined) {
      result.storage.journalMode = validateJournalMode(yamlConfig.storage.journal_mode);
    }
    if (yamlConfig.storage.busy_timeout !== undefined) {
      result.storage.busyTimeout = parseDurationValue(yamlConfig.storage.busy_timeout, 'storage.busyTimeout');
    }
  }

  validatePartialConfiguration(result);
  return result;
}

/**
 * Reads and parses a configuration file; a missing file yields `{}`
 */
export function readConfigFile(filePath: string): PartialConfiguration {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  const content = fs.readFileSync(filePath, 'utf-8');
  return convertYamlToConfig(parseYamlConfig(content, filePath));
}

// ============================================================================
// YAML Writing
// ============================================================================

export function convertConfigToYaml(config: PartialConfiguration): YamlConfigFile {
  const result: YamlConfigFile = {};

  if (config.actor !== undefined) {
    result.actor = config.actor;
  }
  if (config.database !== undefined) {
    result.database = config.database;
  }
  if (config.logLevel !== undefined) {
    result.log_level = config.logLevel;
  }
  if (config.storage) {
    const storage: NonNullable<YamlConfigFile['storage']> = {};
    if (config.storage.journalMode !== undefined) {
      storage.journal_mode = config.storage.journalMode;
    }
    if (config.storage.busyTimeout !== undefined) {
      storage.busy_timeout = config.storage.busyTimeout;
    }
    if (Object.keys(storage).length > 0) {
      result.storage = storage;
    }
  }

  return result;
}

export function serializeConfigToYaml(config: PartialConfiguration): string {
  return yaml.stringify(convertConfigToYaml(config), {
    indent: 2,
    lineWidth: 120,
  });
}

/**
 * Writes configuration to a file, creating its directory when needed
 */
export function writeConfigFile(filePath: string, config: PartialConfiguration): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const content = `# Worklane Configuration\n\n${serializeConfigToYaml(config)}`;
  fs.writeFileSync(filePath, content, 'utf-8');
}
