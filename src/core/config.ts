import { join } from 'path';
import type { ModKeeperConfig } from '../types/index.js';
import { DIR_PATTERNS, FILE_PATTERNS } from '../constants/index.js';
import { exists, readJsonOrJsoncFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError, describeError } from '../utils/errors.js';
import { isNonEmptyString, isRecord } from '../utils/records.js';

/**
 * Configuration for one updates directory.
 * Read from `modkeeper.jsonc` (or `modkeeper.json`) next to the archives;
 * every key is optional and falls back to the defaults below.
 */

export const DEFAULT_CONFIG: ModKeeperConfig = {
  installedDirName: DIR_PATTERNS.INSTALLED,
  uninstalledDirName: DIR_PATTERNS.UNINSTALLED,
  stateFileName: FILE_PATTERNS.STATE_YML,
  archiveExtension: FILE_PATTERNS.ZIP_FILES,
  cascade: true
};

type StringKey = 'installedDirName' | 'uninstalledDirName' | 'stateFileName' | 'archiveExtension';

const STRING_KEYS: StringKey[] = ['installedDirName', 'uninstalledDirName', 'stateFileName', 'archiveExtension'];

/**
 * Find the existing config file, or null if the directory has none
 */
export async function findConfigFile(trackingRoot: string): Promise<string | null> {
  for (const fileName of FILE_PATTERNS.CONFIG_FILES) {
    const path = join(trackingRoot, fileName);
    if (await exists(path)) {
      return path;
    }
  }
  return null;
}

/**
 * Merge a parsed config document over the defaults
 */
export function resolveConfig(raw: unknown, source: string = '<inline>'): ModKeeperConfig {
  if (raw === undefined || raw === null) {
    return { ...DEFAULT_CONFIG };
  }
  if (!isRecord(raw)) {
    throw new ConfigError(`Config in ${source} must be an object`, { source });
  }

  const input = raw;
  const config: ModKeeperConfig = { ...DEFAULT_CONFIG };

  for (const key of STRING_KEYS) {
    const value = input[key];
    if (value === undefined) continue;
    if (!isNonEmptyString(value)) {
      throw new ConfigError(`Config key '${key}' in ${source} must be a non-empty string`, { source, key });
    }
    config[key] = value.trim();
  }

  if (input.cascade !== undefined) {
    if (typeof input.cascade !== 'boolean') {
      throw new ConfigError(`Config key 'cascade' in ${source} must be true or false`, { source, key: 'cascade' });
    }
    config.cascade = input.cascade;
  }

  if (!config.archiveExtension.startsWith('.')) {
    config.archiveExtension = `.${config.archiveExtension}`;
  }
  if (config.installedDirName === config.uninstalledDirName) {
    throw new ConfigError(`installedDirName and uninstalledDirName in ${source} must differ`, { source });
  }

  return config;
}

/**
 * Load configuration for the given updates directory
 */
export async function loadConfig(trackingRoot: string): Promise<ModKeeperConfig> {
  const configPath = await findConfigFile(trackingRoot);
  if (!configPath) {
    logger.debug(`No config file in ${trackingRoot}, using defaults`);
    return { ...DEFAULT_CONFIG };
  }

  logger.debug(`Loading config from: ${configPath}`);
  let raw: unknown;
  try {
    raw = await readJsonOrJsoncFile(configPath);
  } catch (error) {
    throw new ConfigError(`Failed to read config ${configPath}: ${describeError(error)}`, { path: configPath });
  }
  return resolveConfig(raw, configPath);
}
