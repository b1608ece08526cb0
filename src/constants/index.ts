/**
 * Shared constants for the modkeeper CLI application
 * This file provides a single source of truth for all directory names,
 * file patterns, and other constants used throughout the application.
 */

export const DIR_PATTERNS = {
  INSTALLED: '_installed_',
  UNINSTALLED: '_uninstalled_'
} as const;

export const FILE_PATTERNS = {
  ZIP_FILES: '.zip',
  STATE_YML: 'modkeeper.state.yml',
  /** Dependency file written by the earlier script-based tool */
  LEGACY_DEPENDENCIES_JSON: 'dependencies.json',
  CONFIG_FILES: ['modkeeper.jsonc', 'modkeeper.json']
} as const;

export const STATE_FILE_HEADER = '# This file is managed by modkeeper. Do not edit manually.';

export const STATUS_TAGS = {
  installed: '[INSTALLED]',
  uninstalled: '[UNINSTALLED]',
  missing: '[MISSING]'
} as const;

/** How many file paths reporters print before summarizing the rest */
export const DETAIL_LIST_LIMIT = 10;
