import { join } from 'path';
import * as yaml from 'js-yaml';
import type { BundleRecord, BundleStatus, ModKeeperConfig, StateFileData } from '../../types/index.js';
import { FILE_PATTERNS, STATE_FILE_HEADER } from '../../constants/index.js';
import { BundleStore } from '../bundles/bundle-store.js';
import { DependencyGraph } from '../graph/dependency-graph.js';
import { createEmptyState, type ModState, type StateRepository } from './mod-state.js';
import { scanInstalled } from '../intake/intake-scanner.js';
import { exists, readJsonOrJsoncFile, readTextFile, writeFileAtomic } from '../../utils/fs.js';
import { StateFileError, describeError } from '../../utils/errors.js';
import { isNonEmptyString, isRecord } from '../../utils/records.js';
import { logger } from '../../utils/logger.js';

export function getStatePath(trackingRoot: string, config: ModKeeperConfig): string {
  return join(trackingRoot, config.stateFileName);
}

export function getLegacyDependenciesPath(trackingRoot: string): string {
  return join(trackingRoot, FILE_PATTERNS.LEGACY_DEPENDENCIES_JSON);
}

function sanitizeStatus(value: unknown, id: string): BundleStatus {
  if (value === 'installed' || value === 'uninstalled') {
    return value;
  }
  logger.warn(`Unknown status for '${id}' in state file, treating it as uninstalled`, { status: value });
  return 'uninstalled';
}

function sanitizeDependencyList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  const ids = value.filter(isNonEmptyString).map(id => id.trim());
  return Array.from(new Set(ids));
}

/**
 * Build a state from ids, statuses and edges, registering dependency
 * targets that have no entry of their own as uninstalled bundles.
 */
function buildState(
  statuses: Array<[string, BundleStatus]>,
  edges: Record<string, string[]>
): ModState {
  const store = new BundleStore();
  for (const [id, status] of statuses) {
    if (store.has(id)) continue;
    store.register(id);
    if (status === 'installed') store.markInstalled(id);
  }

  const cleanEdges: Record<string, string[]> = {};
  for (const [dependant, dependencies] of Object.entries(edges)) {
    const kept = dependencies.filter(dependency => {
      if (dependency === dependant) {
        logger.warn(`Ignoring self dependency of '${dependant}' in state file`);
        return false;
      }
      return true;
    });
    for (const dependency of kept) {
      if (!store.has(dependency)) {
        logger.debug(`Registering '${dependency}' referenced as a dependency of '${dependant}'`);
        store.register(dependency);
      }
    }
    if (kept.length > 0) cleanEdges[dependant] = kept;
  }

  const graph = DependencyGraph.restore(store, cleanEdges);
  const cycle = graph.findCycle();
  if (cycle) {
    logger.warn(`State file contains a dependency cycle: ${cycle.join(' → ')}`);
  }
  return { store, graph };
}

/**
 * Turn a parsed state document into a ModState, dropping malformed entries
 */
export function parseStateDocument(raw: unknown, source: string): ModState {
  if (raw === undefined || raw === null) {
    return createEmptyState();
  }
  if (!isRecord(raw)) {
    throw new StateFileError(`${source} does not contain a mapping`, { path: source });
  }

  const section = raw.bundles;
  if (!isRecord(section)) {
    return createEmptyState();
  }

  const statuses: Array<[string, BundleStatus]> = [];
  const edges: Record<string, string[]> = {};

  for (const [rawId, entry] of Object.entries(section)) {
    const id = rawId.trim();
    if (id.length === 0 || !isRecord(entry)) {
      logger.warn(`Skipping malformed state entry '${rawId}' in ${source}`);
      continue;
    }
    statuses.push([id, sanitizeStatus(entry.status, id)]);
    const dependencies = sanitizeDependencyList(entry.dependencies);
    if (dependencies.length > 0) {
      edges[id] = dependencies;
    }
  }

  return buildState(statuses, edges);
}

export function toStateFileData(state: ModState): StateFileData {
  const bundles: Record<string, BundleRecord> = {};
  for (const bundle of state.store.list()) {
    const record: BundleRecord = { status: bundle.status };
    const dependencies = state.graph.dependenciesOf(bundle.id);
    if (dependencies.length > 0) {
      record.dependencies = dependencies;
    }
    bundles[bundle.id] = record;
  }
  return { bundles };
}

export function serializeState(state: ModState): string {
  const body = yaml.dump(toStateFileData(state), { lineWidth: -1, noRefs: true });
  return `${STATE_FILE_HEADER}\n\n${body}`;
}

/**
 * Import the `dependencies.json` written by the script-based predecessor.
 * Its `dependents` section is ignored; reverse edges are always derived.
 */
export async function importLegacyDependencies(
  trackingRoot: string,
  config: ModKeeperConfig
): Promise<ModState> {
  const legacyPath = getLegacyDependenciesPath(trackingRoot);
  let raw: unknown;
  try {
    raw = await readJsonOrJsoncFile(legacyPath);
  } catch (error) {
    throw new StateFileError(`Failed to read ${legacyPath}: ${describeError(error)}`, { path: legacyPath });
  }

  const installed = new Set((await scanInstalled(trackingRoot, config)).map(candidate => candidate.id));
  const section = isRecord(raw) && isRecord(raw.dependencies) ? raw.dependencies : {};

  const ids: string[] = [];
  const edges: Record<string, string[]> = {};
  for (const [id, value] of Object.entries(section)) {
    if (!isNonEmptyString(id)) continue;
    ids.push(id);
    const dependencies = sanitizeDependencyList(value);
    if (dependencies.length > 0) edges[id] = dependencies;
  }
  for (const id of installed) {
    if (!ids.includes(id)) ids.push(id);
  }

  const statuses: Array<[string, BundleStatus]> = ids.map(id => [id, installed.has(id) ? 'installed' : 'uninstalled']);
  const state = buildState(statuses, edges);

  // Dependency targets registered by buildState get their real status too
  for (const id of installed) {
    if (state.store.has(id)) state.store.markInstalled(id);
  }

  logger.info(`Imported ${state.store.size} bundle(s) from ${legacyPath}`);
  return state;
}

/**
 * Load the state of an updates directory.
 * Falls back to the legacy dependency file, then to an empty state.
 */
export async function readState(trackingRoot: string, config: ModKeeperConfig): Promise<ModState> {
  const statePath = getStatePath(trackingRoot, config);

  if (!(await exists(statePath))) {
    if (await exists(getLegacyDependenciesPath(trackingRoot))) {
      return importLegacyDependencies(trackingRoot, config);
    }
    logger.debug(`No state file at ${statePath}, starting empty`);
    return createEmptyState();
  }

  let parsed: unknown;
  try {
    const content = await readTextFile(statePath);
    parsed = yaml.load(content);
  } catch (error) {
    throw new StateFileError(`Failed to read ${statePath}: ${describeError(error)}`, { path: statePath });
  }
  return parseStateDocument(parsed, statePath);
}

export async function writeState(trackingRoot: string, config: ModKeeperConfig, state: ModState): Promise<void> {
  const statePath = getStatePath(trackingRoot, config);
  try {
    await writeFileAtomic(statePath, serializeState(state));
  } catch (error) {
    throw new StateFileError(`Failed to write ${statePath}: ${describeError(error)}`, { path: statePath });
  }
  logger.debug(`Saved ${state.store.size} bundle(s) to ${statePath}`);
}

/**
 * StateRepository backed by the YAML state file of one updates directory
 */
export class FileStateRepository implements StateRepository {
  constructor(
    private readonly trackingRoot: string,
    private readonly config: ModKeeperConfig
  ) {}

  load(): Promise<ModState> {
    return readState(this.trackingRoot, this.config);
  }

  save(state: ModState): Promise<void> {
    return writeState(this.trackingRoot, this.config, state);
  }
}
