import { join } from 'path';
import type { ModKeeperConfig } from '../../types/index.js';
import { ensureDir, isDirectory, isFile, listFiles } from '../../utils/fs.js';
import { ValidationError } from '../../utils/errors.js';

/**
 * Intake: archives waiting to be installed, found either directly in the
 * updates directory or in its `_uninstalled_` folder.
 */

export type IntakeLocation = 'root' | 'uninstalled' | 'installed';

export interface IntakeCandidate {
  /** Archive file name, used as the bundle id */
  id: string;
  path: string;
  location: IntakeLocation;
}

export function getInstalledDir(trackingRoot: string, config: ModKeeperConfig): string {
  return join(trackingRoot, config.installedDirName);
}

export function getUninstalledDir(trackingRoot: string, config: ModKeeperConfig): string {
  return join(trackingRoot, config.uninstalledDirName);
}

/**
 * Make sure the updates directory exists and has both tracking folders
 */
export async function ensureTrackingLayout(trackingRoot: string, config: ModKeeperConfig): Promise<void> {
  if (!(await isDirectory(trackingRoot))) {
    throw new ValidationError(`Updates directory '${trackingRoot}' does not exist`, { trackingRoot });
  }
  await ensureDir(getInstalledDir(trackingRoot, config));
  await ensureDir(getUninstalledDir(trackingRoot, config));
}

async function listArchives(
  dir: string,
  location: IntakeLocation,
  config: ModKeeperConfig
): Promise<IntakeCandidate[]> {
  if (!(await isDirectory(dir))) return [];
  const extension = config.archiveExtension.toLowerCase();
  const names = await listFiles(dir);
  return names
    .filter(name => name.toLowerCase().endsWith(extension))
    .sort((a, b) => a.localeCompare(b))
    .map(name => ({ id: name, path: join(dir, name), location }));
}

/**
 * Archives available for installation, root folder first.
 * An id present in both places is offered once, from the root folder.
 */
export async function scanIntake(trackingRoot: string, config: ModKeeperConfig): Promise<IntakeCandidate[]> {
  await ensureTrackingLayout(trackingRoot, config);
  return listIntake(trackingRoot, config);
}

/**
 * Same as scanIntake, without creating the tracking folders
 */
export async function listIntake(trackingRoot: string, config: ModKeeperConfig): Promise<IntakeCandidate[]> {
  const rootArchives = await listArchives(trackingRoot, 'root', config);
  const uninstalledArchives = await listArchives(getUninstalledDir(trackingRoot, config), 'uninstalled', config);

  const seen = new Set<string>();
  const candidates: IntakeCandidate[] = [];
  for (const candidate of [...rootArchives, ...uninstalledArchives]) {
    if (seen.has(candidate.id)) continue;
    seen.add(candidate.id);
    candidates.push(candidate);
  }
  return candidates;
}

/**
 * Archives currently in the `_installed_` folder
 */
export async function scanInstalled(trackingRoot: string, config: ModKeeperConfig): Promise<IntakeCandidate[]> {
  return listArchives(getInstalledDir(trackingRoot, config), 'installed', config);
}

/**
 * Locate the intake archive for `id`, or undefined if it is not waiting for install
 */
export async function findIntakeArchive(
  trackingRoot: string,
  config: ModKeeperConfig,
  id: string
): Promise<string | undefined> {
  for (const dir of [trackingRoot, getUninstalledDir(trackingRoot, config)]) {
    const candidatePath = join(dir, id);
    if (await isFile(candidatePath)) return candidatePath;
  }
  return undefined;
}
