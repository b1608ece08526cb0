import { join, resolve } from 'path';
import JSZip from 'jszip';
import type { ModKeeperConfig } from '../../types/index.js';
import { findIntakeArchive, getInstalledDir, getUninstalledDir } from '../intake/intake-scanner.js';
import {
  cleanupEmptyParents,
  exists,
  isDirectory,
  isFile,
  isWithinDirectory,
  moveFile,
  readBinaryFile,
  remove,
  writeBinaryFile
} from '../../utils/fs.js';
import { PlacementError, RemovalError, describeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface PlacementReport {
  bundleId: string;
  /** Files that did not exist before */
  copied: string[];
  /** Files that replaced an existing file */
  overwritten: string[];
}

export interface RemovalReport {
  bundleId: string;
  removed: string[];
  /** Files listed in the archive that were already gone */
  notFound: string[];
}

/**
 * File placement/removal collaborator. Implementations either finish
 * or throw; workflows decide whether to commit based on that alone.
 */
export interface BundleFiles {
  place(bundleId: string, gameFilesRoot: string, trackingRoot: string): Promise<PlacementReport>;
  removeFiles(bundleId: string, gameFilesRoot: string, trackingRoot: string): Promise<RemovalReport>;
}

interface ArchiveEntry {
  /** Normalized relative path inside the archive */
  name: string;
  target: string;
  file: JSZip.JSZipObject;
}

async function openArchive(archivePath: string): Promise<JSZip> {
  const data = await readBinaryFile(archivePath);
  return JSZip.loadAsync(data);
}

/**
 * Map archive file entries onto the game directory, keeping their folder
 * structure. Returns the offending entry name when one would land outside.
 */
function mapEntries(zip: JSZip, gameFilesRoot: string): { entries: ArchiveEntry[]; escaping?: string } {
  const entries: ArchiveEntry[] = [];
  for (const file of Object.values(zip.files)) {
    if (file.dir) continue;
    const name = file.name.replace(/\\/g, '/');
    const target = resolve(gameFilesRoot, name);
    if (!isWithinDirectory(gameFilesRoot, target) || target === resolve(gameFilesRoot)) {
      return { entries, escaping: file.name };
    }
    entries.push({ name, target, file });
  }
  return { entries };
}

/**
 * BundleFiles backed by zip archives in the updates directory
 */
export class ArchiveBundleFiles implements BundleFiles {
  constructor(private readonly config: ModKeeperConfig) {}

  async place(bundleId: string, gameFilesRoot: string, trackingRoot: string): Promise<PlacementReport> {
    const archivePath = await findIntakeArchive(trackingRoot, this.config, bundleId);
    if (!archivePath) {
      throw new PlacementError(bundleId, `archive not found in '${trackingRoot}' or its ${this.config.uninstalledDirName} folder`);
    }
    if (!(await isDirectory(gameFilesRoot))) {
      throw new PlacementError(bundleId, `game files directory '${gameFilesRoot}' does not exist`);
    }

    let zip: JSZip;
    try {
      zip = await openArchive(archivePath);
    } catch (error) {
      throw new PlacementError(bundleId, `'${archivePath}' is not a valid zip archive (${describeError(error)})`);
    }

    const { entries, escaping } = mapEntries(zip, gameFilesRoot);
    if (escaping !== undefined) {
      throw new PlacementError(bundleId, `archive entry '${escaping}' points outside the game files directory`);
    }
    if (entries.length === 0) {
      throw new PlacementError(bundleId, 'archive contains no files');
    }

    const report: PlacementReport = { bundleId, copied: [], overwritten: [] };
    try {
      for (const entry of entries) {
        const existed = await exists(entry.target);
        const content = await entry.file.async('uint8array');
        await writeBinaryFile(entry.target, content);
        (existed ? report.overwritten : report.copied).push(entry.target);
      }
    } catch (error) {
      throw new PlacementError(bundleId, describeError(error), {
        copied: report.copied,
        overwritten: report.overwritten
      });
    }

    const installedPath = join(getInstalledDir(trackingRoot, this.config), bundleId);
    try {
      await moveFile(archivePath, installedPath);
    } catch (error) {
      throw new PlacementError(bundleId, describeError(error));
    }

    logger.debug(`Placed ${entries.length} file(s) of '${bundleId}'`, {
      copied: report.copied.length,
      overwritten: report.overwritten.length
    });
    return report;
  }

  async removeFiles(bundleId: string, gameFilesRoot: string, trackingRoot: string): Promise<RemovalReport> {
    const archivePath = join(getInstalledDir(trackingRoot, this.config), bundleId);
    if (!(await isFile(archivePath))) {
      throw new RemovalError(bundleId, `archive not found in its ${this.config.installedDirName} folder`);
    }

    let zip: JSZip;
    try {
      zip = await openArchive(archivePath);
    } catch (error) {
      throw new RemovalError(bundleId, `'${archivePath}' is not a valid zip archive (${describeError(error)})`);
    }

    const { entries, escaping } = mapEntries(zip, gameFilesRoot);
    if (escaping !== undefined) {
      throw new RemovalError(bundleId, `archive entry '${escaping}' points outside the game files directory`);
    }

    const report: RemovalReport = { bundleId, removed: [], notFound: [] };
    try {
      for (const entry of entries) {
        if (await exists(entry.target)) {
          await remove(entry.target);
          report.removed.push(entry.target);
        } else {
          report.notFound.push(entry.target);
        }
      }
      await cleanupEmptyParents(gameFilesRoot, report.removed);
      await moveFile(archivePath, join(getUninstalledDir(trackingRoot, this.config), bundleId));
    } catch (error) {
      throw new RemovalError(bundleId, describeError(error), { removed: report.removed });
    }

    logger.debug(`Removed ${report.removed.length} file(s) of '${bundleId}'`, { notFound: report.notFound.length });
    return report;
  }
}
