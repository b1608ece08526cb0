import pico from 'picocolors';

import type { CommandResult, ExecutionContext } from '../../types/index.js';
import { FileStateRepository } from '../state/state-file.js';
import { listIntake, scanInstalled } from '../intake/intake-scanner.js';

export interface InstalledEntry {
  id: string;
  dependencies: string[];
  /** False when the state says installed but `_installed_` has no archive */
  archivePresent: boolean;
}

export interface BundleListing {
  installed: InstalledEntry[];
  /** Intake archives that can be installed */
  available: string[];
  /** Archives in `_installed_` the state does not know as installed */
  untracked: string[];
}

/**
 * Collect installed, available and untracked bundles of the updates
 * directory. Read-only: nothing is created or written.
 */
export async function runListPipeline(ctx: ExecutionContext): Promise<CommandResult<BundleListing>> {
  const state = await new FileStateRepository(ctx.trackingRoot, ctx.config).load();
  const installedArchives = new Set(
    (await scanInstalled(ctx.trackingRoot, ctx.config)).map(candidate => candidate.id)
  );

  const installed: InstalledEntry[] = Array.from(state.store.listInstalled(), id => ({
    id,
    dependencies: state.graph.dependenciesOf(id),
    archivePresent: installedArchives.has(id)
  }));
  const available = (await listIntake(ctx.trackingRoot, ctx.config))
    .map(candidate => candidate.id)
    .filter(id => !state.store.isInstalled(id));
  const untracked = Array.from(installedArchives).filter(id => !state.store.isInstalled(id));

  return { success: true, data: { installed, available, untracked } };
}

/**
 * Render a listing as indented sections
 */
export function formatBundleListing(listing: BundleListing, options: { color?: boolean } = {}): string[] {
  const colors = pico.createColors(options.color ?? false);
  const lines: string[] = [];

  lines.push('Installed bundles:');
  if (listing.installed.length === 0) {
    lines.push(colors.dim('  (none)'));
  }
  for (const entry of listing.installed) {
    let line = `  ${entry.id}`;
    if (entry.dependencies.length > 0) {
      line += ` (depends on ${entry.dependencies.join(', ')})`;
    }
    if (!entry.archivePresent) {
      line += ` ${colors.red('[ARCHIVE MISSING]')}`;
    }
    lines.push(line);
  }

  lines.push('Available bundles:');
  if (listing.available.length === 0) {
    lines.push(colors.dim('  (none)'));
  }
  for (const id of listing.available) {
    lines.push(`  ${id}`);
  }

  if (listing.untracked.length > 0) {
    lines.push('Untracked installed archives:');
    for (const id of listing.untracked) {
      lines.push(`  ${colors.yellow(id)}`);
    }
  }

  return lines;
}
