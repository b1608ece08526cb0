import type { OutputPort } from '../ports/output.js';
import type { InstallOutcome } from './install-workflow.js';
import { formatFileList, pluralize } from '../../utils/formatters.js';

export interface InstallReportOptions {
  gameFilesRoot: string;
  /** List the individual files, not just the counts */
  details?: boolean;
}

export interface InstallFailure {
  bundleId: string;
  reason: string;
}

/**
 * Report the result of one installation
 */
export function reportInstallResult(
  output: OutputPort,
  outcome: InstallOutcome,
  options: InstallReportOptions
): void {
  const { placement } = outcome;
  output.success(`Installed ${outcome.bundleId}`);
  output.info(
    `Dependencies: ${outcome.dependencies.length > 0 ? outcome.dependencies.join(', ') : 'none'}`
  );
  output.info(
    `Copied ${pluralize(placement.copied.length, 'new file')}, overwrote ${pluralize(placement.overwritten.length, 'file')}`
  );

  if (!options.details) return;

  if (placement.copied.length > 0) {
    output.note(formatFileList(placement.copied, options.gameFilesRoot), 'Copied Files');
  }
  if (placement.overwritten.length > 0) {
    output.note(formatFileList(placement.overwritten, options.gameFilesRoot), 'Overwritten Files');
  }
}

/**
 * Totals line for `install --all`
 */
export function reportInstallSummary(
  output: OutputPort,
  outcomes: InstallOutcome[],
  failures: InstallFailure[]
): void {
  let copied = 0;
  let overwritten = 0;
  for (const outcome of outcomes) {
    copied += outcome.placement.copied.length;
    overwritten += outcome.placement.overwritten.length;
  }

  output.info(
    `Installed ${pluralize(outcomes.length, 'bundle')}: ` +
    `copied ${pluralize(copied, 'new file')}, overwrote ${pluralize(overwritten, 'file')}`
  );
  for (const failure of failures) {
    output.error(`${failure.bundleId}: ${failure.reason}`);
  }
}
