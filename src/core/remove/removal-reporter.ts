import type { OutputPort } from '../ports/output.js';
import type { RemovalOutcome } from './removal-workflow.js';
import { formatFileList, pluralize } from '../../utils/formatters.js';

export interface RemovalReportOptions {
  gameFilesRoot: string;
  details?: boolean;
}

export interface RemovalFailure {
  bundleId: string;
  reason: string;
}

/**
 * Report one removal, including the dependencies removed with it
 */
export function reportRemovalResult(
  output: OutputPort,
  outcome: RemovalOutcome,
  options: RemovalReportOptions
): void {
  const [target, ...cascaded] = outcome.removed;
  if (target === undefined) return;

  output.success(`Removed ${target}`);
  if (cascaded.length > 0) {
    output.info(`Also removed unused ${cascaded.length === 1 ? 'dependency' : 'dependencies'}: ${cascaded.join(', ')}`);
  }

  for (const report of outcome.reports) {
    output.info(
      `${report.bundleId}: removed ${pluralize(report.removed.length, 'file')}, ` +
      `${report.notFound.length} not found`
    );
    if (!options.details) continue;
    if (report.removed.length > 0) {
      output.note(formatFileList(report.removed, options.gameFilesRoot), `Removed Files (${report.bundleId})`);
    }
    if (report.notFound.length > 0) {
      output.note(formatFileList(report.notFound, options.gameFilesRoot), `Not Found (${report.bundleId})`);
    }
  }
}

/**
 * Totals line for `remove --all`
 */
export function reportRemovalSummary(
  output: OutputPort,
  outcomes: RemovalOutcome[],
  failures: RemovalFailure[]
): void {
  let bundles = 0;
  let removed = 0;
  let notFound = 0;
  for (const outcome of outcomes) {
    bundles += outcome.removed.length;
    for (const report of outcome.reports) {
      removed += report.removed.length;
      notFound += report.notFound.length;
    }
  }

  output.info(
    `Removed ${pluralize(bundles, 'bundle')}: ${pluralize(removed, 'file')} removed, ${notFound} not found`
  );
  for (const failure of failures) {
    output.error(`${failure.bundleId}: ${failure.reason}`);
  }
}
