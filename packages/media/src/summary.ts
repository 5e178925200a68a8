import { errorMessage, plural } from '@shipkit/shared';
import { errorCode } from './errors.js';
import type { ItemFailure, ScanWarning, SetKey, SyncSummary } from './types.js';

/**
 * Files the scan left out: one per skipped file, and every file inside a
 * skipped display-type folder
 */
export function countSkipped(warnings: ScanWarning[]): number {
  return warnings.reduce((count, warning) => {
    if (warning.kind === 'empty-root') return count;
    return count + (warning.fileCount ?? 1);
  }, 0);
}

export function emptySummary(warnings: ScanWarning[] = []): SyncSummary {
  return {
    succeeded: 0,
    failed: 0,
    skipped: countSkipped(warnings),
    warnings,
    failures: [],
    uploaded: [],
  };
}

export function recordFailure(
  summary: SyncSummary,
  key: SetKey,
  fileName: string,
  error: unknown
): ItemFailure {
  const failure: ItemFailure = {
    locale: key.locale,
    displayType: key.displayType,
    kind: key.kind,
    fileName,
    code: errorCode(error),
    message: errorMessage(error),
  };
  summary.failures.push(failure);
  summary.failed++;
  return failure;
}

export function formatCounts(summary: SyncSummary): string {
  return `${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.skipped} skipped`;
}

export function describeFailure(failure: ItemFailure): string {
  return `[${failure.locale}] ${failure.displayType} ${failure.fileName}: ${failure.message}`;
}

export function describeUploadTotals(screenshots: number, previews: number): string {
  return `${plural(screenshots, 'screenshot')} and ${plural(previews, 'preview')}`;
}
