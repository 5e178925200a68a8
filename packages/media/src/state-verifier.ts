/**
 * State Verifier
 *
 * Read-only report of processing state for every asset of a version. No
 * staleness threshold is applied: anything not COMPLETE is surfaced and the
 * operator decides whether to repair it.
 */

import { plural } from '@shipkit/shared';
import { compareSetKeys } from './set-resolver.js';
import type { AssetDeliveryState, AssetKind, MediaApi, RemoteAssetSet } from './types.js';

export interface ItemStatus {
  assetId: string;
  position: number;            // 1-based remote position
  fileName: string;
  state: AssetDeliveryState;
  needsAttention: boolean;     // Anything not COMPLETE
}

export interface SetStatus {
  setId: string;
  locale: string;
  displayType: string;
  kind: AssetKind;
  compact: boolean;            // Every item COMPLETE
  items: ItemStatus[];
  allIds: string[];            // Remote order at verify time
}

export interface VerifyReport {
  versionId: string;
  sets: SetStatus[];
  total: number;
  complete: number;
  stuck: number;               // AWAITING_UPLOAD or UPLOAD_COMPLETE
  failed: number;              // FAILED
}

export function buildReport(versionId: string, sets: RemoteAssetSet[]): VerifyReport {
  const statuses: SetStatus[] = [];
  let total = 0;
  let complete = 0;
  let stuck = 0;
  let failed = 0;

  for (const set of sets) {
    if (set.items.length === 0) continue;

    const items = set.items.map<ItemStatus>((asset, i) => ({
      assetId: asset.id,
      position: i + 1,
      fileName: asset.fileName ?? 'unknown',
      state: asset.state,
      needsAttention: asset.state !== 'COMPLETE',
    }));

    for (const item of items) {
      total++;
      if (item.state === 'COMPLETE') complete++;
      else if (item.state === 'FAILED') failed++;
      else stuck++;
    }

    statuses.push({
      setId: set.id,
      locale: set.locale,
      displayType: set.displayType,
      kind: set.kind,
      compact: items.every((item) => !item.needsAttention),
      items,
      allIds: set.items.map((asset) => asset.id),
    });
  }

  statuses.sort(compareSetKeys);
  return { versionId, sets: statuses, total, complete, stuck, failed };
}

/**
 * Fetch current state and classify it. Only `listSets` is called.
 */
export async function verifyVersion(api: MediaApi, versionId: string): Promise<VerifyReport> {
  return buildReport(versionId, await api.listSets(versionId));
}

export function needsRepair(report: VerifyReport): boolean {
  return report.sets.some((set) => !set.compact);
}

/**
 * Compact line per all-complete set, item lines for everything else
 */
export function formatReport(report: VerifyReport): string[] {
  const lines: string[] = [];

  for (const set of report.sets) {
    const label = `[${set.locale}] ${set.displayType} (${set.kind})`;
    if (set.compact) {
      lines.push(`${label}: ${set.items.length}/${set.items.length} complete`);
      continue;
    }

    lines.push(`${label}:`);
    for (const item of set.items) {
      const marker = item.needsAttention ? item.state : 'complete';
      lines.push(`  #${item.position}  ${item.fileName}    ${marker}`);
    }
  }

  return lines;
}

export function summarizeReport(report: VerifyReport): string {
  if (report.total === 0) {
    return 'No media found for this version.';
  }
  const attention = report.total - report.complete;
  if (attention === 0) {
    return `All ${plural(report.total, 'media item')} complete.`;
  }
  return `${report.complete} of ${report.total} complete, ${report.stuck} stuck, ${report.failed} failed.`;
}
