/**
 * Retry/Repair Coordinator
 *
 * Replaces assets the verifier flagged with the local file at the same
 * position, then restores the set's order. Position is the correlation key,
 * so a group whose local and remote counts differ is refused outright.
 */

import { Logger, errorMessage, plural, silentLogger } from '@shipkit/shared';
import { filesOfKind, findGroup, scanAssetFolder } from './asset-index.js';
import { CardinalityMismatchError } from './errors.js';
import { ReorderCoordinator, orderAfterRepair } from './reorder-coordinator.js';
import { describeKey } from './set-resolver.js';
import type { SetStatus, VerifyReport } from './state-verifier.js';
import { emptySummary, recordFailure } from './summary.js';
import { uploadAsset } from './upload-pipeline.js';
import type { MediaApi, MediaProgressCallback, SyncOptions, SyncSummary } from './types.js';

export interface RepairDeps {
  api: MediaApi;
  logger?: Logger;
  options?: SyncOptions;
  reorderer?: ReorderCoordinator;
  onProgress?: MediaProgressCallback;
}

/**
 * Refuse to proceed when positions cannot be trusted
 */
export function checkCardinality(set: SetStatus, localCount: number): void {
  if (localCount !== set.items.length) {
    throw new CardinalityMismatchError(
      `${describeKey(set)}: ${plural(localCount, 'local file')} but ${plural(set.items.length, 'remote item')}. ` +
        `Refusing to match stuck items by position.`,
      localCount,
      set.items.length
    );
  }
}

export async function repairMedia(
  report: VerifyReport,
  root: string,
  deps: RepairDeps
): Promise<SyncSummary> {
  const logger = deps.logger ?? silentLogger;
  const reorderer = deps.reorderer ?? new ReorderCoordinator(deps.api, logger);
  const manifest = await scanAssetFolder(root);
  const summary = emptySummary();

  for (const set of report.sets) {
    if (set.compact) continue;

    const flagged = set.items.filter((item) => item.needsAttention);
    const group = findGroup(manifest, set.locale, set.displayType);
    const files = group ? filesOfKind(group, set.kind) : [];

    try {
      checkCardinality(set, files.length);
    } catch (error) {
      logger.error(errorMessage(error));
      for (const item of flagged) {
        recordFailure(summary, set, item.fileName, error);
      }
      continue;
    }

    const replacements = new Map<string, string>();
    const removed = new Set<string>();

    for (const item of flagged) {
      const file = files[item.position - 1];
      deps.onProgress?.({
        step: 'repair',
        key: set,
        message: `#${item.position} ${item.fileName} → ${file.fileName}`,
      });

      try {
        await deps.api.deleteAsset(set.kind, item.assetId);
      } catch (error) {
        // Nothing changed remotely; the item stays as it was
        recordFailure(summary, set, item.fileName, error);
        continue;
      }

      try {
        const asset = await uploadAsset(deps.api, file, set.setId, { ...deps.options, logger });
        replacements.set(item.assetId, asset.id);
        summary.uploaded.push({ setId: set.setId, file, asset });
        summary.succeeded++;
      } catch (error) {
        removed.add(item.assetId);
        recordFailure(summary, set, file.fileName, error);
      }
    }

    if (replacements.size === 0 && removed.size === 0) continue;

    const order = orderAfterRepair(set.allIds, replacements).filter((id) => !removed.has(id));
    deps.onProgress?.({ step: 'reorder', key: set, message: `Restoring order of ${plural(order.length, 'item')}` });

    try {
      await reorderer.reorder(set.kind, set.setId, order);
    } catch (error) {
      recordFailure(summary, set, '(reorder)', error);
    }
  }

  return summary;
}
