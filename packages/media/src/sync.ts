/**
 * Media Sync
 * Orchestrates upload, download, verify and repair for one app version
 */

import { Logger, errorMessage, plural, silentLogger } from '@shipkit/shared';
import { filesOfKind, scanAssetFolder } from './asset-index.js';
import { downloadName, resolveDeliveryUrl, writeAssetFile } from './download-resolver.js';
import { NotFoundError } from './errors.js';
import { waitForProcessing, type PollResult } from './poller.js';
import { repairMedia } from './repair-coordinator.js';
import { ReorderCoordinator, desiredOrder } from './reorder-coordinator.js';
import { SetResolver, compareSetKeys, describeKey } from './set-resolver.js';
import { verifyVersion, type VerifyReport } from './state-verifier.js';
import { emptySummary, recordFailure } from './summary.js';
import { uploadAsset } from './upload-pipeline.js';
import type {
  AssetKind,
  AssetManifest,
  LocalAssetFile,
  MediaApi,
  MediaProgressCallback,
  RemoteAssetSet,
  SetKey,
  SyncOptions,
  SyncSummary,
  UploadedAsset,
} from './types.js';

export interface MediaSyncConfig {
  api: MediaApi;
  logger?: Logger;
  options?: SyncOptions;
  onProgress?: MediaProgressCallback;
}

export interface UploadParams {
  root: string;
  versionId: string;
  replace?: boolean;
  // Already-scanned manifest, so a caller that showed a plan uploads the same files
  manifest?: AssetManifest;
}

export interface DownloadParams {
  root: string;
  versionId: string;
}

const KINDS: AssetKind[] = ['screenshot', 'preview'];

export class MediaSync {
  private api: MediaApi;
  private logger: Logger;
  private options: SyncOptions;
  private onProgress?: MediaProgressCallback;
  private reorderer: ReorderCoordinator;

  constructor(config: MediaSyncConfig) {
    this.api = config.api;
    this.logger = config.logger ?? silentLogger;
    this.options = config.options ?? {};
    this.onProgress = config.onProgress;
    this.reorderer = new ReorderCoordinator(this.api, this.logger);
  }

  // ============================================================================
  // Upload
  // ============================================================================

  /**
   * Upload every file under `root` into the version's sets, then push local
   * order to each set that changed
   */
  async upload(params: UploadParams): Promise<SyncSummary> {
    const manifest = params.manifest ?? (await scanAssetFolder(params.root));
    const summary = emptySummary(manifest.warnings);

    if (manifest.groups.length === 0) {
      return summary;
    }

    const resolver = new SetResolver(this.api, params.versionId, this.logger);
    const sets = await resolver.list();

    for (const group of manifest.groups) {
      for (const kind of KINDS) {
        const files = filesOfKind(group, kind);
        if (files.length === 0) continue;

        const key: SetKey = { locale: group.locale, displayType: group.displayType, kind };
        await this.uploadGroup(key, files, sets, resolver, params.replace ?? false, summary);
      }
    }

    return summary;
  }

  private async uploadGroup(
    key: SetKey,
    files: LocalAssetFile[],
    sets: RemoteAssetSet[],
    resolver: SetResolver,
    replace: boolean,
    summary: SyncSummary
  ): Promise<void> {
    let set: RemoteAssetSet;
    try {
      const resolved = await resolver.resolve(key, sets);
      set = resolved.set;
      if (resolved.created) sets.push(set);
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.logger.warn(`${describeKey(key)} skipped: ${error.message}`);
        summary.skipped += files.length;
        return;
      }
      for (const file of files) recordFailure(summary, key, file.fileName, error);
      return;
    }

    let existingIds = set.items.map((item) => item.id);
    let mutated = false;

    if (replace && existingIds.length > 0) {
      this.onProgress?.({ step: 'delete', key, message: `Deleting ${plural(existingIds.length, 'existing item')}` });
      try {
        for (const id of existingIds) {
          await this.api.deleteAsset(key.kind, id);
          mutated = true;
        }
      } catch (error) {
        this.logger.error(`${describeKey(key)} replace aborted: ${errorMessage(error)}`);
        for (const file of files) recordFailure(summary, key, file.fileName, error);
        return;
      }
      existingIds = [];
    }

    const uploaded: UploadedAsset[] = [];
    for (const [i, file] of files.entries()) {
      this.onProgress?.({ step: 'upload', key, message: `${i + 1}/${files.length}: ${file.fileName}` });
      try {
        const asset = await uploadAsset(this.api, file, set.id, { ...this.options, logger: this.logger });
        uploaded.push({ setId: set.id, file, asset });
        summary.succeeded++;
      } catch (error) {
        this.logger.error(`${file.fileName}: ${errorMessage(error)}`);
        recordFailure(summary, key, file.fileName, error);
      }
    }
    summary.uploaded.push(...uploaded);

    if (uploaded.length === 0 && !mutated) return;

    const order = desiredOrder(existingIds, uploaded.map((u) => u.asset.id));
    this.onProgress?.({ step: 'reorder', key, message: `Ordering ${plural(order.length, 'item')}` });
    try {
      await this.reorderer.reorder(key.kind, set.id, order);
    } catch (error) {
      recordFailure(summary, key, '(reorder)', error);
    }
  }

  /**
   * Poll uploaded assets until the server finishes processing them
   */
  async waitForUploads(
    uploaded: UploadedAsset[],
    options: { intervalMs: number; timeoutMs: number }
  ): Promise<Array<{ upload: UploadedAsset; result: PollResult }>> {
    const results: Array<{ upload: UploadedAsset; result: PollResult }> = [];
    const deadline = Date.now() + options.timeoutMs;

    for (const upload of uploaded) {
      const result = await waitForProcessing(
        () => this.api.getAsset(upload.asset.kind, upload.asset.id),
        { intervalMs: options.intervalMs, timeoutMs: Math.max(0, deadline - Date.now()) }
      );
      results.push({ upload, result });
    }

    return results;
  }

  // ============================================================================
  // Download
  // ============================================================================

  async download(params: DownloadParams): Promise<SyncSummary> {
    const summary = emptySummary();
    const sets = [...(await this.api.listSets(params.versionId))].sort(compareSetKeys);

    for (const set of sets) {
      for (const [i, asset] of set.items.entries()) {
        const fileName = downloadName(i + 1, asset);
        this.onProgress?.({ step: 'download', key: set, message: `${i + 1}/${set.items.length}: ${fileName}` });

        try {
          const url = resolveDeliveryUrl(asset);
          const bytes = await this.api.fetchBytes(url);
          await writeAssetFile(params.root, set.locale, set.displayType, fileName, bytes);
          summary.succeeded++;
        } catch (error) {
          this.logger.error(`${fileName}: ${errorMessage(error)}`);
          recordFailure(summary, set, fileName, error);
        }
      }
    }

    return summary;
  }

  // ============================================================================
  // Verify / Repair
  // ============================================================================

  /**
   * Read-only
   */
  verify(versionId: string): Promise<VerifyReport> {
    return verifyVersion(this.api, versionId);
  }

  repair(report: VerifyReport, root: string): Promise<SyncSummary> {
    return repairMedia(report, root, {
      api: this.api,
      logger: this.logger,
      options: this.options,
      reorderer: this.reorderer,
      onProgress: this.onProgress,
    });
  }
}
