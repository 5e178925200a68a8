/**
 * @shipkit/media
 *
 * Screenshot and app preview synchronization between a local folder tree and
 * App Store Connect asset sets.
 */

export { MediaSync } from './sync.js';
export type { MediaSyncConfig, UploadParams, DownloadParams } from './sync.js';

export { scanAssetFolder, classifyFile, filesOfKind, findGroup } from './asset-index.js';
export { isKnownDisplayType, previewTypeFor, displayTypeForPreview } from './display-types.js';
export { SetResolver, compareSetKeys, describeKey, sameKey } from './set-resolver.js';
export { uploadAsset, md5File, mimeTypeFor, readRange } from './upload-pipeline.js';
export type { UploadOptions } from './upload-pipeline.js';
export { resolveDeliveryUrl, downloadName, imageFormatFor, writeAssetFile } from './download-resolver.js';
export {
  buildReport,
  verifyVersion,
  formatReport,
  summarizeReport,
  needsRepair,
} from './state-verifier.js';
export type { VerifyReport, SetStatus, ItemStatus } from './state-verifier.js';
export { repairMedia, checkCardinality } from './repair-coordinator.js';
export type { RepairDeps } from './repair-coordinator.js';
export { ReorderCoordinator, desiredOrder, orderAfterRepair } from './reorder-coordinator.js';
export { waitForProcessing } from './poller.js';
export type { PollResult, PollOptions } from './poller.js';
export { formatCounts, describeFailure, describeUploadTotals, emptySummary, countSkipped } from './summary.js';

export {
  MEDIA_ERROR_CODES,
  TransportError,
  IntegrityError,
  ReserveError,
  CardinalityMismatchError,
  NotFoundError,
  isRetryable,
} from './errors.js';

export type * from './types.js';
