/**
 * Media Sync Types
 * Local manifest, remote set/asset model and the API port the engine drives
 */

// ============================================================================
// Local side
// ============================================================================

export type AssetKind = 'screenshot' | 'preview';

export interface LocalAssetFile {
  path: string;
  fileName: string;
  fileSize: number;
  locale: string;
  displayType: string;         // Folder name, e.g. APP_IPHONE_67
  kind: AssetKind;
  position: number;            // 1-based within (locale, displayType, kind)
}

export interface AssetGroup {
  locale: string;
  displayType: string;
  screenshots: LocalAssetFile[];
  previews: LocalAssetFile[];
}

export type ScanWarningKind =
  | 'empty-root'
  | 'unknown-display-type'
  | 'unsupported-extension'
  | 'preview-not-supported';

export interface ScanWarning {
  kind: ScanWarningKind;
  message: string;
  locale?: string;
  displayType?: string;
  fileName?: string;
  fileCount?: number;          // Files inside a skipped display-type folder
}

export interface AssetManifest {
  root: string;
  groups: AssetGroup[];
  warnings: ScanWarning[];
  totalScreenshots: number;
  totalPreviews: number;
}

// ============================================================================
// Remote side
// ============================================================================

export type AssetDeliveryState =
  | 'AWAITING_UPLOAD'
  | 'UPLOAD_COMPLETE'
  | 'COMPLETE'
  | 'FAILED';

export type DeliveryDescriptor =
  | { type: 'image'; templateUrl: string; width: number; height: number }
  | { type: 'video'; url: string };

export interface RemoteAsset {
  id: string;
  kind: AssetKind;
  fileName?: string;
  fileSize?: number;
  checksum?: string;
  state: AssetDeliveryState;
  errors: string[];
  delivery?: DeliveryDescriptor;
}

export interface SetKey {
  locale: string;
  displayType: string;
  kind: AssetKind;
}

export interface RemoteAssetSet extends SetKey {
  id: string;
  items: RemoteAsset[];
}

export interface UploadOperation {
  method: string;
  url: string;
  offset: number;
  length: number;
  requestHeaders: Record<string, string>;
}

export interface ReserveRequest {
  fileName: string;
  fileSize: number;
  mimeType?: string;
}

export interface ReservedAsset {
  id: string;
  uploadOperations: UploadOperation[];
}

/**
 * Remote operations the engine consumes. `@shipkit/deployment` implements this
 * against App Store Connect; tests use the in-memory double.
 */
export interface MediaApi {
  listSets(versionId: string): Promise<RemoteAssetSet[]>;
  createSet(versionId: string, key: SetKey): Promise<string>;
  reserveAsset(kind: AssetKind, setId: string, request: ReserveRequest): Promise<ReservedAsset>;
  putChunk(operation: UploadOperation, bytes: Buffer): Promise<void>;
  commitAsset(kind: AssetKind, assetId: string, checksum: string, uploaded: boolean): Promise<RemoteAsset>;
  getAsset(kind: AssetKind, assetId: string): Promise<RemoteAsset>;
  deleteAsset(kind: AssetKind, assetId: string): Promise<void>;
  reorderSet(kind: AssetKind, setId: string, orderedAssetIds: string[]): Promise<void>;
  fetchBytes(url: string): Promise<Buffer>;
}

// ============================================================================
// Results
// ============================================================================

export interface SyncOptions {
  chunkConcurrency?: number;   // Parallel byte-range transfers per asset (default: 4)
  chunkRetries?: number;       // Retries per byte-range transfer after the first attempt (default: 3)
  retryDelayMs?: number;       // Base backoff between attempts (default: 1000)
}

export interface ItemFailure {
  locale: string;
  displayType: string;
  kind: AssetKind;
  fileName: string;
  code: string;
  message: string;
}

export interface UploadedAsset {
  setId: string;
  file: LocalAssetFile;
  asset: RemoteAsset;
}

export interface SyncSummary {
  succeeded: number;
  failed: number;
  skipped: number;
  warnings: ScanWarning[];
  failures: ItemFailure[];
  uploaded: UploadedAsset[];
}

export interface MediaProgress {
  step: 'scan' | 'delete' | 'upload' | 'reorder' | 'download' | 'repair';
  message: string;
  key?: SetKey;
}

export type MediaProgressCallback = (progress: MediaProgress) => void;
