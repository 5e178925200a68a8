/**
 * App Store Connect Service Types
 */

import type { AxiosAdapter } from 'axios';
import type { Logger } from '@shipkit/shared';

// ============================================================================
// Credentials
// ============================================================================

export interface ASCCredentials {
  issuerId: string;
  keyId: string;
  privateKey: string;          // PEM contents of the .p8 key
}

export interface ASCServiceOptions {
  logger?: Logger;
  baseUrl?: string;            // Default: https://api.appstoreconnect.apple.com/v1
  pageLimit?: number;          // Default: 50
  adapter?: AxiosAdapter;      // Replaces the HTTP transport for API and transfer calls
}

// ============================================================================
// App Store Connect Types
// ============================================================================

export interface ASCLocalization {
  id: string;
  locale: string;
}

export type ASCAssetType = 'appScreenshots' | 'appPreviews';
export type ASCSetType = 'appScreenshotSets' | 'appPreviewSets';

/**
 * JSON:API resource names for each media kind
 */
export interface ASCResourceNames {
  asset: ASCAssetType;
  set: ASCSetType;
  setRelationship: 'appScreenshotSet' | 'appPreviewSet';
}
