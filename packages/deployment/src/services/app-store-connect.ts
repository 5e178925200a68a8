/**
 * App Store Connect Service
 * Media endpoints of the App Store Connect API behind the MediaApi port
 */

import jwt from 'jsonwebtoken';
import axios, { AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import { APIError, Logger, ValidationError, silentLogger } from '@shipkit/shared';
import {
  IntegrityError,
  NotFoundError,
  TransportError,
  displayTypeForPreview,
  previewTypeFor,
} from '@shipkit/media';
import type {
  AssetKind,
  MediaApi,
  RemoteAsset,
  RemoteAssetSet,
  ReserveRequest,
  ReservedAsset,
  SetKey,
  UploadOperation,
} from '@shipkit/media';
import {
  AssetDocumentSchema,
  AssetListSchema,
  ErrorDocumentSchema,
  LocalizationListSchema,
  PreviewSetListSchema,
  ScreenshotSetListSchema,
  SetDocumentSchema,
  type AssetResource,
  type Page,
} from './resources.js';
import type {
  ASCCredentials,
  ASCLocalization,
  ASCResourceNames,
  ASCServiceOptions,
} from './types.js';

interface ASCAuthToken {
  token: string;
  expiresAt: Date;
}

const RESOURCES: Record<AssetKind, ASCResourceNames> = {
  screenshot: { asset: 'appScreenshots', set: 'appScreenshotSets', setRelationship: 'appScreenshotSet' },
  preview: { asset: 'appPreviews', set: 'appPreviewSets', setRelationship: 'appPreviewSet' },
};

/**
 * Statuses worth another attempt on a transfer
 */
function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Message from a JSON:API error body, falling back to the transport message
 */
function describeApiError(body: unknown, fallback: string): string {
  const parsed = ErrorDocumentSchema.safeParse(body);
  if (!parsed.success) return fallback;

  const details = parsed.data.errors
    .map((e) => e.detail ?? e.title ?? '')
    .filter((text) => text.length > 0);
  return details.join('\n') || fallback;
}

/**
 * Map a failed App Store Connect API call onto the engine's error types
 */
function toApiError(error: unknown, context: string): Error {
  if (!axios.isAxiosError(error)) {
    return error instanceof Error ? error : new Error(String(error));
  }

  const response = error.response;
  if (!response) {
    return new TransportError(`${context}: ${error.message}`, true);
  }

  const message = describeApiError(response.data, error.message);
  if (response.status === 404) {
    return new NotFoundError(`${context}: ${message}`);
  }
  if (isTransientStatus(response.status)) {
    return new TransportError(`${context}: ${message}`, true, response.status);
  }
  return new APIError(`${context}: ${message}`, response.status, { detail: message });
}

/**
 * Map a failed presigned transfer or delivery download
 */
function toTransferError(error: unknown, context: string): Error {
  if (!axios.isAxiosError(error)) {
    return error instanceof Error ? error : new Error(String(error));
  }

  const status = error.response?.status;
  if (status === undefined) {
    return new TransportError(`${context}: ${error.message}`, true);
  }
  return new TransportError(`${context}: HTTP ${status}`, isTransientStatus(status), status);
}

function toRemoteAsset(kind: AssetKind, resource: AssetResource): RemoteAsset {
  const attrs = resource.attributes;
  const deliveryState = attrs.assetDeliveryState;

  const asset: RemoteAsset = {
    id: resource.id,
    kind,
    fileName: attrs.fileName ?? undefined,
    fileSize: attrs.fileSize ?? undefined,
    checksum: attrs.sourceFileChecksum ?? undefined,
    state: deliveryState?.state ?? 'AWAITING_UPLOAD',
    errors: (deliveryState?.errors ?? []).map((e) => e.description ?? e.code ?? 'Unknown processing error'),
  };

  if (kind === 'screenshot' && attrs.imageAsset) {
    asset.delivery = { type: 'image', ...attrs.imageAsset };
  } else if (kind === 'preview' && attrs.videoUrl) {
    asset.delivery = { type: 'video', url: attrs.videoUrl };
  }

  return asset;
}

export class AppStoreConnectService implements MediaApi {
  private credentials: ASCCredentials;
  private client: AxiosInstance;
  private transfer: AxiosInstance;
  private logger: Logger;
  private pageLimit: number;
  private currentToken?: ASCAuthToken;

  constructor(credentials: ASCCredentials, options: ASCServiceOptions = {}) {
    this.credentials = credentials;
    this.logger = options.logger ?? silentLogger;
    this.pageLimit = options.pageLimit ?? 50;

    const adapter = options.adapter ? { adapter: options.adapter } : {};

    this.client = axios.create({
      baseURL: options.baseUrl ?? 'https://api.appstoreconnect.apple.com/v1',
      headers: {
        'Content-Type': 'application/json',
      },
      ...adapter,
    });

    // Presigned upload and delivery URLs carry their own authorization
    this.transfer = axios.create({ maxBodyLength: Infinity, ...adapter });

    // Add request interceptor to add auth token
    this.client.interceptors.request.use((config: InternalAxiosRequestConfig) => {
      config.headers.Authorization = `Bearer ${this.getAuthToken()}`;
      this.logger.debug(`${(config.method ?? 'get').toUpperCase()} ${config.url ?? ''}`);
      return config;
    });
  }

  // ============================================================================
  // Authentication
  // ============================================================================

  /**
   * Generate JWT token for App Store Connect API
   */
  private getAuthToken(): string {
    // Reuse the current token until a minute before it expires
    if (this.currentToken && this.currentToken.expiresAt.getTime() - 60_000 > Date.now()) {
      return this.currentToken.token;
    }

    const now = Math.floor(Date.now() / 1000);
    const expiresIn = 20 * 60; // 20 minutes

    const payload = {
      iss: this.credentials.issuerId,
      iat: now,
      exp: now + expiresIn,
      aud: 'appstoreconnect-v1',
    };

    const token = jwt.sign(payload, this.credentials.privateKey, {
      algorithm: 'ES256',
      keyid: this.credentials.keyId,
    });

    this.currentToken = {
      token,
      expiresAt: new Date((now + expiresIn) * 1000),
    };

    return token;
  }

  // ============================================================================
  // Requests
  // ============================================================================

  private async get(path: string, context: string, params?: Record<string, string | number>): Promise<unknown> {
    try {
      const response = await this.client.get<unknown>(path, { params });
      return response.data;
    } catch (error) {
      throw toApiError(error, context);
    }
  }

  /**
   * Every item of a list endpoint, following `links.next`
   */
  private async getAll<T>(
    path: string,
    context: string,
    parse: (body: unknown) => Page<T>
  ): Promise<T[]> {
    const items: T[] = [];
    let next: string | null | undefined = path;
    let params: Record<string, number> | undefined = { limit: this.pageLimit };

    while (next) {
      const page: Page<T> = parse(await this.get(next, context, params));
      items.push(...page.data);
      next = page.links?.next;
      params = undefined; // `next` already carries the query
    }

    return items;
  }

  private async send(
    method: 'post' | 'patch' | 'delete',
    path: string,
    context: string,
    body?: unknown
  ): Promise<unknown> {
    try {
      const response = await this.client.request<unknown>({ method, url: path, data: body });
      return response.data;
    } catch (error) {
      throw toApiError(error, context);
    }
  }

  // ============================================================================
  // Localizations and Sets
  // ============================================================================

  async getVersionLocalizations(versionId: string): Promise<ASCLocalization[]> {
    const resources = await this.getAll(
      `/appStoreVersions/${versionId}/appStoreVersionLocalizations`,
      `Failed to get localizations for version ${versionId}`,
      (body) => LocalizationListSchema.parse(body)
    );
    return resources.map((loc) => ({ id: loc.id, locale: loc.attributes.locale }));
  }

  /**
   * Every set of the version with its items. A set or localization that
   * disappears while it is being listed is logged and left out.
   */
  async listSets(versionId: string): Promise<RemoteAssetSet[]> {
    const sets: RemoteAssetSet[] = [];

    for (const localization of await this.getVersionLocalizations(versionId)) {
      const screenshotSets = await this.skipIfGone(`Screenshot sets of ${localization.locale}`, () =>
        this.getAll(
          `/appStoreVersionLocalizations/${localization.id}/appScreenshotSets`,
          `Failed to get screenshot sets for ${localization.locale}`,
          (body) => ScreenshotSetListSchema.parse(body)
        )
      );
      for (const set of screenshotSets ?? []) {
        const items = await this.skipIfGone(`Screenshot set ${set.id}`, () => this.listAssets('screenshot', set.id));
        if (!items) continue;
        sets.push({
          id: set.id,
          locale: localization.locale,
          displayType: set.attributes.screenshotDisplayType,
          kind: 'screenshot',
          items,
        });
      }

      const previewSets = await this.skipIfGone(`Preview sets of ${localization.locale}`, () =>
        this.getAll(
          `/appStoreVersionLocalizations/${localization.id}/appPreviewSets`,
          `Failed to get preview sets for ${localization.locale}`,
          (body) => PreviewSetListSchema.parse(body)
        )
      );
      for (const set of previewSets ?? []) {
        const items = await this.skipIfGone(`Preview set ${set.id}`, () => this.listAssets('preview', set.id));
        if (!items) continue;
        sets.push({
          id: set.id,
          locale: localization.locale,
          displayType: displayTypeForPreview(set.attributes.previewType),
          kind: 'preview',
          items,
        });
      }
    }

    return sets;
  }

  private async skipIfGone<T>(what: string, load: () => Promise<T>): Promise<T | null> {
    try {
      return await load();
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.logger.warn(`${what} not found, skipping: ${error.message}`);
        return null;
      }
      throw error;
    }
  }

  private async listAssets(kind: AssetKind, setId: string): Promise<RemoteAsset[]> {
    const names = RESOURCES[kind];
    const resources = await this.getAll(
      `/${names.set}/${setId}/${names.asset}`,
      `Failed to get items of set ${setId}`,
      (body) => AssetListSchema.parse(body)
    );
    return resources.map((resource) => toRemoteAsset(kind, resource));
  }

  async createSet(versionId: string, key: SetKey): Promise<string> {
    const localization = (await this.getVersionLocalizations(versionId)).find(
      (loc) => loc.locale === key.locale
    );
    if (!localization) {
      throw new NotFoundError(`No localization '${key.locale}' on version ${versionId}.`, key.locale);
    }

    const names = RESOURCES[key.kind];
    let attributes: Record<string, string>;
    if (key.kind === 'screenshot') {
      attributes = { screenshotDisplayType: key.displayType };
    } else {
      const previewType = previewTypeFor(key.displayType);
      if (!previewType) {
        throw new ValidationError(`Display type ${key.displayType} has no app previews.`);
      }
      attributes = { previewType };
    }

    const body = await this.send('post', `/${names.set}`, `Failed to create set for ${key.displayType}`, {
      data: {
        type: names.set,
        attributes,
        relationships: {
          appStoreVersionLocalization: {
            data: { type: 'appStoreVersionLocalizations', id: localization.id },
          },
        },
      },
    });

    return SetDocumentSchema.parse(body).data.id;
  }

  // ============================================================================
  // Assets
  // ============================================================================

  async reserveAsset(kind: AssetKind, setId: string, request: ReserveRequest): Promise<ReservedAsset> {
    const names = RESOURCES[kind];
    const attributes: Record<string, string | number> = {
      fileName: request.fileName,
      fileSize: request.fileSize,
    };
    if (request.mimeType) attributes.mimeType = request.mimeType;

    const body = await this.send('post', `/${names.asset}`, `Failed to reserve '${request.fileName}'`, {
      data: {
        type: names.asset,
        attributes,
        relationships: {
          [names.setRelationship]: { data: { type: names.set, id: setId } },
        },
      },
    });

    const resource = AssetDocumentSchema.parse(body).data;
    const uploadOperations: UploadOperation[] = (resource.attributes.uploadOperations ?? []).map((op) => ({
      method: op.method,
      url: op.url,
      offset: op.offset,
      length: op.length,
      requestHeaders: Object.fromEntries((op.requestHeaders ?? []).map((h) => [h.name, h.value])),
    }));

    return { id: resource.id, uploadOperations };
  }

  async putChunk(operation: UploadOperation, bytes: Buffer): Promise<void> {
    try {
      await this.transfer.request({
        method: operation.method,
        url: operation.url,
        data: bytes,
        headers: operation.requestHeaders,
      });
    } catch (error) {
      throw toTransferError(error, `Upload of bytes ${operation.offset}-${operation.offset + operation.length} failed`);
    }
  }

  async commitAsset(kind: AssetKind, assetId: string, checksum: string, uploaded: boolean): Promise<RemoteAsset> {
    const names = RESOURCES[kind];
    let body: unknown;
    try {
      body = await this.send('patch', `/${names.asset}/${assetId}`, `Failed to commit ${assetId}`, {
        data: {
          type: names.asset,
          id: assetId,
          attributes: { uploaded, sourceFileChecksum: checksum },
        },
      });
    } catch (error) {
      if (error instanceof APIError && error.statusCode === 409 && /checksum/i.test(error.message)) {
        throw new IntegrityError(error.message);
      }
      throw error;
    }

    return toRemoteAsset(kind, AssetDocumentSchema.parse(body).data);
  }

  async getAsset(kind: AssetKind, assetId: string): Promise<RemoteAsset> {
    const names = RESOURCES[kind];
    const body = await this.get(`/${names.asset}/${assetId}`, `Failed to get ${assetId}`);
    return toRemoteAsset(kind, AssetDocumentSchema.parse(body).data);
  }

  async deleteAsset(kind: AssetKind, assetId: string): Promise<void> {
    await this.send('delete', `/${RESOURCES[kind].asset}/${assetId}`, `Failed to delete ${assetId}`);
  }

  async reorderSet(kind: AssetKind, setId: string, orderedAssetIds: string[]): Promise<void> {
    const names = RESOURCES[kind];
    await this.send(
      'patch',
      `/${names.set}/${setId}/relationships/${names.asset}`,
      `Failed to reorder set ${setId}`,
      { data: orderedAssetIds.map((id) => ({ type: names.asset, id })) }
    );
  }

  async fetchBytes(url: string): Promise<Buffer> {
    try {
      const response = await this.transfer.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
      return Buffer.from(response.data);
    } catch (error) {
      throw toTransferError(error, `Download failed`);
    }
  }
}
