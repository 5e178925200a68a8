/**
 * Upload Pipeline
 *
 * Reserve → transfer byte ranges to presigned URLs → commit with the MD5 of the
 * whole file. Transfers for one asset may run in parallel; commit waits for all
 * of them.
 */

import fs from 'fs-extra';
import path from 'path';
import { createHash } from 'crypto';
import { Logger, errorMessage, retry, silentLogger } from '@shipkit/shared';
import {
  IntegrityError,
  ReserveError,
  TransportError,
  isRetryable,
} from './errors.js';
import type {
  AssetKind,
  LocalAssetFile,
  MediaApi,
  RemoteAsset,
  ReservedAsset,
  SyncOptions,
  UploadOperation,
} from './types.js';

export interface UploadOptions extends SyncOptions {
  logger?: Logger;
}

// Presigned URLs answer 403 once their validity window has passed
const EXPIRED_URL_STATUS = 403;

/**
 * MD5 of a file as lowercase hex, streamed
 */
export function md5File(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash('md5');
    fs.createReadStream(filePath)
      .on('data', (chunk) => hash.update(chunk))
      .on('error', reject)
      .on('end', () => resolve(hash.digest('hex')));
  });
}

export function mimeTypeFor(fileName: string): string | undefined {
  switch (path.extname(fileName).toLowerCase()) {
    case '.mp4':
      return 'video/mp4';
    case '.mov':
      return 'video/quicktime';
    default:
      return undefined;
  }
}

/**
 * Read `[offset, offset + length)` from a file
 */
export async function readRange(filePath: string, offset: number, length: number): Promise<Buffer> {
  const fd = await fs.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await fs.read(fd, buffer, 0, length, offset);
    return bytesRead === length ? buffer : buffer.subarray(0, bytesRead);
  } finally {
    await fs.close(fd);
  }
}

/**
 * Run `worker` over `items` with at most `limit` in flight. Stops handing out
 * new items after the first failure and rethrows it once in-flight work settles.
 */
async function runPool<T>(
  items: T[],
  limit: number,
  worker: (item: T) => Promise<void>
): Promise<void> {
  let next = 0;
  let failure: unknown;
  let failed = false;

  const runners = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
    while (!failed && next < items.length) {
      const item = items[next++];
      try {
        await worker(item);
      } catch (error) {
        if (!failed) {
          failed = true;
          failure = error;
        }
      }
    }
  });

  await Promise.all(runners);
  if (failed) throw failure;
}

async function transferChunks(
  api: MediaApi,
  file: LocalAssetFile,
  operations: UploadOperation[],
  options: Required<SyncOptions>,
  logger: Logger
): Promise<void> {
  await runPool(operations, options.chunkConcurrency, async (operation) => {
    const end = operation.offset + operation.length;
    const bytes = await readRange(file.path, operation.offset, operation.length);

    try {
      await retry(() => api.putChunk(operation, bytes), {
        retries: options.chunkRetries + 1,
        delay: options.retryDelayMs,
        shouldRetry: isRetryable,
        onRetry: (error, attempt) =>
          logger.debug(`${file.fileName} bytes ${operation.offset}-${end}: attempt ${attempt} failed (${error.message}), retrying`),
      });
    } catch (error) {
      const statusCode = error instanceof TransportError ? error.statusCode : undefined;
      throw new TransportError(
        `Chunk ${operation.offset}-${end} of '${file.fileName}' failed: ${errorMessage(error)}`,
        false,
        statusCode
      );
    }
  });
}

async function reserve(api: MediaApi, file: LocalAssetFile, setId: string): Promise<ReservedAsset> {
  let reserved: ReservedAsset;
  try {
    reserved = await api.reserveAsset(file.kind, setId, {
      fileName: file.fileName,
      fileSize: file.fileSize,
      mimeType: file.kind === 'preview' ? mimeTypeFor(file.fileName) : undefined,
    });
  } catch (error) {
    if (error instanceof ReserveError) throw error;
    const statusCode =
      error instanceof TransportError ? error.statusCode : undefined;
    throw new ReserveError(`Reserve failed for '${file.fileName}': ${errorMessage(error)}`, statusCode);
  }

  if (reserved.uploadOperations.length === 0) {
    await discard(api, file.kind, reserved.id, silentLogger);
    throw new ReserveError(`No upload operations returned by the API for '${file.fileName}'.`);
  }

  return reserved;
}

/**
 * Best-effort delete of a reservation that will never be committed
 */
async function discard(api: MediaApi, kind: AssetKind, assetId: string, logger: Logger): Promise<void> {
  try {
    await api.deleteAsset(kind, assetId);
  } catch (error) {
    logger.warn(`Could not remove abandoned reservation ${assetId}: ${errorMessage(error)}`);
  }
}

/**
 * Upload one local file into a set and return the committed asset
 */
export async function uploadAsset(
  api: MediaApi,
  file: LocalAssetFile,
  setId: string,
  options: UploadOptions = {}
): Promise<RemoteAsset> {
  const logger = options.logger ?? silentLogger;
  const settings: Required<SyncOptions> = {
    chunkConcurrency: options.chunkConcurrency ?? 4,
    chunkRetries: options.chunkRetries ?? 3,
    retryDelayMs: options.retryDelayMs ?? 1000,
  };

  // A second pass only happens when presigned URLs expired mid-transfer
  for (let pass = 1; ; pass++) {
    const reserved = await reserve(api, file, setId);
    logger.debug(`${file.fileName}: reserved ${reserved.id} (${reserved.uploadOperations.length} operations)`);

    try {
      await transferChunks(api, file, reserved.uploadOperations, settings, logger);

      const checksum = await md5File(file.path);
      try {
        return await api.commitAsset(file.kind, reserved.id, checksum, true);
      } catch (error) {
        if (error instanceof IntegrityError) {
          throw new IntegrityError(
            `Checksum rejected for '${file.path}': ${error.message}`,
            file.path
          );
        }
        throw error;
      }
    } catch (error) {
      await discard(api, file.kind, reserved.id, logger);

      const expired = error instanceof TransportError && error.statusCode === EXPIRED_URL_STATUS;
      if (expired && pass === 1) {
        logger.debug(`${file.fileName}: upload URLs expired, restarting from reserve`);
        continue;
      }
      throw error;
    }
  }
}
