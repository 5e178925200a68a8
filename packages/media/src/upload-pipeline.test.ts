import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { IntegrityError, ReserveError, TransportError } from './errors.js';
import { InMemoryMediaApi, md5 } from './testing/in-memory-api.js';
import { makeMediaFolder, removeFolder } from './testing/fixtures.js';
import { md5File, mimeTypeFor, readRange, uploadAsset } from './upload-pipeline.js';
import type { LocalAssetFile, UploadOperation } from './types.js';

const KEY = { locale: 'en-US', displayType: 'APP_IPHONE_67', kind: 'screenshot' as const };
const CONTENT = 'hello world!';

class CorruptingApi extends InMemoryMediaApi {
  async putChunk(operation: UploadOperation, bytes: Buffer): Promise<void> {
    await super.putChunk(operation, Buffer.alloc(bytes.length));
  }
}

function localFile(root: string, fileName: string, fileSize: number): LocalAssetFile {
  return {
    path: path.join(root, 'en-US', 'APP_IPHONE_67', fileName),
    fileName,
    fileSize,
    locale: 'en-US',
    displayType: 'APP_IPHONE_67',
    kind: 'screenshot',
    position: 1,
  };
}

describe('upload pipeline helpers', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeMediaFolder({ 'en-US/APP_IPHONE_67/1.png': CONTENT });
  });

  afterEach(async () => {
    await removeFolder(root);
  });

  it('hashes a file as lowercase hex MD5', async () => {
    const file = localFile(root, '1.png', CONTENT.length);
    expect(await md5File(file.path)).toBe(md5(Buffer.from(CONTENT)));
  });

  it('reads byte ranges, short at the end of the file', async () => {
    const file = localFile(root, '1.png', CONTENT.length);
    expect((await readRange(file.path, 6, 5)).toString()).toBe('world');
    expect((await readRange(file.path, 8, 10)).toString()).toBe('rld!');
  });

  it('knows video mime types', () => {
    expect(mimeTypeFor('a.MP4')).toBe('video/mp4');
    expect(mimeTypeFor('a.mov')).toBe('video/quicktime');
    expect(mimeTypeFor('a.png')).toBeUndefined();
  });
});

describe('uploadAsset', () => {
  let root: string;
  let api: InMemoryMediaApi;
  let setId: string;
  let file: LocalAssetFile;

  beforeEach(async () => {
    root = await makeMediaFolder({ 'en-US/APP_IPHONE_67/1.png': CONTENT });
    api = new InMemoryMediaApi(4);
    setId = api.seedSet('v1', KEY).setId;
    file = localFile(root, '1.png', CONTENT.length);
  });

  afterEach(async () => {
    await removeFolder(root);
  });

  it('reserves, transfers every range and commits the checksum', async () => {
    const asset = await uploadAsset(api, file, setId, { retryDelayMs: 0 });

    expect(asset.state).toBe('UPLOAD_COMPLETE');
    expect(asset.checksum).toBe(md5(Buffer.from(CONTENT)));
    expect(api.bytesOf(asset.id).toString()).toBe(CONTENT);
    expect(api.callsTo('putChunk')).toHaveLength(3);
    expect(api.calls.map((c) => c.method).at(-1)).toBe('commitAsset');
    expect(api.order(setId)).toEqual([asset.id]);
  });

  it('retries a retryable range failure', async () => {
    api.failNext('putChunk', new TransportError('connection reset', true));

    const asset = await uploadAsset(api, file, setId, { retryDelayMs: 0, chunkConcurrency: 1 });

    expect(api.bytesOf(asset.id).toString()).toBe(CONTENT);
    expect(api.callsTo('putChunk')).toHaveLength(4);
  });

  it('stops on a non-retryable failure and removes the reservation', async () => {
    api.failNext('putChunk', new TransportError('denied', false, 400));

    await expect(
      uploadAsset(api, file, setId, { retryDelayMs: 0, chunkConcurrency: 1 })
    ).rejects.toThrow("Chunk 0-4 of '1.png' failed: denied");

    expect(api.callsTo('putChunk')).toHaveLength(1);
    expect(api.callsTo('deleteAsset')).toHaveLength(1);
    expect(api.callsTo('commitAsset')).toHaveLength(0);
    expect(api.order(setId)).toEqual([]);
  });

  it('gives up on a range after the configured retries', async () => {
    api.failNext('putChunk', new TransportError('timeout', true), 3);

    const error = await uploadAsset(api, file, setId, {
      retryDelayMs: 0,
      chunkRetries: 2,
      chunkConcurrency: 1,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(api.callsTo('putChunk')).toHaveLength(3);
    expect(api.order(setId)).toEqual([]);
  });

  it('makes a single attempt per range with no retries', async () => {
    const asset = await uploadAsset(api, file, setId, { retryDelayMs: 0, chunkRetries: 0 });

    expect(api.bytesOf(asset.id).toString()).toBe(CONTENT);
    expect(api.callsTo('putChunk')).toHaveLength(3);
  });

  it('fails a range on its first transient error with no retries', async () => {
    api.failNext('putChunk', new TransportError('unavailable', true, 503));

    await expect(
      uploadAsset(api, file, setId, { retryDelayMs: 0, chunkRetries: 0, chunkConcurrency: 1 })
    ).rejects.toThrow("Chunk 0-4 of '1.png' failed: unavailable");
    expect(api.callsTo('putChunk')).toHaveLength(1);
  });

  it('recovers from one transient error with a single retry', async () => {
    api.failNext('putChunk', new TransportError('unavailable', true, 503));

    const asset = await uploadAsset(api, file, setId, { retryDelayMs: 0, chunkRetries: 1, chunkConcurrency: 1 });

    expect(api.bytesOf(asset.id).toString()).toBe(CONTENT);
    expect(api.callsTo('putChunk')).toHaveLength(4);
  });

  it('restarts from reserve once when upload URLs have expired', async () => {
    api.failNext('putChunk', new TransportError('expired', false, 403));

    const asset = await uploadAsset(api, file, setId, { retryDelayMs: 0, chunkConcurrency: 1 });

    expect(api.callsTo('reserveAsset')).toHaveLength(2);
    expect(api.callsTo('deleteAsset')).toHaveLength(1);
    expect(api.order(setId)).toEqual([asset.id]);
    expect(api.bytesOf(asset.id).toString()).toBe(CONTENT);
  });

  it('does not restart a second time', async () => {
    api.failNext('putChunk', new TransportError('expired', false, 403), 2);

    await expect(
      uploadAsset(api, file, setId, { retryDelayMs: 0, chunkConcurrency: 1 })
    ).rejects.toBeInstanceOf(TransportError);

    expect(api.callsTo('reserveAsset')).toHaveLength(2);
    expect(api.order(setId)).toEqual([]);
  });

  it('reports a rejected checksum against the local file', async () => {
    const corrupting = new CorruptingApi(4);
    const corruptSet = corrupting.seedSet('v1', KEY).setId;

    const error = await uploadAsset(corrupting, file, corruptSet, { retryDelayMs: 0 }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(IntegrityError);
    if (!(error instanceof IntegrityError)) return;
    expect(error.filePath).toBe(file.path);
    expect(error.message.startsWith(`Checksum rejected for '${file.path}'`)).toBe(true);
    expect(corrupting.order(corruptSet)).toEqual([]);
  });

  it('wraps reserve failures', async () => {
    api.failNext('reserveAsset', new Error('boom'));

    await expect(uploadAsset(api, file, setId)).rejects.toThrow(
      new ReserveError("Reserve failed for '1.png': boom")
    );
    expect(api.callsTo('putChunk')).toHaveLength(0);
  });

  it('refuses a reservation without upload operations', async () => {
    const empty = localFile(root, 'empty.png', 0);

    await expect(uploadAsset(api, empty, setId)).rejects.toThrow(
      "No upload operations returned by the API for 'empty.png'."
    );
    expect(api.callsTo('deleteAsset')).toHaveLength(1);
    expect(api.order(setId)).toEqual([]);
  });
});
