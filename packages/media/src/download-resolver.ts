/**
 * Download Resolver
 * Turns remote delivery descriptors into files under `<root>/<locale>/<displayType>/`
 */

import fs from 'fs-extra';
import path from 'path';
import { NotFoundError } from './errors.js';
import type { RemoteAsset } from './types.js';

/**
 * Image format placeholder value for a source file name
 */
export function imageFormatFor(fileName: string | undefined): 'jpg' | 'png' {
  const ext = path.extname(fileName ?? '').toLowerCase();
  return ext === '.jpg' || ext === '.jpeg' ? 'jpg' : 'png';
}

/**
 * Concrete URL for an asset. Image templates carry `{w}`, `{h}` and `{f}`
 * placeholders; video URLs are used as is.
 */
export function resolveDeliveryUrl(asset: RemoteAsset): string {
  const delivery = asset.delivery;
  if (!delivery) {
    throw new NotFoundError(
      `No download URL available for '${asset.fileName ?? asset.id}'.`,
      asset.id
    );
  }

  if (delivery.type === 'video') {
    return delivery.url;
  }

  return delivery.templateUrl
    .replaceAll('{w}', String(delivery.width))
    .replaceAll('{h}', String(delivery.height))
    .replaceAll('{f}', imageFormatFor(asset.fileName));
}

/**
 * `NN_<originalName>`; the ordinal keeps same-named assets in a set apart
 */
export function downloadName(position: number, asset: RemoteAsset): string {
  const original = asset.fileName ?? `${asset.id}.${asset.kind === 'screenshot' ? 'png' : 'mp4'}`;
  return `${String(position).padStart(2, '0')}_${original}`;
}

export async function writeAssetFile(
  root: string,
  locale: string,
  displayType: string,
  fileName: string,
  bytes: Buffer
): Promise<string> {
  const dir = path.join(root, locale, displayType);
  await fs.ensureDir(dir);

  const destination = path.join(dir, fileName);
  await fs.writeFile(destination, bytes);
  return destination;
}
