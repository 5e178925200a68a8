/**
 * Local Asset Index
 *
 * Walks `<root>/<locale>/<displayType>/<file>` and classifies each file as a
 * screenshot or preview. Exactly two directory levels are read; files at the
 * root or locale level and anything nested deeper are ignored.
 */

import fs from 'fs-extra';
import path from 'path';
import { ValidationError, plural } from '@shipkit/shared';
import { isKnownDisplayType, previewTypeFor } from './display-types.js';
import type {
  AssetGroup,
  AssetKind,
  AssetManifest,
  LocalAssetFile,
  ScanWarning,
} from './types.js';

const IMAGE_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg']);
const VIDEO_EXTENSIONS = new Set(['.mp4', '.mov']);

/**
 * Classify a file by extension. Returns null for unsupported extensions and
 * for videos in a screenshot-only display type; `reason` tells which.
 */
export function classifyFile(
  fileName: string,
  displayType: string
): { kind: AssetKind } | { kind: null; reason: 'unsupported-extension' | 'preview-not-supported' } {
  const ext = path.extname(fileName).toLowerCase();

  if (IMAGE_EXTENSIONS.has(ext)) return { kind: 'screenshot' };
  if (VIDEO_EXTENSIONS.has(ext)) {
    return previewTypeFor(displayType)
      ? { kind: 'preview' }
      : { kind: null, reason: 'preview-not-supported' };
  }
  return { kind: null, reason: 'unsupported-extension' };
}

// Case-sensitive, UTF-16 code-unit order ("B.png" < "a.png")
function byCodeUnit(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

async function listDirectories(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
    .map((entry) => entry.name)
    .sort(byCodeUnit);
}

async function listFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && !entry.name.startsWith('.'))
    .map((entry) => entry.name)
    .sort(byCodeUnit);
}

/**
 * Scan a media folder into an ordered manifest
 */
export async function scanAssetFolder(root: string): Promise<AssetManifest> {
  const resolvedRoot = path.resolve(root);

  const stat = await fs.stat(resolvedRoot).catch(() => null);
  if (!stat || !stat.isDirectory()) {
    throw new ValidationError(`Folder not found at '${resolvedRoot}'.`, { root: resolvedRoot });
  }

  const groups: AssetGroup[] = [];
  const warnings: ScanWarning[] = [];
  let totalScreenshots = 0;
  let totalPreviews = 0;

  for (const locale of await listDirectories(resolvedRoot)) {
    const localePath = path.join(resolvedRoot, locale);

    for (const displayType of await listDirectories(localePath)) {
      if (!isKnownDisplayType(displayType)) {
        const skippedFiles = await listFiles(path.join(localePath, displayType));
        warnings.push({
          kind: 'unknown-display-type',
          locale,
          displayType,
          fileCount: skippedFiles.length,
          message: `[${locale}] Skipping unknown display type '${displayType}' (${plural(skippedFiles.length, 'file')}).`,
        });
        continue;
      }

      const displayTypePath = path.join(localePath, displayType);
      const screenshots: LocalAssetFile[] = [];
      const previews: LocalAssetFile[] = [];

      for (const fileName of await listFiles(displayTypePath)) {
        const classified = classifyFile(fileName, displayType);

        if (classified.kind === null) {
          warnings.push({
            kind: classified.reason,
            locale,
            displayType,
            fileName,
            message:
              classified.reason === 'preview-not-supported'
                ? `[${locale}/${displayType}] Skipping '${fileName}': no preview support for this display type.`
                : `[${locale}/${displayType}] Skipping '${fileName}': unsupported file type.`,
          });
          continue;
        }

        const filePath = path.join(displayTypePath, fileName);
        const { size } = await fs.stat(filePath);
        const target = classified.kind === 'screenshot' ? screenshots : previews;

        target.push({
          path: filePath,
          fileName,
          fileSize: size,
          locale,
          displayType,
          kind: classified.kind,
          position: target.length + 1,
        });
      }

      if (screenshots.length > 0 || previews.length > 0) {
        totalScreenshots += screenshots.length;
        totalPreviews += previews.length;
        groups.push({ locale, displayType, screenshots, previews });
      }
    }
  }

  if (groups.length === 0) {
    warnings.push({
      kind: 'empty-root',
      message: `No media files found in '${resolvedRoot}'.`,
    });
  }

  return { root: resolvedRoot, groups, warnings, totalScreenshots, totalPreviews };
}

/**
 * Files of one kind in a group, already in position order
 */
export function filesOfKind(group: AssetGroup, kind: AssetKind): LocalAssetFile[] {
  return kind === 'screenshot' ? group.screenshots : group.previews;
}

export function findGroup(
  manifest: AssetManifest,
  locale: string,
  displayType: string
): AssetGroup | undefined {
  return manifest.groups.find((g) => g.locale === locale && g.displayType === displayType);
}
