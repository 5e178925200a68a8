import path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { ValidationError } from '@shipkit/shared';
import { classifyFile, filesOfKind, findGroup, scanAssetFolder } from './asset-index.js';
import { displayTypeForPreview, isKnownDisplayType, previewTypeFor } from './display-types.js';
import { makeMediaFolder, removeFolder } from './testing/fixtures.js';

describe('classifyFile', () => {
  it('treats images as screenshots regardless of case', () => {
    expect(classifyFile('home.PNG', 'APP_IPHONE_67')).toEqual({ kind: 'screenshot' });
    expect(classifyFile('home.jpeg', 'APP_WATCH_ULTRA')).toEqual({ kind: 'screenshot' });
  });

  it('treats videos as previews where the display type has one', () => {
    expect(classifyFile('intro.mov', 'APP_IPHONE_67')).toEqual({ kind: 'preview' });
  });

  it('rejects videos for screenshot-only display types', () => {
    expect(classifyFile('intro.mp4', 'APP_WATCH_ULTRA')).toEqual({
      kind: null,
      reason: 'preview-not-supported',
    });
    expect(classifyFile('intro.mp4', 'IMESSAGE_APP_IPHONE_67')).toEqual({
      kind: null,
      reason: 'preview-not-supported',
    });
  });

  it('rejects other extensions', () => {
    expect(classifyFile('anim.gif', 'APP_IPHONE_67')).toEqual({
      kind: null,
      reason: 'unsupported-extension',
    });
    expect(classifyFile('README', 'APP_IPHONE_67')).toEqual({
      kind: null,
      reason: 'unsupported-extension',
    });
  });
});

describe('display types', () => {
  it('knows the screenshot display types', () => {
    expect(isKnownDisplayType('APP_IPHONE_67')).toBe(true);
    expect(isKnownDisplayType('IMESSAGE_APP_IPAD_97')).toBe(true);
    expect(isKnownDisplayType('APP_TOASTER')).toBe(false);
  });

  it('maps display types to preview types', () => {
    expect(previewTypeFor('APP_IPHONE_67')).toBe('IPHONE_67');
    expect(previewTypeFor('APP_APPLE_VISION_PRO')).toBe('APPLE_VISION_PRO');
    expect(previewTypeFor('APP_WATCH_SERIES_10')).toBeNull();
    expect(previewTypeFor('IMESSAGE_APP_IPHONE_65')).toBeNull();
    expect(previewTypeFor('APP_TOASTER')).toBeNull();
  });

  it('maps preview types back to folder names', () => {
    expect(displayTypeForPreview('IPAD_PRO_3GEN_129')).toBe('APP_IPAD_PRO_3GEN_129');
  });
});

describe('scanAssetFolder', () => {
  let root: string | undefined;

  afterEach(async () => {
    if (root) await removeFolder(root);
    root = undefined;
  });

  it('groups files by locale and display type in code-unit order', async () => {
    root = await makeMediaFolder({
      'en-US/APP_IPHONE_67/b.png': 'bb',
      'en-US/APP_IPHONE_67/B.png': 'B',
      'en-US/APP_IPHONE_67/a.jpg': 'aaa',
      'en-US/APP_IPHONE_67/intro.mp4': 'video',
      'de-DE/APP_IPAD_PRO_129/1.png': 'x',
    });

    const manifest = await scanAssetFolder(root);

    expect(manifest.root).toBe(path.resolve(root));
    expect(manifest.groups.map((g) => `${g.locale}/${g.displayType}`)).toEqual([
      'de-DE/APP_IPAD_PRO_129',
      'en-US/APP_IPHONE_67',
    ]);

    const iphone = manifest.groups[1];
    expect(iphone.screenshots.map((f) => [f.fileName, f.position])).toEqual([
      ['B.png', 1],
      ['a.jpg', 2],
      ['b.png', 3],
    ]);
    expect(iphone.screenshots[1].fileSize).toBe(3);
    expect(iphone.previews.map((f) => [f.fileName, f.kind, f.position])).toEqual([
      ['intro.mp4', 'preview', 1],
    ]);
    expect(manifest.totalScreenshots).toBe(4);
    expect(manifest.totalPreviews).toBe(1);
    expect(manifest.warnings).toEqual([]);
  });

  it('warns about and skips files it cannot upload', async () => {
    root = await makeMediaFolder({
      'en-US/APP_IPHONE_67/1.png': 'x',
      'en-US/APP_IPHONE_67/anim.gif': 'x',
      'en-US/APP_WATCH_ULTRA/1.png': 'x',
      'en-US/APP_WATCH_ULTRA/clip.mp4': 'x',
      'en-US/APP_TOASTER/1.png': 'x',
    });

    const manifest = await scanAssetFolder(root);

    expect(manifest.totalScreenshots).toBe(2);
    expect(manifest.totalPreviews).toBe(0);
    expect(manifest.warnings.map((w) => w.message)).toEqual([
      "[en-US/APP_IPHONE_67] Skipping 'anim.gif': unsupported file type.",
      "[en-US] Skipping unknown display type 'APP_TOASTER' (1 file).",
      "[en-US/APP_WATCH_ULTRA] Skipping 'clip.mp4': no preview support for this display type.",
    ]);
    expect(manifest.warnings.map((w) => w.kind)).toEqual([
      'unsupported-extension',
      'unknown-display-type',
      'preview-not-supported',
    ]);
    expect(manifest.warnings[1].fileCount).toBe(1);
  });

  it('reads exactly two directory levels and ignores dot entries', async () => {
    root = await makeMediaFolder({
      'notes.txt': 'x',
      'en-US/readme.md': 'x',
      'en-US/APP_IPHONE_67/.DS_Store': 'x',
      'en-US/APP_IPHONE_67/1.png': 'x',
      'en-US/APP_IPHONE_67/extra/2.png': 'x',
      '.git/APP_IPHONE_67/3.png': 'x',
    });

    const manifest = await scanAssetFolder(root);

    expect(manifest.groups).toHaveLength(1);
    expect(manifest.groups[0].screenshots.map((f) => f.fileName)).toEqual(['1.png']);
    expect(manifest.warnings).toEqual([]);
  });

  it('reports an empty folder', async () => {
    root = await makeMediaFolder({ 'en-US/APP_IPHONE_67/anim.gif': 'x' });

    const manifest = await scanAssetFolder(root);

    expect(manifest.groups).toEqual([]);
    expect(manifest.warnings.map((w) => w.kind)).toEqual(['unsupported-extension', 'empty-root']);
    expect(manifest.warnings[1].message).toBe(`No media files found in '${path.resolve(root)}'.`);
  });

  it('fails for a missing folder', async () => {
    await expect(scanAssetFolder('/nonexistent/shipkit-media')).rejects.toBeInstanceOf(ValidationError);
  });

  it('looks up groups and files by kind', async () => {
    root = await makeMediaFolder({
      'ja/APP_IPHONE_65/1.png': 'x',
      'ja/APP_IPHONE_65/2.mov': 'x',
    });

    const manifest = await scanAssetFolder(root);
    const group = findGroup(manifest, 'ja', 'APP_IPHONE_65');

    expect(group).toBeDefined();
    expect(findGroup(manifest, 'ja', 'APP_IPHONE_67')).toBeUndefined();
    if (!group) return;
    expect(filesOfKind(group, 'screenshot').map((f) => f.fileName)).toEqual(['1.png']);
    expect(filesOfKind(group, 'preview').map((f) => f.fileName)).toEqual(['2.mov']);
  });
});
