/**
 * App Store display types and their preview counterparts
 */

import fs from 'fs-extra';
import { createRequire } from 'module';
import { z } from 'zod';

const DisplayTypeTableSchema = z.object({
  screenshotDisplayTypes: z.array(z.string().min(1)),
  previewTypes: z.array(z.string().min(1)),
});

type DisplayTypeTable = z.infer<typeof DisplayTypeTableSchema>;

let table: { screenshots: Set<string>; previews: Set<string> } | undefined;

function loadTable(): { screenshots: Set<string>; previews: Set<string> } {
  if (!table) {
    // Resolved through the package so bundled builds find it too
    const file = createRequire(import.meta.url).resolve('@shipkit/media/data/display-types.json');
    const parsed: DisplayTypeTable = DisplayTypeTableSchema.parse(fs.readJsonSync(file));
    table = {
      screenshots: new Set(parsed.screenshotDisplayTypes),
      previews: new Set(parsed.previewTypes),
    };
  }
  return table;
}

export function isKnownDisplayType(displayType: string): boolean {
  return loadTable().screenshots.has(displayType);
}

/**
 * Preview type for a display-type folder, or null for screenshot-only families
 * (watch, iMessage, and anything without an APP_ preview twin).
 */
export function previewTypeFor(displayType: string): string | null {
  if (displayType.startsWith('APP_WATCH_') || displayType.startsWith('IMESSAGE_')) {
    return null;
  }
  if (!displayType.startsWith('APP_')) return null;

  const previewType = displayType.slice('APP_'.length);
  return loadTable().previews.has(previewType) ? previewType : null;
}

/**
 * Folder name a preview set is stored under locally
 */
export function displayTypeForPreview(previewType: string): string {
  return `APP_${previewType}`;
}
