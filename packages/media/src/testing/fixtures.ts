/**
 * Temporary media folders for tests
 */

import fs from 'fs-extra';
import os from 'os';
import path from 'path';

/**
 * Create a temp folder holding `files`, keyed by path relative to the root
 */
export async function makeMediaFolder(files: Record<string, string | Buffer> = {}): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'shipkit-media-'));
  for (const [relative, content] of Object.entries(files)) {
    await fs.outputFile(path.join(root, relative), content);
  }
  return root;
}

export async function makeEmptyFolder(): Promise<string> {
  return makeMediaFolder();
}

export async function removeFolder(root: string): Promise<void> {
  await fs.remove(root);
}
