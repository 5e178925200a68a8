/**
 * CLI configuration
 *
 * Credentials live in `~/.shipkit/config.json` next to a copy of the .p8 key.
 * Environment variables (also read from a local .env) take precedence over
 * the file.
 */

import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from '@shipkit/shared';
import type { ASCCredentials } from '@shipkit/deployment';

export const ConfigSchema = z.object({
  keyId: z.string().min(1),
  issuerId: z.string().min(1),
  privateKeyPath: z.string().min(1),
});

export type ShipkitConfig = z.infer<typeof ConfigSchema>;

export type Env = Record<string, string | undefined>;

const CONFIG_FILE = 'config.json';
const CONFIGURE_HINT = "Run 'shipkit configure' to set up App Store Connect credentials.";

export function configDir(env: Env = process.env): string {
  return env.SHIPKIT_CONFIG_DIR ?? path.join(os.homedir(), '.shipkit');
}

/**
 * Read the config file, or null when none has been written yet
 */
export async function loadConfig(dir: string = configDir()): Promise<ShipkitConfig | null> {
  const file = path.join(dir, CONFIG_FILE);
  if (!(await fs.pathExists(file))) {
    return null;
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(file);
  } catch (error) {
    throw new ConfigError(`Config file ${file} is not valid JSON. ${CONFIGURE_HINT}`, {
      file,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new ConfigError(`Config file ${file} is missing or has invalid fields: ${fields}. ${CONFIGURE_HINT}`, {
      file,
    });
  }
  return parsed.data;
}

/**
 * Copy the private key into the config directory and write the config file.
 * The directory is private to the user; the key and config are owner read/write only.
 */
export async function saveConfig(
  input: { keyId: string; issuerId: string; privateKeySource: string },
  dir: string = configDir()
): Promise<ShipkitConfig> {
  if (!(await fs.pathExists(input.privateKeySource))) {
    throw new ConfigError(`Private key not found at '${input.privateKeySource}'.`, {
      path: input.privateKeySource,
    });
  }

  await fs.ensureDir(dir);
  await fs.chmod(dir, 0o700);

  const privateKeyPath = path.join(dir, `AuthKey_${input.keyId}.p8`);
  if (path.resolve(input.privateKeySource) !== path.resolve(privateKeyPath)) {
    await fs.copy(input.privateKeySource, privateKeyPath, { overwrite: true });
  }
  await fs.chmod(privateKeyPath, 0o600);

  const config = ConfigSchema.parse({ keyId: input.keyId, issuerId: input.issuerId, privateKeyPath });
  const file = path.join(dir, CONFIG_FILE);
  await fs.writeJson(file, config, { spaces: 2, mode: 0o600 });
  await fs.chmod(file, 0o600);

  return config;
}

/**
 * Credentials for the App Store Connect client, environment first
 */
export async function resolveCredentials(env: Env = process.env): Promise<ASCCredentials> {
  const config = await loadConfig(configDir(env));

  const keyId = env.ASC_KEY_ID ?? config?.keyId;
  const issuerId = env.ASC_ISSUER_ID ?? config?.issuerId;
  if (!keyId || !issuerId) {
    throw new ConfigError(`No App Store Connect key configured. ${CONFIGURE_HINT}`);
  }

  if (env.ASC_PRIVATE_KEY) {
    return { keyId, issuerId, privateKey: env.ASC_PRIVATE_KEY };
  }

  const keyPath = env.ASC_PRIVATE_KEY_PATH ?? config?.privateKeyPath;
  if (!keyPath) {
    throw new ConfigError(`No private key configured. ${CONFIGURE_HINT}`);
  }
  if (!(await fs.pathExists(keyPath))) {
    throw new ConfigError(`Private key not found at '${keyPath}'. ${CONFIGURE_HINT}`, { path: keyPath });
  }

  return { keyId, issuerId, privateKey: await fs.readFile(keyPath, 'utf8') };
}
