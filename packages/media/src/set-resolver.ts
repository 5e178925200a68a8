/**
 * Remote Set Resolver
 * Maps (locale, displayType, kind) to a remote set, creating it when missing
 */

import { Logger, silentLogger } from '@shipkit/shared';
import type { AssetKind, MediaApi, RemoteAssetSet, SetKey } from './types.js';

export function sameKey(a: SetKey, b: SetKey): boolean {
  return a.locale === b.locale && a.displayType === b.displayType && a.kind === b.kind;
}

const KIND_ORDER: Record<AssetKind, number> = { screenshot: 0, preview: 1 };

/**
 * Locale, then display type, then screenshots before previews
 */
export function compareSetKeys(a: SetKey, b: SetKey): number {
  if (a.locale !== b.locale) return a.locale < b.locale ? -1 : 1;
  if (a.displayType !== b.displayType) return a.displayType < b.displayType ? -1 : 1;
  return KIND_ORDER[a.kind] - KIND_ORDER[b.kind];
}

export function describeKey(key: SetKey): string {
  return `[${key.locale}] ${key.displayType} (${key.kind})`;
}

export class SetResolver {
  constructor(
    private api: MediaApi,
    private versionId: string,
    private logger: Logger = silentLogger
  ) {}

  /**
   * Current sets for the version, fetched on every call
   */
  async list(): Promise<RemoteAssetSet[]> {
    return this.api.listSets(this.versionId);
  }

  find(sets: RemoteAssetSet[], key: SetKey): RemoteAssetSet | undefined {
    return sets.find((set) => sameKey(set, key));
  }

  /**
   * Return the set for `key`, creating an empty one only when no set of that
   * kind exists. An existing empty set is returned as is.
   */
  async resolve(
    key: SetKey,
    sets: RemoteAssetSet[]
  ): Promise<{ set: RemoteAssetSet; created: boolean }> {
    const existing = this.find(sets, key);
    if (existing) {
      return { set: existing, created: false };
    }

    // Another run may have created it since `sets` was fetched
    const fresh = this.find(await this.list(), key);
    if (fresh) {
      this.logger.debug(`${describeKey(key)} appeared since last listing, reusing ${fresh.id}`);
      return { set: fresh, created: false };
    }

    const id = await this.api.createSet(this.versionId, key);
    this.logger.debug(`${describeKey(key)} created set ${id}`);

    return { set: { ...key, id, items: [] }, created: true };
  }
}
