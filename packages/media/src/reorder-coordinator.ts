/**
 * Reorder Coordinator
 * Pushes the locally-derived item order of a set to the remote API
 */

import { Logger, silentLogger } from '@shipkit/shared';
import type { AssetKind, MediaApi } from './types.js';

export class ReorderCoordinator {
  // Tail of the pending reorder chain per set; one writer per set at a time
  private chains = new Map<string, Promise<void>>();

  constructor(
    private api: MediaApi,
    private logger: Logger = silentLogger
  ) {}

  /**
   * Replace the set's ordering with `orderedIds`. Calls for the same set are
   * serialized; calls for different sets may overlap.
   */
  reorder(kind: AssetKind, setId: string, orderedIds: string[]): Promise<void> {
    const previous = this.chains.get(setId) ?? Promise.resolve();
    const ids = [...orderedIds];

    const run = previous.then(async () => {
      this.logger.debug(`Reordering set ${setId}: ${ids.join(', ')}`);
      await this.api.reorderSet(kind, setId, ids);
    });

    // The chain itself never rejects; callers see failures through `run`
    const tail: Promise<void> = run
      .then(
        () => undefined,
        () => undefined
      )
      .then(() => {
        if (this.chains.get(setId) === tail) {
          this.chains.delete(setId);
        }
      });
    this.chains.set(setId, tail);

    return run;
  }
}

/**
 * Final order for a set after an upload run: items that were already in the
 * set keep their relative remote order and come first, then the new uploads in
 * local position order. With `replace` the existing list is empty and the
 * result is exactly the local order.
 */
export function desiredOrder(existingIds: string[], uploadedIds: string[]): string[] {
  const seen = new Set<string>();
  const order: string[] = [];

  for (const id of [...existingIds, ...uploadedIds]) {
    if (!seen.has(id)) {
      seen.add(id);
      order.push(id);
    }
  }

  return order;
}

/**
 * Order after repair: each repaired ID takes the slot of the asset it replaced
 */
export function orderAfterRepair(
  originalIds: string[],
  replacements: Map<string, string>
): string[] {
  return originalIds.map((id) => replacements.get(id) ?? id);
}
