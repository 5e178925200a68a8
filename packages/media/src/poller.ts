/**
 * Bounded polling for server-side processing of committed assets
 */

import { sleep as defaultSleep } from '@shipkit/shared';
import type { AssetDeliveryState, RemoteAsset } from './types.js';

export type PollResult =
  | { status: 'complete'; asset: RemoteAsset }
  | { status: 'failed'; state: AssetDeliveryState; asset: RemoteAsset }
  | { status: 'timed-out'; last?: RemoteAsset };

export interface PollOptions {
  intervalMs: number;
  timeoutMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  onPoll?: (asset: RemoteAsset, elapsedMs: number) => void;
}

/**
 * Poll `fetchAsset` until the asset is COMPLETE or FAILED, or the deadline passes.
 * Fetch errors propagate; the loop never retries them silently.
 */
export async function waitForProcessing(
  fetchAsset: () => Promise<RemoteAsset>,
  options: PollOptions
): Promise<PollResult> {
  const now = options.now ?? Date.now;
  const sleep = options.sleep ?? defaultSleep;
  const startTime = now();
  let last: RemoteAsset | undefined;

  while (now() - startTime <= options.timeoutMs) {
    last = await fetchAsset();
    options.onPoll?.(last, now() - startTime);

    if (last.state === 'COMPLETE') {
      return { status: 'complete', asset: last };
    }
    if (last.state === 'FAILED') {
      return { status: 'failed', state: last.state, asset: last };
    }

    const remaining = options.timeoutMs - (now() - startTime);
    if (remaining <= 0) break;
    await sleep(Math.min(options.intervalMs, remaining));
  }

  return { status: 'timed-out', last };
}
