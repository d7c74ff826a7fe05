/**
 * Upload throttling
 *
 * Splits a body into slices sized for a fixed tick so the request never
 * exceeds a bytes-per-second ceiling.
 */

import { setTimeout as delay } from 'node:timers/promises';

export interface ThrottleOptions {
  /** Tick length in milliseconds (default 100) */
  intervalMs?: number;
  /** Replaceable wait, for tests */
  sleep?: (ms: number) => Promise<unknown>;
}

/**
 * Yields `data` in slices no faster than `bytesPerSecond`
 *
 * A rate of 0 or less disables the ceiling and yields the data in one piece.
 *
 * @param data - Request body
 * @param bytesPerSecond - Ceiling
 * @param options - Tick length and sleep function
 */
export async function* throttle(
  data: Uint8Array,
  bytesPerSecond: number,
  options: ThrottleOptions = {}
): AsyncGenerator<Uint8Array, void, undefined> {
  if (data.length === 0) return;
  if (bytesPerSecond <= 0) {
    yield data;
    return;
  }

  const intervalMs = options.intervalMs ?? 100;
  const sleep = options.sleep ?? delay;
  const sliceSize = Math.max(1, Math.floor((bytesPerSecond * intervalMs) / 1000));

  for (let offset = 0; offset < data.length; offset += sliceSize) {
    if (offset > 0) await sleep(intervalMs);
    yield data.subarray(offset, offset + sliceSize);
  }
}
