import { setTimeout as sleep } from 'timers/promises';

/**
 * Wait `ms`, or less when the signal fires first. Resolves false when
 * interrupted.
 */
export async function pause(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return false;
  try {
    await sleep(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (signal?.aborted) return false;
    throw error;
  }
}
