import { setTimeout as delay } from 'node:timers/promises';

/**
 * Waits `ms` milliseconds. Rejects with the signal's abort reason when the
 * signal fires first; a zero or negative wait still honours an already-aborted signal.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  signal?.throwIfAborted();

  if (ms <= 0) {
    return;
  }

  await delay(ms, undefined, { signal });
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
