/**
 * Timing utilities for request pacing.
 */

/**
 * Returns a promise that resolves after `ms` milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}

/**
 * Returns a random number uniformly distributed in [min, max].
 */
export function randomBetween(min: number, max: number): number {
  return min + Math.random() * (max - min);
}

/**
 * Sleeps for `totalMs` in slices of at most `sliceMs`, calling `shouldAbort`
 * before every slice. Resolves `true` if the wait was cut short.
 */
export async function sleepInSlices(
  totalMs: number,
  sliceMs: number,
  shouldAbort: () => boolean,
  sleepFn: (ms: number) => Promise<void> = sleep,
): Promise<boolean> {
  let remaining = Math.max(0, totalMs);
  const slice = Math.max(1, sliceMs);

  while (remaining > 0) {
    if (shouldAbort()) {
      return true;
    }
    const step = Math.min(slice, remaining);
    await sleepFn(step);
    remaining -= step;
  }

  return shouldAbort();
}
