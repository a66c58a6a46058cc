/**
 * @module @crew-control/contracts/runtime
 * Clock and randomness sources, injectable for deterministic tests.
 */

/** Epoch milliseconds. */
export type Clock = () => number;

/** Uniform value in [0, 1). */
export type RandomSource = () => number;

export interface Runtime {
  now: Clock;
  random: RandomSource;
}

export const systemRuntime: Runtime = {
  now: () => Date.now(),
  random: () => Math.random(),
};

/** Uniform value in [min, max). */
export function uniform(random: RandomSource, min: number, max: number): number {
  return min + random() * (max - min);
}

export function pickOne<T>(random: RandomSource, items: readonly T[]): T | undefined {
  if (items.length === 0) {
    return undefined;
  }
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index];
}

/** Local wall-clock time as HH:MM:SS. */
export function formatClockTime(timestamp: number): string {
  return new Date(timestamp).toTimeString().slice(0, 8);
}
