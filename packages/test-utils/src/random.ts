import type { RandomFn } from "@human-input/core";

/**
 * Deterministic RNG that cycles through `sequence`.
 *
 * @example
 * ```ts
 * const random = seededRandom([0.1, 0.9]);
 * random(); // 0.1
 * random(); // 0.9
 * random(); // 0.1
 * ```
 */
export function seededRandom(sequence: readonly number[]): RandomFn {
  if (sequence.length === 0) {
    throw new Error("seededRandom: sequence must not be empty");
  }
  let i = 0;
  return () => {
    const value = sequence[i % sequence.length];
    i++;
    return value;
  };
}

/** RNG that always returns `value`. */
export function constantRandom(value: number): RandomFn {
  return () => value;
}
