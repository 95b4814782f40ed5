/** RNG function signature. Returns a value in [0, 1). */
export type RandomFn = () => number;

let _sourceCounter = 0;

/**
 * Seed derived from the wall clock, the high-resolution timer and a
 * per-process counter, so two sources created in the same millisecond
 * still diverge.
 */
function wallClockSeed(): number {
  _sourceCounter = (_sourceCounter + 1) >>> 0;
  const hr = Number(process.hrtime.bigint() & 0xffffffffn);
  return (
    (Date.now() ^ hr ^ Math.imul(_sourceCounter, 0x9e3779b1)) >>> 0
  );
}

/**
 * Create an independent random source (mulberry32).
 *
 * Each generator owns one of these; nothing reads from a shared global
 * stream. Pass a seed to make a source reproducible.
 */
export function createRandomSource(seed?: number): RandomFn {
  let state = (seed ?? wallClockSeed()) >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// ─── Sampling Utilities ─────────────────────────────────────────────────────

/** Sample uniformly from [min, max). */
export function uniform(random: RandomFn, min: number, max: number): number {
  return min + random() * (max - min);
}

/** Sample an integer uniformly from [min, max] inclusive. */
export function uniformInt(random: RandomFn, min: number, max: number): number {
  const lo = Math.ceil(Math.min(min, max));
  const hi = Math.floor(Math.max(min, max));
  if (hi <= lo) return lo;
  return lo + Math.floor(random() * (hi - lo + 1));
}

/**
 * Sample from a normal distribution using the Box–Muller transform.
 */
export function gaussian(random: RandomFn, mean: number, stdDev: number): number {
  // log(0) is -Infinity
  const u1 = Math.max(random(), Number.EPSILON);
  const u2 = random();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return mean + z * stdDev;
}

/** Bernoulli trial with probability `p`. */
export function chance(random: RandomFn, p: number): boolean {
  return random() < p;
}

/** Pick one element uniformly. `items` must be non-empty. */
export function pick<T>(random: RandomFn, items: readonly T[]): T {
  return items[Math.min(items.length - 1, Math.floor(random() * items.length))];
}

/** Clamp a value to [min, max]. */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
