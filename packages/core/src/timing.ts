import { createRandomSource, gaussian, uniform } from "./random.js";
import type { RandomFn } from "./random.js";
import type { SleepResult } from "./types.js";

/** No sampled delay is shorter than this (ms). */
export const MIN_DELAY_MS = 1;

/**
 * Sub-millisecond offset added to every delay (ms), so no duration lands
 * on a whole number of milliseconds.
 */
export const FRACTIONAL_OFFSET_MS = { min: 0.01, max: 0.1 };

/** Longest delay a single Node timer honours (ms). */
export const MAX_TIMER_MS = 2 ** 31 - 1;

function nonNegative(value: number): number {
  return Number.isFinite(value) ? Math.max(0, value) : 0;
}

/**
 * Randomized delays and cancellable sleeps.
 *
 * Every duration is returned in milliseconds; the `*Seconds` arguments
 * follow the engine's public sleep API. The service also hands its
 * fractional offset to the other generators via {@link humanizeMs}, so all
 * timing in a sequence flows through one jitter source.
 */
export class TimingService {
  private readonly _random: RandomFn;

  constructor(random?: RandomFn) {
    this._random = random ?? createRandomSource();
  }

  /** Add the sub-millisecond offset to an existing delay. */
  humanizeMs(ms: number): number {
    return ms + uniform(this._random, FRACTIONAL_OFFSET_MS.min, FRACTIONAL_OFFSET_MS.max);
  }

  /** Uniform delay in [minSeconds, maxSeconds]. */
  sample(minSeconds: number, maxSeconds: number): number {
    const min = nonNegative(minSeconds);
    const max = Math.max(min, nonNegative(maxSeconds));
    return this._finish(uniform(this._random, min, max) * 1000);
  }

  /** `base ± variance`, variance drawn uniformly. */
  vary(baseSeconds: number, varianceSeconds: number): number {
    const base = nonNegative(baseSeconds);
    const variance = nonNegative(varianceSeconds);
    const offset = (this._random() * 2 - 1) * variance;
    return this._finish((base + offset) * 1000);
  }

  /** Normally distributed delay (Box–Muller). */
  gaussian(meanSeconds: number, stdDevSeconds: number): number {
    const mean = nonNegative(meanSeconds);
    const stdDev = nonNegative(stdDevSeconds);
    return this._finish(gaussian(this._random, mean, stdDev) * 1000);
  }

  /**
   * Wait `ms`, or less if `signal` aborts.
   *
   * Resolves `"cancelled"` as soon as the signal fires (immediately if it
   * already has); never rejects.
   */
  sleepMs(ms: number, signal?: AbortSignal): Promise<SleepResult> {
    if (signal?.aborted) return Promise.resolve("cancelled");

    return new Promise<SleepResult>((resolve) => {
      // Infinity waits until aborted
      let remaining = Number.isNaN(ms) ? 0 : Math.max(0, ms);
      let timer: NodeJS.Timeout | number | undefined;

      const onAbort = (): void => {
        clearTimeout(timer);
        resolve("cancelled");
      };

      // Timers past MAX_TIMER_MS fire at once; wait in steps instead
      const schedule = (): void => {
        const step = Math.min(remaining, MAX_TIMER_MS);
        remaining -= step;
        timer = setTimeout(() => {
          timer = undefined;
          if (remaining > 0) {
            schedule();
            return;
          }
          signal?.removeEventListener("abort", onAbort);
          resolve("completed");
        }, step);
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      schedule();
    });
  }

  /** Sleep `base ± variance` seconds. */
  sleepFor(
    baseSeconds: number,
    varianceSeconds: number,
    signal?: AbortSignal,
  ): Promise<SleepResult> {
    return this.sleepMs(this.vary(baseSeconds, varianceSeconds), signal);
  }

  /** Sleep a uniform duration between `minSeconds` and `maxSeconds`. */
  sleepRange(
    minSeconds: number,
    maxSeconds: number,
    signal?: AbortSignal,
  ): Promise<SleepResult> {
    return this.sleepMs(this.sample(minSeconds, maxSeconds), signal);
  }

  /** Sleep a normally distributed duration. */
  sleepGaussian(
    meanSeconds: number,
    stdDevSeconds: number,
    signal?: AbortSignal,
  ): Promise<SleepResult> {
    return this.sleepMs(this.gaussian(meanSeconds, stdDevSeconds), signal);
  }

  private _finish(ms: number): number {
    return this.humanizeMs(Math.max(MIN_DELAY_MS, ms));
  }
}
