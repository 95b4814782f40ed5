import { easeInOutCubic } from "./path.js";
import { createRandomSource, uniform, uniformInt } from "./random.js";
import type { RandomFn } from "./random.js";
import { TimingService } from "./timing.js";
import type {
  Range,
  ScrollAction,
  ScrollDirection,
  ScrollDirectionInput,
} from "./types.js";

/** Per-chunk size variation (±30%). */
const CHUNK_VARIATION = { min: 0.7, max: 1.3 };

/** Chunk delay = (BASE + PER_PIXEL × |chunk|) ms before scaling. */
const CHUNK_DELAY_BASE_MS = 50;
const CHUNK_DELAY_PER_PIXEL_MS = 0.5;

/** First and last chunks linger (orientation); the middle moves quickly. */
const EDGE_DELAY_FACTOR = { min: 1.5, max: 2.0 };
const INTERIOR_DELAY_FACTOR = { min: 0.7, max: 1.0 };
const CHUNK_JITTER_MS = { min: 0, max: 20 };

/** Zero-distance reading pause after the last chunk (ms). */
export const SETTLE_PAUSE = { min: 200, max: 500 };

/** Smooth scrolling: step count and per-step delay (ms). */
const SMOOTH_STEPS = { min: 10, max: 20 };
const SMOOTH_STEP_DELAY = { min: 10, max: 30 };

/** Map API aliases onto the canonical direction. */
export function normalizeDirection(direction: ScrollDirectionInput): ScrollDirection {
  return direction === "backward" || direction === "up" ? "backward" : "forward";
}

function wholePixels(distance: number): number {
  return Number.isFinite(distance) ? Math.round(Math.abs(distance)) : 0;
}

/**
 * Chunked scroll generator.
 *
 * Splits a scroll into wheel bursts sized along an ease-in-out curve
 * (small at the ends, large in the middle) and paused in proportion to
 * their size. The signed distances always sum to the requested total.
 */
export class ScrollGenerator {
  private readonly _random: RandomFn;
  private readonly _timing: TimingService;

  constructor(random?: RandomFn, timing?: TimingService) {
    this._random = random ?? createRandomSource();
    this._timing = timing ?? new TimingService(this._random);
  }

  generateScroll(
    direction: ScrollDirectionInput,
    totalDistance: number,
    chunkRange: Range,
  ): ScrollAction[] {
    const total = wholePixels(totalDistance);
    if (total === 0) return [];

    const sign = normalizeDirection(direction) === "backward" ? -1 : 1;
    const lowChunk = Number.isFinite(chunkRange.min) ? chunkRange.min : 1;
    const highChunk = Number.isFinite(chunkRange.max) ? chunkRange.max : lowChunk;
    const minChunk = Math.max(1, Math.min(lowChunk, highChunk));
    const maxChunk = Math.max(1, lowChunk, highChunk);

    const chunkCount = Math.max(1, Math.ceil(total / ((minChunk + maxChunk) / 2)));
    const actions: ScrollAction[] = [];
    let remaining = total;

    // Low variation draws can leave distance after chunkCount chunks;
    // further chunks continue at full size until it is consumed
    for (let i = 0; remaining > 0; i++) {
      const t = chunkCount === 1 ? 0.5 : Math.min(1, i / (chunkCount - 1));
      const base = minChunk + easeInOutCubic(t) * (maxChunk - minChunk);
      const varied = Math.trunc(base * uniform(this._random, CHUNK_VARIATION.min, CHUNK_VARIATION.max));
      const size = Math.min(remaining, Math.max(1, varied));

      remaining -= size;
      const isEdge = i === 0 || remaining === 0;

      const factor = isEdge
        ? uniform(this._random, EDGE_DELAY_FACTOR.min, EDGE_DELAY_FACTOR.max)
        : uniform(this._random, INTERIOR_DELAY_FACTOR.min, INTERIOR_DELAY_FACTOR.max);
      const delayMs =
        (CHUNK_DELAY_BASE_MS + CHUNK_DELAY_PER_PIXEL_MS * size) * factor +
        uniform(this._random, CHUNK_JITTER_MS.min, CHUNK_JITTER_MS.max);

      actions.push({ distance: size * sign, delayMs });
    }

    actions.push({
      distance: 0,
      delayMs: this._timing.humanizeMs(
        uniform(this._random, SETTLE_PAUSE.min, SETTLE_PAUSE.max),
      ),
    });

    return actions;
  }

  /**
   * Many small, evenly sized steps with short gaps, like a trackpad
   * glide. The remainder is spread one pixel at a time over the first steps.
   */
  generateSmoothScroll(
    direction: ScrollDirectionInput,
    totalDistance: number,
  ): ScrollAction[] {
    const total = wholePixels(totalDistance);
    if (total === 0) return [];

    const sign = normalizeDirection(direction) === "backward" ? -1 : 1;
    const steps = Math.min(total, uniformInt(this._random, SMOOTH_STEPS.min, SMOOTH_STEPS.max));
    const stepSize = Math.floor(total / steps);
    const remainder = total - stepSize * steps;

    const actions: ScrollAction[] = [];
    for (let i = 0; i < steps; i++) {
      const size = stepSize + (i < remainder ? 1 : 0);
      actions.push({
        distance: size * sign,
        delayMs: this._timing.humanizeMs(
          uniform(this._random, SMOOTH_STEP_DELAY.min, SMOOTH_STEP_DELAY.max),
        ),
      });
    }
    return actions;
  }
}
