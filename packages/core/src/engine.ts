import { CadenceGenerator } from "./cadence.js";
import { defaultStartPosition, resolveConfig } from "./config.js";
import type { HumanInputConfig, HumanInputSettings } from "./config.js";
import { PathGenerator } from "./path.js";
import { createRandomSource } from "./random.js";
import type { RandomFn } from "./random.js";
import { ScrollGenerator } from "./scroll.js";
import { TimingService } from "./timing.js";
import type {
  KeyAction,
  Point,
  ScrollAction,
  ScrollDirectionInput,
  SleepResult,
} from "./types.js";

/** Per-generator random sources. Omitted ones get their own wall-clock seed. */
export interface EngineRandomSources {
  readonly path?: RandomFn;
  readonly cadence?: RandomFn;
  readonly scroll?: RandomFn;
  readonly timing?: RandomFn;
}

/**
 * Configuration for the HumanInputEngine.
 */
export interface HumanInputEngineOptions {
  /** Settings merged over the defaults and normalized once. */
  readonly config?: HumanInputSettings;

  /**
   * Override the RNG for deterministic testing. A single function is shared
   * by all generators; an object assigns one per generator.
   */
  readonly random?: RandomFn | EngineRandomSources;
}

/**
 * Single entry point to the generators.
 *
 * Resolves one immutable configuration at construction, builds the path,
 * cadence, scroll and timing generators around it, and forwards each call,
 * filling omitted parameters from the configuration. The engine keeps no
 * cursor position; callers pass `start` or accept the viewport center.
 *
 * Usage:
 * ```ts
 * const engine = new HumanInputEngine({ config: loadSettingsFromEnv() });
 *
 * const path = engine.generatePath({ x: 10, y: 20 }, { x: 640, y: 410 });
 * const keys = engine.generateTyping("hello there");
 * const scroll = engine.generateScroll("forward", 900);
 * await engine.sleep(0.8, 0.2, controller.signal);
 * ```
 */
export class HumanInputEngine {
  private readonly _config: HumanInputConfig;
  private readonly _path: PathGenerator;
  private readonly _cadence: CadenceGenerator;
  private readonly _scroll: ScrollGenerator;
  private readonly _timing: TimingService;

  constructor(options: HumanInputEngineOptions = {}) {
    this._config = resolveConfig(options.config);

    const sources = resolveSources(options.random);
    this._timing = new TimingService(sources.timing);
    this._path = new PathGenerator(this._config, sources.path);
    this._cadence = new CadenceGenerator(sources.cadence, this._timing);
    this._scroll = new ScrollGenerator(sources.scroll, this._timing);
  }

  /** The resolved, frozen configuration. */
  get config(): HumanInputConfig {
    return this._config;
  }

  // ─── Generators ────────────────────────────────────────────────────────────

  /**
   * Cursor path to `end`. Without `start`, the move begins at the center
   * of the configured viewport.
   */
  generatePath(start: Point | undefined, end: Point, allowOvershoot = true): Point[] {
    return this._path.generatePath(
      start ?? defaultStartPosition(this._config),
      end,
      allowOvershoot,
    );
  }

  generateTyping(
    text: string,
    wpmMin?: number,
    wpmMax?: number,
    typoProbability?: number,
  ): KeyAction[] {
    return this._cadence.generateTyping(
      text,
      {
        min: wpmMin ?? this._config.typingWpm.min,
        max: wpmMax ?? this._config.typingWpm.max,
      },
      typoProbability ?? this._config.typoProbability,
    );
  }

  generateScroll(
    direction: ScrollDirectionInput,
    distance: number,
    chunkMin?: number,
    chunkMax?: number,
  ): ScrollAction[] {
    return this._scroll.generateScroll(direction, distance, {
      min: chunkMin ?? this._config.scrollChunk.min,
      max: chunkMax ?? this._config.scrollChunk.max,
    });
  }

  generateSmoothScroll(direction: ScrollDirectionInput, distance: number): ScrollAction[] {
    return this._scroll.generateSmoothScroll(direction, distance);
  }

  // ─── Timing ────────────────────────────────────────────────────────────────

  /** Uniform delay in ms; bounds default to the configured base delay. */
  sample(minSeconds?: number, maxSeconds?: number): number {
    return this._timing.sample(
      minSeconds ?? this._config.baseDelay.min,
      maxSeconds ?? this._config.baseDelay.max,
    );
  }

  /** Gaussian delay in ms. */
  gaussian(meanSeconds: number, stdDevSeconds: number): number {
    return this._timing.gaussian(meanSeconds, stdDevSeconds);
  }

  sleep(
    baseSeconds: number,
    varianceSeconds: number,
    signal?: AbortSignal,
  ): Promise<SleepResult> {
    return this._timing.sleepFor(baseSeconds, varianceSeconds, signal);
  }

  sleepRange(
    minSeconds?: number,
    maxSeconds?: number,
    signal?: AbortSignal,
  ): Promise<SleepResult> {
    return this._timing.sleepRange(
      minSeconds ?? this._config.baseDelay.min,
      maxSeconds ?? this._config.baseDelay.max,
      signal,
    );
  }

  sleepGaussian(
    meanSeconds: number,
    stdDevSeconds: number,
    signal?: AbortSignal,
  ): Promise<SleepResult> {
    return this._timing.sleepGaussian(meanSeconds, stdDevSeconds, signal);
  }

  /** Sleep an exact, already generated delay (an action's `delayMs`). */
  sleepMs(ms: number, signal?: AbortSignal): Promise<SleepResult> {
    return this._timing.sleepMs(ms, signal);
  }
}

function resolveSources(
  random: RandomFn | EngineRandomSources | undefined,
): Required<EngineRandomSources> {
  if (typeof random === "function") {
    return { path: random, cadence: random, scroll: random, timing: random };
  }
  return {
    path: random?.path ?? createRandomSource(),
    cadence: random?.cadence ?? createRandomSource(),
    scroll: random?.scroll ?? createRandomSource(),
    timing: random?.timing ?? createRandomSource(),
  };
}
