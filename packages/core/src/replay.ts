import { defaultStartPosition } from "./config.js";
import type { HumanInputEngine } from "./engine.js";
import { ReplayAbortedError } from "./errors.js";
import { BACKSPACE } from "./types.js";
import type {
  KeyAction,
  MouseButton,
  Point,
  ScrollAction,
  ScrollDirectionInput,
} from "./types.js";

/**
 * Low-level input sink that dispatches events to a real target
 * (a browser page, a remote desktop, a test recorder).
 */
export interface ActionExecutor {
  /** Move the pointer to absolute coordinates. */
  mouseMove(x: number, y: number): Promise<void>;

  /** Press a mouse button. */
  mouseDown(button?: MouseButton): Promise<void>;

  /** Release a mouse button. */
  mouseUp(button?: MouseButton): Promise<void>;

  /** Type a single character (including "\n" and "\t"). */
  typeCharacter(char: string): Promise<void>;

  /** Press and release backspace. */
  pressBackspace(): Promise<void>;

  /** Dispatch a wheel event. */
  scroll(deltaX: number, deltaY: number): Promise<void>;
}

/** Gap between consecutive pointer moves along a path (seconds). */
export const MOVE_STEP_DELAY = { min: 0.008, max: 0.016 };

/** Pause after arriving at a click target before pressing (seconds). */
export const HOVER_DWELL_DELAY = { min: 0.04, max: 0.18 };

/** How long a click holds the button down (seconds). */
export const CLICK_HOLD_DELAY = { min: 0.05, max: 0.12 };

export interface ActionReplayerConfig {
  /** Engine that generates actions and owns all timing. */
  readonly engine: HumanInputEngine;

  /** Where generated actions are dispatched. */
  readonly executor: ActionExecutor;

  /** Cancels the in-progress sequence; pending and later steps are skipped. */
  readonly signal?: AbortSignal;

  /** Last-known cursor position. Defaults to the viewport center. */
  readonly startPosition?: Point;
}

export interface MoveOptions {
  readonly allowOvershoot?: boolean;
}

export interface ClickOptions extends MoveOptions {
  readonly button?: MouseButton;
}

export interface TypeOptions {
  readonly wpmMin?: number;
  readonly wpmMax?: number;
  readonly typoProbability?: number;
}

export interface ScrollOptions {
  readonly chunkMin?: number;
  readonly chunkMax?: number;
  /** Use many small even steps instead of eased chunks. */
  readonly smooth?: boolean;
}

/**
 * Replays generated actions against an {@link ActionExecutor}.
 *
 * Sits between intent ("click here", "type this") and the input sink:
 * asks the engine for a sequence, dispatches each step and honours each
 * step's delay through the engine's own sleep, so every pause in the
 * sequence comes from the same jitter source. The replayer, not the
 * engine, tracks the cursor position between calls.
 *
 * Usage:
 * ```ts
 * const replayer = new ActionReplayer({ engine, executor, signal });
 * await replayer.click({ x: 500, y: 300 });
 * await replayer.type("Hello, world!");
 * await replayer.scroll("forward", 800);
 * ```
 *
 * @throws {ReplayAbortedError} from any method once `signal` aborts.
 */
export class ActionReplayer {
  private readonly _engine: HumanInputEngine;
  private readonly _executor: ActionExecutor;
  private readonly _signal: AbortSignal | undefined;
  private _position: Point;

  constructor(config: ActionReplayerConfig) {
    this._engine = config.engine;
    this._executor = config.executor;
    this._signal = config.signal;
    this._position = config.startPosition ?? defaultStartPosition(config.engine.config);
  }

  /** Last position the pointer was moved to. */
  get position(): Point {
    return this._position;
  }

  /** Re-sync the tracked position, e.g. after an out-of-band move. */
  setPosition(point: Point): void {
    this._position = { x: point.x, y: point.y };
  }

  // ─── Pointer ───────────────────────────────────────────────────────────────

  /** Dispatch every point of an already generated path. */
  async movePath(path: readonly Point[]): Promise<void> {
    for (const point of path) {
      this._checkAborted("move");
      await this._executor.mouseMove(point.x, point.y);
      this._position = { x: point.x, y: point.y };
      await this._wait(this._engine.sample(MOVE_STEP_DELAY.min, MOVE_STEP_DELAY.max), "move");
    }
  }

  /** Generate a path from the tracked position and replay it. */
  async moveTo(target: Point, options: MoveOptions = {}): Promise<void> {
    const path = this._engine.generatePath(
      this._position,
      target,
      options.allowOvershoot ?? true,
    );
    await this.movePath(path);
  }

  /** Move to `target`, dwell, then press and release. */
  async click(target: Point, options: ClickOptions = {}): Promise<void> {
    const button = options.button ?? "left";

    await this.moveTo(target, options);
    await this._wait(this._engine.sample(HOVER_DWELL_DELAY.min, HOVER_DWELL_DELAY.max), "click");

    this._checkAborted("click");
    await this._executor.mouseDown(button);
    try {
      await this._wait(this._engine.sample(CLICK_HOLD_DELAY.min, CLICK_HOLD_DELAY.max), "click");
    } catch (err) {
      // Never leave the button held; the abort stays the reported error
      await this._releaseAfterAbort(button);
      throw err;
    }
    await this._executor.mouseUp(button);
  }

  // ─── Keyboard ──────────────────────────────────────────────────────────────

  /** Generate and replay a typing sequence. */
  async type(text: string, options: TypeOptions = {}): Promise<void> {
    const actions = this._engine.generateTyping(
      text,
      options.wpmMin,
      options.wpmMax,
      options.typoProbability,
    );
    await this.replayKeys(actions);
  }

  /** Replay an already generated typing sequence. */
  async replayKeys(actions: readonly KeyAction[]): Promise<void> {
    for (const action of actions) {
      this._checkAborted("type");
      if (action.kind === "key") {
        if (action.key === BACKSPACE) {
          await this._executor.pressBackspace();
        } else {
          await this._executor.typeCharacter(action.key);
        }
      }
      await this._wait(action.delayMs, "type");
    }
  }

  // ─── Scrolling ─────────────────────────────────────────────────────────────

  /** Generate and replay a vertical scroll. */
  async scroll(
    direction: ScrollDirectionInput,
    distance: number,
    options: ScrollOptions = {},
  ): Promise<void> {
    const actions = options.smooth
      ? this._engine.generateSmoothScroll(direction, distance)
      : this._engine.generateScroll(direction, distance, options.chunkMin, options.chunkMax);
    await this.replayScroll(actions);
  }

  /** Replay an already generated scroll sequence. */
  async replayScroll(actions: readonly ScrollAction[]): Promise<void> {
    for (const action of actions) {
      this._checkAborted("scroll");
      if (action.distance !== 0) {
        await this._executor.scroll(0, action.distance);
      }
      await this._wait(action.delayMs, "scroll");
    }
  }

  // ─── Shared Helpers ────────────────────────────────────────────────────────

  private async _wait(ms: number, operation: string): Promise<void> {
    const result = await this._engine.sleepMs(ms, this._signal);
    if (result === "cancelled") {
      throw new ReplayAbortedError(operation);
    }
  }

  private async _releaseAfterAbort(button: MouseButton): Promise<void> {
    try {
      await this._executor.mouseUp(button);
    } catch (err) {
      console.error("ActionReplayer: mouseUp failed after abort", err);
    }
  }

  private _checkAborted(operation: string): void {
    if (this._signal?.aborted) {
      throw new ReplayAbortedError(operation);
    }
  }
}
