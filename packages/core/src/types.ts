// ─── Geometry ────────────────────────────────────────────────────────────────

/** Point in 2D screen coordinates. */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/** Viewport dimensions in CSS pixels. */
export interface ViewportSize {
  readonly width: number;
  readonly height: number;
}

/** Inclusive numeric range. */
export interface Range {
  readonly min: number;
  readonly max: number;
}

/** Mouse button type. */
export type MouseButton = "left" | "right" | "middle";

// ─── Keyboard ────────────────────────────────────────────────────────────────

/** Reserved key value meaning "press backspace". */
export const BACKSPACE = "\b";

/** Press a single character, then wait `delayMs`. */
export interface KeyPressAction {
  readonly kind: "key";
  /** The character to type, or {@link BACKSPACE}. */
  readonly key: string;
  readonly delayMs: number;
}

/** Pause without pressing anything. */
export interface KeyDelayAction {
  readonly kind: "delay";
  readonly delayMs: number;
}

/**
 * One step of a typing sequence. Order is the order in which keys must be
 * replayed; typo corrections appear inline.
 */
export type KeyAction = KeyPressAction | KeyDelayAction;

// ─── Scrolling ───────────────────────────────────────────────────────────────

/** Canonical scroll direction. Forward scrolls down the page. */
export type ScrollDirection = "forward" | "backward";

/** Scroll direction as accepted at the API boundary. */
export type ScrollDirectionInput = ScrollDirection | "down" | "up";

/**
 * One scroll burst. `distance` is a signed whole number of pixels; a zero
 * distance with a positive delay is a reading pause.
 */
export interface ScrollAction {
  readonly distance: number;
  readonly delayMs: number;
}

// ─── Timing ──────────────────────────────────────────────────────────────────

/** Outcome of a cancellable sleep. */
export type SleepResult = "completed" | "cancelled";
