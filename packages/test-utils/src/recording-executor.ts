/**
 * In-memory ActionExecutor for testing the replay layer.
 *
 * Every method is a vitest spy (vi.fn) and every call is also appended to
 * `calls` in dispatch order, so tests can assert the interleaving of
 * moves, clicks, keys and wheel events.
 *
 * @example
 * ```ts
 * const executor = new RecordingExecutor();
 * const replayer = new ActionReplayer({ engine, executor });
 *
 * await replayer.type("hi", { typoProbability: 0 });
 *
 * expect(executor.typed()).toBe("hi");
 * expect(executor.typeCharacter).toHaveBeenCalledTimes(2);
 * ```
 */
import { vi } from "vitest";
import type { Mock } from "vitest";

import type { ActionExecutor, MouseButton, Point } from "@human-input/core";

export type RecordedCall =
  | { readonly method: "mouseMove"; readonly x: number; readonly y: number }
  | { readonly method: "mouseDown"; readonly button: MouseButton }
  | { readonly method: "mouseUp"; readonly button: MouseButton }
  | { readonly method: "typeCharacter"; readonly char: string }
  | { readonly method: "pressBackspace" }
  | { readonly method: "scroll"; readonly deltaX: number; readonly deltaY: number };

export class RecordingExecutor implements ActionExecutor {
  readonly calls: RecordedCall[] = [];

  // ── Pointer ─────────────────────────────────────────────────────────────────

  mouseMove: Mock<(x: number, y: number) => Promise<void>> = vi.fn(async (x: number, y: number) => {
    this.calls.push({ method: "mouseMove", x, y });
  });

  mouseDown: Mock<(button?: MouseButton) => Promise<void>> = vi.fn(async (button: MouseButton = "left") => {
    this.calls.push({ method: "mouseDown", button });
  });

  mouseUp: Mock<(button?: MouseButton) => Promise<void>> = vi.fn(async (button: MouseButton = "left") => {
    this.calls.push({ method: "mouseUp", button });
  });

  // ── Keyboard ────────────────────────────────────────────────────────────────

  typeCharacter: Mock<(char: string) => Promise<void>> = vi.fn(async (char: string) => {
    this.calls.push({ method: "typeCharacter", char });
  });

  pressBackspace: Mock<() => Promise<void>> = vi.fn(async () => {
    this.calls.push({ method: "pressBackspace" });
  });

  // ── Wheel ───────────────────────────────────────────────────────────────────

  scroll: Mock<(deltaX: number, deltaY: number) => Promise<void>> = vi.fn(async (deltaX: number, deltaY: number) => {
    this.calls.push({ method: "scroll", deltaX, deltaY });
  });

  // ── Inspection ──────────────────────────────────────────────────────────────

  /** Method names in dispatch order. */
  methods(): string[] {
    return this.calls.map((call) => call.method);
  }

  /** Every pointer position dispatched, in order. */
  moves(): Point[] {
    const points: Point[] = [];
    for (const call of this.calls) {
      if (call.method === "mouseMove") points.push({ x: call.x, y: call.y });
    }
    return points;
  }

  /** What a text field would contain after the recorded keystrokes. */
  typed(): string {
    const buffer: string[] = [];
    for (const call of this.calls) {
      if (call.method === "typeCharacter") buffer.push(call.char);
      else if (call.method === "pressBackspace") buffer.pop();
    }
    return buffer.join("");
  }

  /** Sum of vertical wheel deltas. */
  scrolledY(): number {
    let total = 0;
    for (const call of this.calls) {
      if (call.method === "scroll") total += call.deltaY;
    }
    return total;
  }

  /** Forget recorded calls and reset every spy. */
  reset(): void {
    this.calls.length = 0;
    this.mouseMove.mockClear();
    this.mouseDown.mockClear();
    this.mouseUp.mockClear();
    this.typeCharacter.mockClear();
    this.pressBackspace.mockClear();
    this.scroll.mockClear();
  }
}
