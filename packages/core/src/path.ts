import type { HumanInputConfig } from "./config.js";
import { chance, clamp, createRandomSource, uniform } from "./random.js";
import type { RandomFn } from "./random.js";
import type { Point } from "./types.js";

/** Moves shorter than this (px) collapse to a single point. */
export const MIN_MOVEMENT_DISTANCE = 1;

/** Step count bounds for a primary segment. */
export const MIN_STEPS = 10;
export const MAX_STEPS = 100;

/** Pixels covered per step at speed factor 1. */
const STEP_DIVISOR = 10;

/** Correction steps per pixel of the full start→end distance. */
const CORRECTION_STEP_FACTOR = 0.2;
const MIN_CORRECTION_STEPS = 5;

// ─── Curve Math ──────────────────────────────────────────────────────────────

/** Euclidean distance between two points. */
export function distance(a: Point, b: Point): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

/**
 * Ease-in-out cubic. Maps [0, 1] onto [0, 1] with slow ends and a fast
 * middle, matching a human hand's acceleration profile.
 */
export function easeInOutCubic(t: number): number {
  const x = clamp(t, 0, 1);
  return x < 0.5 ? 4 * x * x * x : 1 - Math.pow(-2 * x + 2, 3) / 2;
}

/**
 * Evaluate a cubic Bezier curve at parameter t.
 */
export function cubicBezier(
  p0: Point,
  p1: Point,
  p2: Point,
  p3: Point,
  t: number,
): Point {
  const u = 1 - t;
  const uu = u * u;
  const uuu = uu * u;
  const tt = t * t;
  const ttt = tt * t;

  return {
    x: uuu * p0.x + 3 * uu * t * p1.x + 3 * u * tt * p2.x + ttt * p3.x,
    y: uuu * p0.y + 3 * uu * t * p1.y + 3 * u * tt * p2.y + ttt * p3.y,
  };
}

// ─── Generator ───────────────────────────────────────────────────────────────

/**
 * Cursor path generator using eased cubic Bezier curves.
 *
 * Produces a trajectory by:
 * - Bowing the curve along the perpendicular of the start→target line, with
 *   control points on opposite sides (a gentle S)
 * - Sampling through an ease-in-out cubic so points bunch at both ends
 * - Scaling step count with distance and a per-call speed factor
 * - Optionally aiming past the target and appending a corrective segment
 *
 * The generator owns no cursor state; the caller supplies the start point
 * on every call.
 */
export class PathGenerator {
  private readonly _config: HumanInputConfig;
  private readonly _random: RandomFn;

  constructor(config: HumanInputConfig, random?: RandomFn) {
    this._config = config;
    this._random = random ?? createRandomSource();
  }

  /**
   * Generate a path from `start` to `end`. The last point always equals
   * `end`; the first point is the curve's start, not a copy of the cursor.
   */
  generatePath(start: Point, end: Point, allowOvershoot: boolean): Point[] {
    const total = distance(start, end);

    if (!(total >= MIN_MOVEMENT_DISTANCE)) {
      return [{ x: end.x, y: end.y }];
    }

    const primary =
      allowOvershoot && chance(this._random, this._config.overshootChance)
        ? this._overshootPoint(start, end, total)
        : end;

    const points = this._segment(start, primary, this._stepsFor(total));

    if (primary.x !== end.x || primary.y !== end.y) {
      // Proportional to the full move, not the short correction
      const correctionSteps = Math.max(
        MIN_CORRECTION_STEPS,
        Math.floor(total * CORRECTION_STEP_FACTOR),
      );
      points.push(...this._segment(primary, end, correctionSteps));
    }

    points[points.length - 1] = { x: end.x, y: end.y };
    return points;
  }

  /**
   * Extend past `end` along the start→end direction by a random fraction
   * of the full distance.
   */
  private _overshootPoint(start: Point, end: Point, total: number): Point {
    const { min, max } = this._config.overshootDistance;
    const extra = total * uniform(this._random, min, max);
    return {
      x: end.x + ((end.x - start.x) / total) * extra,
      y: end.y + ((end.y - start.y) / total) * extra,
    };
  }

  private _stepsFor(total: number): number {
    const { min, max } = this._config.mouseSpeed;
    const speed = uniform(this._random, min, max);
    // speed 0 gives Infinity, which the clamp caps
    return clamp(Math.floor(total / (STEP_DIVISOR * speed)), MIN_STEPS, MAX_STEPS);
  }

  private _segment(from: Point, to: Point, steps: number): Point[] {
    const [cp1, cp2] = this._controlPoints(from, to);
    const points: Point[] = [];

    for (let i = 0; i < steps; i++) {
      const t = steps === 1 ? 1 : i / (steps - 1);
      points.push(cubicBezier(from, cp1, cp2, to, easeInOutCubic(t)));
    }

    return points;
  }

  /**
   * Place two control points offset along the perpendicular of the
   * from→to line: cp1 near `from` on one side, cp2 near `to` on the other.
   */
  private _controlPoints(from: Point, to: Point): [Point, Point] {
    const dx = to.x - from.x;
    const dy = to.y - from.y;
    const length = Math.hypot(dx, dy);

    // Perpendicular to the line: rotate (dx, dy) by 90 degrees
    let perpX = -dy;
    let perpY = dx;

    if (length > 0) {
      const { min, max } = this._config.controlPointOffset;
      const amplitude = uniform(this._random, min, max) * length;
      perpX = (perpX / length) * amplitude;
      perpY = (perpY / length) * amplitude;
    }

    const spread = this._config.controlPointSpread;
    const spread1 = uniform(this._random, spread.min, spread.max);
    const spread2 = uniform(this._random, spread.min, spread.max);

    return [
      { x: from.x + perpX * spread1, y: from.y + perpY * spread1 },
      { x: to.x - perpX * spread2, y: to.y - perpY * spread2 },
    ];
  }
}
