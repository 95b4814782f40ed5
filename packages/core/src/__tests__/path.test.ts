import { describe, it, expect } from "vitest";
import { constantRandom } from "@human-input/test-utils";
import {
  MAX_STEPS,
  MIN_STEPS,
  PathGenerator,
  cubicBezier,
  distance,
  easeInOutCubic,
} from "../path.js";
import { resolveConfig } from "../config.js";
import type { HumanInputSettings } from "../config.js";
import { createRandomSource } from "../random.js";

const ORIGIN = { x: 0, y: 0 };

function makeGenerator(settings: HumanInputSettings = {}, random = constantRandom(0.5)) {
  return new PathGenerator(resolveConfig(settings), random);
}

// ─── Curve Math ──────────────────────────────────────────────────────────────

describe("easeInOutCubic", () => {
  it("fixes the endpoints and the midpoint", () => {
    expect(easeInOutCubic(0)).toBe(0);
    expect(easeInOutCubic(0.5)).toBe(0.5);
    expect(easeInOutCubic(1)).toBe(1);
  });

  it("is slow at the start", () => {
    expect(easeInOutCubic(0.25)).toBe(0.0625);
    expect(easeInOutCubic(0.75)).toBe(0.9375);
  });

  it("clamps out-of-range input", () => {
    expect(easeInOutCubic(-1)).toBe(0);
    expect(easeInOutCubic(2)).toBe(1);
  });
});

describe("cubicBezier", () => {
  const p0 = { x: 0, y: 0 };
  const p1 = { x: 10, y: 40 };
  const p2 = { x: 90, y: -40 };
  const p3 = { x: 100, y: 0 };

  it("starts and ends at the anchors", () => {
    expect(cubicBezier(p0, p1, p2, p3, 0)).toEqual(p0);
    expect(cubicBezier(p0, p1, p2, p3, 1)).toEqual(p3);
  });

  it("evaluates the midpoint", () => {
    // (p0 + 3p1 + 3p2 + p3) / 8
    const mid = cubicBezier(p0, p1, p2, p3, 0.5);
    expect(mid.x).toBeCloseTo(50, 10);
    expect(mid.y).toBeCloseTo(0, 10);
  });
});

describe("distance", () => {
  it("is euclidean", () => {
    expect(distance(ORIGIN, { x: 3, y: 4 })).toBe(5);
  });
});

// ─── PathGenerator ───────────────────────────────────────────────────────────

describe("PathGenerator", () => {
  it("ends exactly at the target", () => {
    const path = makeGenerator().generatePath({ x: 17.3, y: 4 }, { x: 812.6, y: 433.1 }, true);
    expect(path[path.length - 1]).toEqual({ x: 812.6, y: 433.1 });
  });

  it("returns the target alone for moves under a pixel", () => {
    const generator = makeGenerator();
    expect(generator.generatePath({ x: 10, y: 10 }, { x: 10.5, y: 10 }, true)).toEqual([
      { x: 10.5, y: 10 },
    ]);
    expect(generator.generatePath({ x: 10, y: 10 }, { x: 10, y: 10 }, true)).toEqual([
      { x: 10, y: 10 },
    ]);
  });

  it("returns the target alone for non-finite coordinates", () => {
    const path = makeGenerator().generatePath({ x: Number.NaN, y: 0 }, { x: 5, y: 5 }, true);
    expect(path).toEqual([{ x: 5, y: 5 }]);
  });

  describe("a 400 px horizontal move at midpoint draws", () => {
    // speed 1.0 → 400 / 10 = 40 steps; amplitude 0.2 × 400 = 80; spread 0.55 → ±44
    const path = makeGenerator().generatePath(ORIGIN, { x: 400, y: 0 }, false);

    it("has one point per step", () => {
      expect(path).toHaveLength(40);
    });

    it("starts at the curve start", () => {
      expect(path[0].x).toBeCloseTo(0, 10);
      expect(path[0].y).toBeCloseTo(0, 10);
    });

    it("bows to opposite sides in each half", () => {
      expect(path[5].y).toBeGreaterThan(0);
      expect(path[34].y).toBeLessThan(0);
      for (const point of path) {
        expect(Math.abs(point.y)).toBeLessThan(44);
      }
    });

    it("advances monotonically along the line", () => {
      for (let i = 1; i < path.length; i++) {
        expect(path[i].x).toBeGreaterThanOrEqual(path[i - 1].x);
      }
    });

    it("bunches points at the ends", () => {
      const firstGap = path[1].x - path[0].x;
      const middleGap = path[20].x - path[19].x;
      expect(firstGap).toBeLessThan(middleGap);
    });
  });

  it("clamps the step count", () => {
    const generator = makeGenerator();
    expect(generator.generatePath(ORIGIN, { x: 50, y: 0 }, false)).toHaveLength(MIN_STEPS);
    expect(generator.generatePath(ORIGIN, { x: 5000, y: 0 }, false)).toHaveLength(MAX_STEPS);
  });

  it("uses fewer steps at a higher speed", () => {
    const path = makeGenerator({ mouseSpeed: { min: 2, max: 2 } }).generatePath(
      ORIGIN,
      { x: 400, y: 0 },
      false,
    );
    expect(path).toHaveLength(20);
  });

  it("caps the steps at zero speed", () => {
    const path = makeGenerator({ mouseSpeed: { min: 0, max: 0 } }).generatePath(
      ORIGIN,
      { x: 400, y: 0 },
      false,
    );
    expect(path).toHaveLength(MAX_STEPS);
  });

  it("never overshoots when the chance is 0", () => {
    const path = makeGenerator({ overshootChance: 0 }).generatePath(ORIGIN, { x: 400, y: 0 }, true);
    expect(path).toHaveLength(40);
  });

  describe("overshoot", () => {
    const settings: HumanInputSettings = {
      overshootChance: 1,
      overshootDistance: { min: 0.1, max: 0.1 },
    };
    const end = { x: 500, y: 300 };

    it("aims past the target and corrects back", () => {
      // |path| = 583.1: 58 primary steps, floor(0.2 × 583.1) = 116 correction steps
      const path = makeGenerator(settings).generatePath(ORIGIN, end, true);

      expect(path).toHaveLength(58 + 116);
      expect(path[57].x).toBeCloseTo(550, 6);
      expect(path[57].y).toBeCloseTo(330, 6);
      expect(path.some((p) => p.x > end.x)).toBe(true);
      expect(path[path.length - 1]).toEqual(end);
    });

    it("is skipped when the caller disallows it", () => {
      const path = makeGenerator(settings).generatePath(ORIGIN, end, false);
      expect(path).toHaveLength(58);
    });

    it("corrects with at least five steps", () => {
      // |path| = 20: 10 primary steps, max(5, 4) correction steps
      const path = makeGenerator(settings).generatePath(ORIGIN, { x: 20, y: 0 }, true);
      expect(path).toHaveLength(15);
    });
  });

  it("produces different paths across calls", () => {
    const generator = new PathGenerator(resolveConfig(), createRandomSource());
    const paths = Array.from({ length: 5 }, () =>
      JSON.stringify(generator.generatePath(ORIGIN, { x: 640, y: 360 }, true)),
    );
    expect(new Set(paths).size).toBeGreaterThan(1);
  });

  it("is reproducible for a seeded source", () => {
    const a = makeGenerator({}, createRandomSource(99)).generatePath(ORIGIN, { x: 640, y: 360 }, true);
    const b = makeGenerator({}, createRandomSource(99)).generatePath(ORIGIN, { x: 640, y: 360 }, true);
    expect(a).toEqual(b);
  });
});
