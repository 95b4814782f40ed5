import { describe, it, expect } from "vitest";
import { constantRandom } from "@human-input/test-utils";
import { ScrollGenerator, normalizeDirection } from "../scroll.js";
import { createRandomSource } from "../random.js";
import type { ScrollAction } from "../types.js";

const CHUNKS = { min: 50, max: 200 };

function distances(actions: readonly ScrollAction[]): number[] {
  return actions.map((action) => action.distance);
}

function sum(actions: readonly ScrollAction[]): number {
  return actions.reduce((total, action) => total + action.distance, 0);
}

describe("normalizeDirection", () => {
  it("maps aliases onto forward and backward", () => {
    expect(normalizeDirection("down")).toBe("forward");
    expect(normalizeDirection("forward")).toBe("forward");
    expect(normalizeDirection("up")).toBe("backward");
    expect(normalizeDirection("backward")).toBe("backward");
  });
});

describe("ScrollGenerator.generateScroll", () => {
  const generator = new ScrollGenerator(constantRandom(0.5));

  it("sizes chunks along the ease curve", () => {
    // 4 planned chunks at t = 0, 1/3, 2/3, 1, then 1 px left over
    const actions = generator.generateScroll("forward", 500, CHUNKS);
    expect(distances(actions)).toEqual([50, 72, 177, 200, 1, 0]);
  });

  it("lingers on edge chunks", () => {
    const actions = generator.generateScroll("forward", 500, CHUNKS);
    // (50 + 0.5 × 50) × 1.75 + 10
    expect(actions[0].delayMs).toBeCloseTo(141.25, 6);
    // (50 + 0.5 × 72) × 0.85 + 10
    expect(actions[1].delayMs).toBeCloseTo(83.1, 6);
    // (50 + 0.5 × 1) × 1.75 + 10
    expect(actions[4].delayMs).toBeCloseTo(98.375, 6);
  });

  it("ends with a reading pause", () => {
    const actions = generator.generateScroll("forward", 500, CHUNKS);
    const last = actions[actions.length - 1];
    expect(last.distance).toBe(0);
    expect(last.delayMs).toBeCloseTo(350.055, 6);
  });

  it("signs distances by direction", () => {
    const actions = generator.generateScroll("up", 500, CHUNKS);
    expect(distances(actions)).toEqual([-50, -72, -177, -200, -1, 0]);
    expect(sum(actions)).toBe(-500);
  });

  it("uses a single chunk for short scrolls", () => {
    expect(distances(generator.generateScroll("down", 40, CHUNKS))).toEqual([40, 0]);
  });

  it("swaps an inverted chunk range", () => {
    const actions = generator.generateScroll("forward", 500, { min: 200, max: 50 });
    expect(distances(actions)).toEqual([50, 72, 177, 200, 1, 0]);
  });

  it("returns nothing for zero distance", () => {
    expect(generator.generateScroll("forward", 0, CHUNKS)).toEqual([]);
    expect(generator.generateScroll("forward", 0.4, CHUNKS)).toEqual([]);
    expect(generator.generateScroll("forward", Number.NaN, CHUNKS)).toEqual([]);
  });

  it("rounds to whole pixels", () => {
    expect(sum(generator.generateScroll("forward", 99.6, CHUNKS))).toBe(100);
  });

  it("always sums to the requested distance", () => {
    const random = new ScrollGenerator(createRandomSource(8));
    for (const total of [1, 37, 250, 999, 4321]) {
      const actions = random.generateScroll("forward", total, CHUNKS);
      expect(sum(actions)).toBe(total);
      for (const action of actions.slice(0, -1)) {
        expect(Number.isInteger(action.distance)).toBe(true);
        expect(action.distance).toBeGreaterThan(0);
      }
    }
  });
});

describe("ScrollGenerator.generateSmoothScroll", () => {
  const generator = new ScrollGenerator(constantRandom(0.5));

  it("spreads the remainder over the first steps", () => {
    // 15 steps: 100 = 10 × 7 + 5 × 6
    const actions = generator.generateSmoothScroll("forward", 100);
    expect(distances(actions)).toEqual([7, 7, 7, 7, 7, 7, 7, 7, 7, 7, 6, 6, 6, 6, 6]);
    for (const action of actions) {
      expect(action.delayMs).toBeCloseTo(20.055, 6);
    }
  });

  it("scrolls backward with negative steps", () => {
    expect(sum(generator.generateSmoothScroll("up", 100))).toBe(-100);
  });

  it("never uses more steps than pixels", () => {
    expect(distances(generator.generateSmoothScroll("forward", 5))).toEqual([1, 1, 1, 1, 1]);
  });

  it("returns nothing for zero distance", () => {
    expect(generator.generateSmoothScroll("forward", 0)).toEqual([]);
  });
});
