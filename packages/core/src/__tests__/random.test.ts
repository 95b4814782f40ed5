import { describe, it, expect } from "vitest";
import { constantRandom, seededRandom } from "@human-input/test-utils";
import {
  chance,
  clamp,
  createRandomSource,
  gaussian,
  pick,
  uniform,
  uniformInt,
} from "../random.js";

describe("createRandomSource", () => {
  it("is reproducible for a given seed", () => {
    const a = createRandomSource(42);
    const b = createRandomSource(42);
    const seqA = Array.from({ length: 10 }, () => a());
    const seqB = Array.from({ length: 10 }, () => b());
    expect(seqA).toEqual(seqB);
  });

  it("diverges for different seeds", () => {
    const a = createRandomSource(1);
    const b = createRandomSource(2);
    expect(a()).not.toBe(b());
  });

  it("returns values in [0, 1)", () => {
    const random = createRandomSource(7);
    for (let i = 0; i < 1000; i++) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it("gives unseeded sources independent streams", () => {
    const a = createRandomSource();
    const b = createRandomSource();
    const seqA = Array.from({ length: 5 }, () => a());
    const seqB = Array.from({ length: 5 }, () => b());
    expect(seqA).not.toEqual(seqB);
  });
});

describe("uniform", () => {
  it("maps the draw onto the range", () => {
    expect(uniform(constantRandom(0), 10, 20)).toBe(10);
    expect(uniform(constantRandom(0.5), 10, 20)).toBe(15);
  });
});

describe("uniformInt", () => {
  it("covers both bounds", () => {
    expect(uniformInt(constantRandom(0), 1, 3)).toBe(1);
    expect(uniformInt(constantRandom(0.999), 1, 3)).toBe(3);
  });

  it("accepts reversed bounds", () => {
    expect(uniformInt(constantRandom(0), 3, 1)).toBe(1);
  });

  it("returns the bound of a single-value range", () => {
    expect(uniformInt(constantRandom(0.7), 5, 5)).toBe(5);
  });
});

describe("gaussian", () => {
  it("applies the Box-Muller transform", () => {
    // sqrt(-2 ln e^-2) * cos(0) = 2
    const random = seededRandom([Math.exp(-2), 0]);
    expect(gaussian(random, 10, 3)).toBeCloseTo(16, 10);
  });

  it("stays finite when the first draw is 0", () => {
    expect(Number.isFinite(gaussian(seededRandom([0, 0]), 0, 1))).toBe(true);
  });
});

describe("chance", () => {
  it("succeeds when the draw is below p", () => {
    expect(chance(constantRandom(0.3), 0.5)).toBe(true);
    expect(chance(constantRandom(0.5), 0.5)).toBe(false);
  });

  it("never succeeds at p = 0", () => {
    expect(chance(constantRandom(0), 0)).toBe(false);
  });
});

describe("pick", () => {
  it("maps the draw onto an index", () => {
    expect(pick(constantRandom(0), ["a", "b", "c"])).toBe("a");
    expect(pick(constantRandom(0.5), ["a", "b", "c"])).toBe("b");
  });

  it("never indexes past the end", () => {
    expect(pick(constantRandom(1), ["a", "b", "c"])).toBe("c");
  });
});

describe("clamp", () => {
  it("clamps to the bounds", () => {
    expect(clamp(-1, 0, 10)).toBe(0);
    expect(clamp(11, 0, 10)).toBe(10);
    expect(clamp(5, 0, 10)).toBe(5);
  });
});
