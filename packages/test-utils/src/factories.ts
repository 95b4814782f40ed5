/**
 * Factory functions for creating engines and configurations in tests.
 *
 * Every factory produces a deterministic instance: unless a random source
 * is passed, generators draw from a constant 0.5, which puts every uniform
 * sample at the midpoint of its range.
 */
import { HumanInputEngine, resolveConfig } from "@human-input/core";
import type {
  HumanInputConfig,
  HumanInputSettings,
  RandomFn,
} from "@human-input/core";

import { constantRandom } from "./random.js";

/** Resolved configuration with overrides. */
export function createConfig(overrides: HumanInputSettings = {}): HumanInputConfig {
  return resolveConfig(overrides);
}

/**
 * Create a HumanInputEngine for a test.
 *
 * @example
 * ```ts
 * const engine = createTestEngine(); // every draw is 0.5
 * const eager = createTestEngine({ config: { overshootChance: 1 } });
 * ```
 */
export function createTestEngine(
  options: { config?: HumanInputSettings; random?: RandomFn } = {},
): HumanInputEngine {
  return new HumanInputEngine({
    config: options.config,
    random: options.random ?? constantRandom(0.5),
  });
}
