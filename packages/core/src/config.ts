import { z } from "zod";

import type { Point, Range, ViewportSize } from "./types.js";

/**
 * Resolved engine configuration. Built once, frozen, and shared read-only
 * by every generator.
 */
export interface HumanInputConfig {
  /** Speed factor range; higher means fewer path steps. */
  readonly mouseSpeed: Range;
  /** Probability of overshooting when a path allows it. */
  readonly overshootChance: number;
  /** Overshoot distance as a fraction of the path length. */
  readonly overshootDistance: Range;
  /** Curve arc amplitude as a fraction of the segment length. */
  readonly controlPointOffset: Range;
  /** Per-control-point fraction of the arc amplitude. */
  readonly controlPointSpread: Range;
  /** Words-per-minute range for typing. */
  readonly typingWpm: Range;
  /** Per-character typo probability. */
  readonly typoProbability: number;
  /** Scroll chunk size range in pixels. */
  readonly scrollChunk: Range;
  /** Default range for `sleepRange`, in seconds. */
  readonly baseDelay: Range;
  /** Viewport used to derive the default cursor start position. */
  readonly viewport: ViewportSize;
}

/** Externally supplied settings. Every field is optional. */
export interface HumanInputSettings {
  readonly mouseSpeed?: Partial<Range>;
  readonly overshootChance?: number;
  readonly overshootDistance?: Partial<Range>;
  readonly controlPointOffset?: Partial<Range>;
  readonly controlPointSpread?: Partial<Range>;
  readonly typingWpm?: Partial<Range>;
  readonly typoProbability?: number;
  readonly scrollChunk?: Partial<Range>;
  readonly baseDelay?: Partial<Range>;
  readonly viewport?: Partial<ViewportSize>;
}

export const DEFAULT_CONFIG: HumanInputConfig = deepFreeze({
  mouseSpeed: { min: 0.5, max: 1.5 },
  overshootChance: 0.3,
  overshootDistance: { min: 0.05, max: 0.15 },
  controlPointOffset: { min: 0.1, max: 0.3 },
  controlPointSpread: { min: 0.3, max: 0.8 },
  typingWpm: { min: 40, max: 80 },
  typoProbability: 0.02,
  scrollChunk: { min: 50, max: 200 },
  baseDelay: { min: 0.1, max: 0.5 },
  viewport: { width: 1920, height: 1080 },
});

type RangeField =
  | "mouseSpeed"
  | "overshootDistance"
  | "controlPointOffset"
  | "controlPointSpread"
  | "typingWpm"
  | "scrollChunk"
  | "baseDelay";

type ProbabilityField = "overshootChance" | "typoProbability";

const RANGE_FIELDS: readonly RangeField[] = [
  "mouseSpeed",
  "overshootDistance",
  "controlPointOffset",
  "controlPointSpread",
  "typingWpm",
  "scrollChunk",
  "baseDelay",
];

const PROBABILITY_FIELDS: readonly ProbabilityField[] = [
  "overshootChance",
  "typoProbability",
];

/** Lowest allowed `min` per range; ranges not listed floor at 0. */
const RANGE_FLOORS: Partial<Record<RangeField, number>> = {
  typingWpm: 1,
  scrollChunk: 1,
};

// ─── Normalization ───────────────────────────────────────────────────────────

function warn(message: string): void {
  console.warn(`HumanInputConfig: ${message}`);
}

function deepFreeze<T extends object>(value: T): T {
  for (const nested of Object.values(value)) {
    if (typeof nested === "object" && nested !== null) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

function normalizeNumber(
  field: string,
  value: number | undefined,
  fallback: number,
): number {
  if (value === undefined) return fallback;
  if (!Number.isFinite(value)) {
    warn(`${field} is not a finite number; using ${fallback}`);
    return fallback;
  }
  if (value < 0) {
    warn(`${field} is negative (${value}); using 0`);
    return 0;
  }
  return value;
}

function normalizeRange(
  field: RangeField,
  value: Partial<Range> | undefined,
  fallback: Range,
): Range {
  let min = normalizeNumber(`${field}.min`, value?.min, fallback.min);
  let max = normalizeNumber(`${field}.max`, value?.max, fallback.max);

  if (max < min) {
    warn(`${field} has min ${min} above max ${max}; swapping`);
    [min, max] = [max, min];
  }

  const floor = RANGE_FLOORS[field] ?? 0;
  if (min < floor) {
    warn(`${field}.min ${min} is below ${floor}; raising`);
    min = floor;
  }
  if (max < floor) {
    max = floor;
  }

  return { min, max };
}

function normalizeProbability(
  field: ProbabilityField,
  value: number | undefined,
  fallback: number,
): number {
  const p = normalizeNumber(field, value, fallback);
  if (p > 1) {
    warn(`${field} ${p} is above 1; clamping`);
    return 1;
  }
  return p;
}

function normalizeDimension(
  field: "width" | "height",
  value: number | undefined,
  fallback: number,
): number {
  const size = normalizeNumber(`viewport.${field}`, value, fallback);
  if (size < 1) {
    warn(`viewport.${field} ${size} is below 1; using ${fallback}`);
    return fallback;
  }
  return size;
}

/**
 * Merge settings over {@link DEFAULT_CONFIG} and normalize them.
 *
 * Invalid values are corrected, never rejected: non-finite numbers fall
 * back to the default, negatives become 0, inverted ranges are swapped
 * and probabilities are clamped to [0, 1]. Each correction is reported
 * through `console.warn`.
 */
export function resolveConfig(settings: HumanInputSettings = {}): HumanInputConfig {
  const range = (field: RangeField): Range =>
    normalizeRange(field, settings[field], DEFAULT_CONFIG[field]);
  const probability = (field: ProbabilityField): number =>
    normalizeProbability(field, settings[field], DEFAULT_CONFIG[field]);

  return deepFreeze({
    mouseSpeed: range("mouseSpeed"),
    overshootChance: probability("overshootChance"),
    overshootDistance: range("overshootDistance"),
    controlPointOffset: range("controlPointOffset"),
    controlPointSpread: range("controlPointSpread"),
    typingWpm: range("typingWpm"),
    typoProbability: probability("typoProbability"),
    scrollChunk: range("scrollChunk"),
    baseDelay: range("baseDelay"),
    viewport: {
      width: normalizeDimension(
        "width",
        settings.viewport?.width,
        DEFAULT_CONFIG.viewport.width,
      ),
      height: normalizeDimension(
        "height",
        settings.viewport?.height,
        DEFAULT_CONFIG.viewport.height,
      ),
    },
  });
}

/** Cursor position assumed when the caller has none: the viewport center. */
export function defaultStartPosition(config: HumanInputConfig): Point {
  return {
    x: config.viewport.width / 2,
    y: config.viewport.height / 2,
  };
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

/**
 * Wrap a field schema so an invalid value is reported and dropped
 * (the default then applies) instead of failing the whole parse.
 */
function lenient<T extends z.ZodTypeAny>(field: string, schema: T) {
  return schema.optional().catch((ctx) => {
    const reasons = ctx.error.issues.map((issue) => issue.message).join("; ");
    warn(`ignoring invalid ${field}: ${reasons}`);
    return undefined;
  });
}

const rangeSchema = z.object({
  min: z.number().optional(),
  max: z.number().optional(),
});

/**
 * Schema for settings arriving as a plain struct from the surrounding
 * process (a parsed JSON file, a CLI layer, a job payload).
 */
export const settingsSchema = z
  .object({
    mouseSpeed: lenient("mouseSpeed", rangeSchema),
    overshootChance: lenient("overshootChance", z.number()),
    overshootDistance: lenient("overshootDistance", rangeSchema),
    controlPointOffset: lenient("controlPointOffset", rangeSchema),
    controlPointSpread: lenient("controlPointSpread", rangeSchema),
    typingWpm: lenient("typingWpm", rangeSchema),
    typoProbability: lenient("typoProbability", z.number()),
    scrollChunk: lenient("scrollChunk", rangeSchema),
    baseDelay: lenient("baseDelay", rangeSchema),
    viewport: lenient(
      "viewport",
      z.object({
        width: z.number().optional(),
        height: z.number().optional(),
      }),
    ),
  })
  .catch((ctx) => {
    warn(`settings must be an object (${ctx.error.issues[0]?.message ?? "invalid input"})`);
    return {};
  });

/** Validate an untrusted settings value. Never throws. */
export function parseSettings(input: unknown): HumanInputSettings {
  return settingsSchema.parse(input);
}

// ─── Environment ─────────────────────────────────────────────────────────────

export const ENV_PREFIX = "HUMAN_INPUT_";

const RANGE_ENV_NAMES: Record<RangeField, string> = {
  mouseSpeed: "MOUSE_SPEED",
  overshootDistance: "OVERSHOOT_DISTANCE",
  controlPointOffset: "CONTROL_POINT_OFFSET",
  controlPointSpread: "CONTROL_POINT_SPREAD",
  typingWpm: "TYPING_WPM",
  scrollChunk: "SCROLL_CHUNK",
  baseDelay: "BASE_DELAY",
};

const PROBABILITY_ENV_NAMES: Record<ProbabilityField, string> = {
  overshootChance: "OVERSHOOT_CHANCE",
  typoProbability: "TYPO_PROBABILITY",
};

const envNumber = z.string().trim().min(1).pipe(z.coerce.number().finite());

type MutableSettings = {
  -readonly [K in keyof HumanInputSettings]: HumanInputSettings[K];
};

/**
 * Read settings from `HUMAN_INPUT_*` environment variables, e.g.
 * `HUMAN_INPUT_TYPING_WPM_MIN=55` or `HUMAN_INPUT_VIEWPORT_WIDTH=1366`.
 * Unset variables are skipped; unparsable ones are reported and skipped.
 */
export function loadSettingsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): HumanInputSettings {
  const read = (suffix: string): number | undefined => {
    const name = `${ENV_PREFIX}${suffix}`;
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") return undefined;
    const result = envNumber.safeParse(raw);
    if (!result.success) {
      warn(`ignoring ${name}=${JSON.stringify(raw)}: not a number`);
      return undefined;
    }
    return result.data;
  };

  const settings: MutableSettings = {};

  for (const field of RANGE_FIELDS) {
    const min = read(`${RANGE_ENV_NAMES[field]}_MIN`);
    const max = read(`${RANGE_ENV_NAMES[field]}_MAX`);
    if (min !== undefined || max !== undefined) {
      settings[field] = { min, max };
    }
  }

  for (const field of PROBABILITY_FIELDS) {
    const value = read(PROBABILITY_ENV_NAMES[field]);
    if (value !== undefined) {
      settings[field] = value;
    }
  }

  const width = read("VIEWPORT_WIDTH");
  const height = read("VIEWPORT_HEIGHT");
  if (width !== undefined || height !== undefined) {
    settings.viewport = { width, height };
  }

  return settings;
}
