// @human-input/core
// Human-plausible input synthesis: pointer paths, keystroke cadence,
// chunked scrolling and randomized waits.

export { HumanInputEngine } from "./engine.js";
export type { HumanInputEngineOptions, EngineRandomSources } from "./engine.js";

export {
  DEFAULT_CONFIG,
  ENV_PREFIX,
  resolveConfig,
  parseSettings,
  settingsSchema,
  loadSettingsFromEnv,
  defaultStartPosition,
} from "./config.js";
export type { HumanInputConfig, HumanInputSettings } from "./config.js";

export {
  PathGenerator,
  MIN_MOVEMENT_DISTANCE,
  MIN_STEPS,
  MAX_STEPS,
  distance,
  easeInOutCubic,
  cubicBezier,
} from "./path.js";

export { CadenceGenerator, TYPO_NOTICE_DELAY, replayedText } from "./cadence.js";

export { ScrollGenerator, SETTLE_PAUSE, normalizeDirection } from "./scroll.js";

export { TimingService, MIN_DELAY_MS, MAX_TIMER_MS, FRACTIONAL_OFFSET_MS } from "./timing.js";

export {
  createRandomSource,
  uniform,
  uniformInt,
  gaussian,
  chance,
  pick,
  clamp,
} from "./random.js";
export type { RandomFn } from "./random.js";

export {
  ActionReplayer,
  MOVE_STEP_DELAY,
  HOVER_DWELL_DELAY,
  CLICK_HOLD_DELAY,
} from "./replay.js";
export type {
  ActionExecutor,
  ActionReplayerConfig,
  MoveOptions,
  ClickOptions,
  TypeOptions,
  ScrollOptions,
} from "./replay.js";

export { HumanInputError, ReplayAbortedError } from "./errors.js";

export { BACKSPACE } from "./types.js";
export type {
  Point,
  ViewportSize,
  Range,
  MouseButton,
  KeyAction,
  KeyPressAction,
  KeyDelayAction,
  ScrollAction,
  ScrollDirection,
  ScrollDirectionInput,
  SleepResult,
} from "./types.js";
