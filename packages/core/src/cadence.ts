import { chance, clamp, createRandomSource, pick, uniform } from "./random.js";
import type { RandomFn } from "./random.js";
import { TimingService } from "./timing.js";
import { BACKSPACE } from "./types.js";
import type { KeyAction, Range } from "./types.js";

/**
 * Lowercase QWERTY neighbours used for typo substitution.
 */
const ADJACENT_KEYS: ReadonlyMap<string, readonly string[]> = new Map([
  ["a", ["s", "q", "w", "z", "x"]],
  ["b", ["v", "g", "h", "n"]],
  ["c", ["x", "d", "f", "v"]],
  ["d", ["s", "e", "r", "f", "c", "x"]],
  ["e", ["w", "r", "d", "s"]],
  ["f", ["d", "r", "t", "g", "v", "c"]],
  ["g", ["f", "t", "y", "h", "b", "v"]],
  ["h", ["g", "y", "u", "j", "n", "b"]],
  ["i", ["u", "o", "k", "j"]],
  ["j", ["h", "u", "i", "k", "m", "n"]],
  ["k", ["j", "i", "o", "l", ",", "m"]],
  ["l", ["k", "o", "p", ";", ".", ","]],
  ["m", ["n", "j", "k", ","]],
  ["n", ["b", "h", "j", "m"]],
  ["o", ["i", "p", "l", "k"]],
  ["p", ["o", "[", "]", "l", ";"]],
  ["q", ["w", "a"]],
  ["r", ["e", "t", "f", "d"]],
  ["s", ["a", "w", "e", "d", "x", "z"]],
  ["t", ["r", "y", "g", "f"]],
  ["u", ["y", "i", "j", "h"]],
  ["v", ["c", "f", "g", "b"]],
  ["w", ["q", "e", "s", "a"]],
  ["x", ["z", "s", "d", "c"]],
  ["y", ["t", "u", "h", "g"]],
  ["z", ["a", "s", "x"]],
]);

const WHITESPACE_KEYS = new Set([" ", "\n", "\t"]);
const PUNCTUATION_KEYS = new Set([".", ",", "!", "?"]);

/** Per-key variance around the base delay (±20%). */
const KEY_VARIANCE = { min: 0.8, max: 1.2 };
const WHITESPACE_FACTOR = { min: 1.5, max: 2.0 };
const PUNCTUATION_FACTOR = { min: 1.2, max: 1.5 };
const BACKSPACE_FACTOR = { min: 0.7, max: 0.9 };

/** Pause while noticing a typo, before the backspace (ms). */
export const TYPO_NOTICE_DELAY = { min: 100, max: 300 };

/** Characters per "word" in WPM: five letters plus a space. */
const CHARS_PER_WORD = 6;

/**
 * What a text field holds after replaying `actions`: keys append,
 * backspaces delete the last character.
 */
export function replayedText(actions: readonly KeyAction[]): string {
  const buffer: string[] = [];
  for (const action of actions) {
    if (action.kind !== "key") continue;
    if (action.key === BACKSPACE) {
      buffer.pop();
    } else {
      buffer.push(action.key);
    }
  }
  return buffer.join("");
}

/**
 * Keystroke cadence generator.
 *
 * Generates keystroke actions with timing modeled after human typing:
 * - One WPM drawn per call (speed doesn't change mid-sentence)
 * - ±20% per-key variance, slower on whitespace and punctuation
 * - Typo injection with a notice pause, backspace and correction
 * - Sub-millisecond offset on every delay
 */
export class CadenceGenerator {
  private readonly _random: RandomFn;
  private readonly _timing: TimingService;

  constructor(random?: RandomFn, timing?: TimingService) {
    this._random = random ?? createRandomSource();
    this._timing = timing ?? new TimingService(this._random);
  }

  generateTyping(
    text: string,
    wpmRange: Range,
    typoProbability: number,
  ): KeyAction[] {
    const chars = Array.from(text);
    if (chars.length === 0) return [];

    // Inverted ranges are swapped, as resolveConfig does
    const lowWpm = finiteOr(wpmRange.min, 1);
    const highWpm = finiteOr(wpmRange.max, lowWpm);
    const minWpm = Math.max(1, Math.min(lowWpm, highWpm));
    const maxWpm = Math.max(1, lowWpm, highWpm);
    const typoRate = clamp(finiteOr(typoProbability, 0), 0, 1);

    const wpm = uniform(this._random, minWpm, maxWpm);
    const baseDelaySeconds = 60 / wpm / CHARS_PER_WORD;

    const actions: KeyAction[] = [];

    for (let i = 0; i < chars.length; i++) {
      const char = chars[i];
      const makeTypo = chance(this._random, typoRate);

      // Never end on a mistake
      if (makeTypo && i < chars.length - 1) {
        actions.push(
          { kind: "key", key: this.typoFor(char), delayMs: this._keyDelay(baseDelaySeconds, char) },
          {
            kind: "delay",
            delayMs: this._timing.humanizeMs(
              uniform(this._random, TYPO_NOTICE_DELAY.min, TYPO_NOTICE_DELAY.max),
            ),
          },
          { kind: "key", key: BACKSPACE, delayMs: this._keyDelay(baseDelaySeconds, BACKSPACE) },
        );
      }

      actions.push({
        kind: "key",
        key: char,
        delayMs: this._keyDelay(baseDelaySeconds, char),
      });
    }

    return actions;
  }

  /**
   * Pick a plausible mistype for `char`: a QWERTY neighbour with the same
   * case. Space becomes "x", a digit its predecessor, anything else itself.
   */
  typoFor(char: string): string {
    const lower = char.toLowerCase();
    const neighbours = ADJACENT_KEYS.get(lower);

    if (neighbours) {
      const typo = pick(this._random, neighbours);
      return char === lower ? typo : typo.toUpperCase();
    }
    if (char === " ") return "x";
    if (char >= "0" && char <= "9" && char.length === 1) {
      return char === "0" ? "9" : String.fromCharCode(char.charCodeAt(0) - 1);
    }
    return char;
  }

  private _keyDelay(baseDelaySeconds: number, char: string): number {
    let delay = baseDelaySeconds * uniform(this._random, KEY_VARIANCE.min, KEY_VARIANCE.max);

    if (WHITESPACE_KEYS.has(char)) {
      delay *= uniform(this._random, WHITESPACE_FACTOR.min, WHITESPACE_FACTOR.max);
    } else if (PUNCTUATION_KEYS.has(char)) {
      delay *= uniform(this._random, PUNCTUATION_FACTOR.min, PUNCTUATION_FACTOR.max);
    } else if (char === BACKSPACE) {
      delay *= uniform(this._random, BACKSPACE_FACTOR.min, BACKSPACE_FACTOR.max);
    }

    return this._timing.humanizeMs(delay * 1000);
  }
}

function finiteOr(value: number, fallback: number): number {
  return Number.isFinite(value) ? value : fallback;
}
