import type { Page } from "puppeteer-core";

import { ActionReplayer, HumanInputEngine } from "@human-input/core";
import type { HumanInputEngineOptions, Point } from "@human-input/core";

import { PuppeteerActionExecutor } from "./page-executor.js";

export interface HumanPageOptions extends HumanInputEngineOptions {
  /** Cancels every in-progress action on this page. */
  readonly signal?: AbortSignal;
  /** Known cursor position; defaults to the viewport center. */
  readonly startPosition?: Point;
}

/**
 * Wire an engine, a replayer and a Puppeteer executor to one page.
 *
 * When the settings name no viewport, the page's own viewport is used so
 * the default cursor position is its center.
 *
 * @example
 * ```ts
 * const human = createHumanPage(page, { config: loadSettingsFromEnv() });
 * await human.click({ x: 640, y: 220 });
 * await human.type("hello");
 * ```
 */
export function createHumanPage(page: Page, options: HumanPageOptions = {}): ActionReplayer {
  const viewport = page.viewport();
  const config =
    options.config?.viewport === undefined && viewport !== null
      ? { ...options.config, viewport: { width: viewport.width, height: viewport.height } }
      : options.config;

  const engine = new HumanInputEngine({ config, random: options.random });
  return new ActionReplayer({
    engine,
    executor: new PuppeteerActionExecutor(page),
    signal: options.signal,
    startPosition: options.startPosition,
  });
}
