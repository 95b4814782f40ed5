import type { ActionExecutor, MouseButton } from "@human-input/core";

/**
 * The slice of a Puppeteer Page the executor drives. A `Page` satisfies it
 * directly; tests pass a plain object.
 */
export interface PageInput {
  readonly mouse: {
    move(x: number, y: number): Promise<void>;
    down(options?: { button?: MouseButton }): Promise<void>;
    up(options?: { button?: MouseButton }): Promise<void>;
    wheel(options?: { deltaX?: number; deltaY?: number }): Promise<void>;
  };
  readonly keyboard: {
    press(key: string): Promise<void>;
    type(text: string): Promise<void>;
  };
}

/**
 * Maps each replayed primitive onto one `PageInput` call: pointer moves and
 * wheel deltas go to `mouse`, characters are sent one at a time through
 * `keyboard.type`, and a correction's BACKSPACE becomes
 * `keyboard.press("Backspace")`. Buttons default to "left".
 */
export class PuppeteerActionExecutor implements ActionExecutor {
  private readonly _page: PageInput;

  constructor(page: PageInput) {
    this._page = page;
  }

  async mouseMove(x: number, y: number): Promise<void> {
    await this._page.mouse.move(x, y);
  }

  async mouseDown(button?: MouseButton): Promise<void> {
    await this._page.mouse.down({ button: button ?? "left" });
  }

  async mouseUp(button?: MouseButton): Promise<void> {
    await this._page.mouse.up({ button: button ?? "left" });
  }

  async typeCharacter(char: string): Promise<void> {
    // type() maps "\n" to Enter and sends other characters as text input
    await this._page.keyboard.type(char);
  }

  async pressBackspace(): Promise<void> {
    await this._page.keyboard.press("Backspace");
  }

  async scroll(deltaX: number, deltaY: number): Promise<void> {
    // Wheel event at the current mouse position
    await this._page.mouse.wheel({ deltaX, deltaY });
  }
}
