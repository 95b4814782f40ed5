export { PuppeteerActionExecutor } from "./page-executor.js";
export type { PageInput } from "./page-executor.js";
export { createHumanPage } from "./human-page.js";
export type { HumanPageOptions } from "./human-page.js";
