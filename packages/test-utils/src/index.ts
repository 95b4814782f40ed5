export { RecordingExecutor } from "./recording-executor.js";
export type { RecordedCall } from "./recording-executor.js";
export { seededRandom, constantRandom } from "./random.js";
export { createConfig, createTestEngine } from "./factories.js";
