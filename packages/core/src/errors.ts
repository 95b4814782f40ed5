/**
 * Base error for all human-input failures.
 */
export class HumanInputError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "HumanInputError";
  }
}

/**
 * Thrown by the replay layer when its abort signal fires. The whole
 * in-progress sequence stops; nothing after the cancelled step runs.
 */
export class ReplayAbortedError extends HumanInputError {
  constructor(operation: string) {
    super(`ActionReplayer: ${operation} aborted`);
    this.name = "ReplayAbortedError";
  }
}
