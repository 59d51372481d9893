/**
 * Error Types
 *
 * Typed errors for each subsystem. All extend StackmeterError.
 */

export class StackmeterError extends Error {
  constructor(
    message: string,
    public readonly subsystem: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'StackmeterError';
  }
}

/**
 * Raised when popScope is handed a frame other than the top of the stack.
 * Always an instrumentation pairing bug; never retried.
 */
export class StackCorruptionError extends StackmeterError {
  constructor(
    public readonly actualTag: string,
    public readonly expectedTag: string,
  ) {
    super(`unbalanced pop from blame stack, got ${actualTag}, expected ${expectedTag}`, 'scope-stack');
    this.name = 'StackCorruptionError';
  }
}

export class ConfigError extends StackmeterError {
  constructor(message: string, cause?: unknown) {
    super(message, 'config', cause);
    this.name = 'ConfigError';
  }
}
