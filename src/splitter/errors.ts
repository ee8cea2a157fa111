/**
 * Base error class for all splitter-related errors
 */
export class SplitterError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Thrown for a malformed split specification such as `h7` or `parts=0`.
 * `token` is the part of the specification that was rejected.
 */
export class SplitSpecError extends SplitterError {
  constructor(
    message: string,
    public readonly token: string,
  ) {
    super(message);
  }
}

/**
 * Thrown when a strategy is called with an out-of-range argument, e.g. a
 * non-positive word target or an empty delimiter.
 */
export class SplitOptionError extends SplitterError {}
