/**
 * Base error class for all document tree errors
 */
export class AstError extends Error {
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
 * Thrown when a node cannot exist in the shape it was asked to be built in,
 * e.g. a heading level outside 1-6 or an inline node placed under a Document.
 */
export class ConstructionError extends AstError {
  constructor(
    public readonly nodeKind: string,
    public readonly violation: string,
  ) {
    super(`Invalid ${nodeKind}: ${violation}`);
  }
}

/**
 * Thrown by strict validation on the first finding.
 */
export class ValidationError extends AstError {
  constructor(public readonly finding: string) {
    super(`Validation failed: ${finding}`);
  }
}

/**
 * Thrown when a serialized record cannot be turned back into a node.
 */
export class SerializationError extends AstError {
  constructor(
    message: string,
    public readonly path: string = "",
    cause?: Error,
  ) {
    super(path ? `${message} (at ${path})` : message, cause);
  }
}
