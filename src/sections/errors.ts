/**
 * Base error class for section lookup and editing failures
 */
export class SectionError extends Error {
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
 * No section heading matches the requested text.
 * Includes similar heading texts when there are any.
 */
export class SectionNotFoundError extends SectionError {
  constructor(
    public readonly target: string,
    public readonly suggestions: string[] = [],
  ) {
    let message = `Section '${target}' not found.`;
    if (suggestions.length > 0) {
      message += ` Did you mean one of these: ${suggestions.join(", ")}?`;
    }
    super(message);
  }
}

export class SectionIndexError extends SectionError {
  constructor(
    public readonly index: number,
    public readonly sectionCount: number,
  ) {
    super(
      sectionCount === 0
        ? `Section index ${index} out of range: document has no sections`
        : `Section index ${index} out of range (0-${sectionCount - 1})`,
    );
  }
}

/**
 * The heading text matches more than one section, so acting on any of them
 * could touch the wrong one. Address the section by index instead.
 */
export class AmbiguousSectionError extends SectionError {
  constructor(
    public readonly target: string,
    public readonly indices: number[],
  ) {
    super(`Section '${target}' is ambiguous: it matches sections ${indices.join(", ")}`);
  }
}

/**
 * Malformed level bounds or section range expressions.
 */
export class SectionRangeError extends SectionError {}
