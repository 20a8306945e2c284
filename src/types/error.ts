import type { ZodIssue } from 'zod';

const formatIssues = (issues: readonly ZodIssue[]): string =>
  issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');

/**
 * Raised when a native event does not have the expected shape: a field is missing,
 * has the wrong type, or an array-like collection lacks one of its indices.
 *
 * Listener helpers never throw it. Decode directly with {@link decode} to inspect it.
 */
export class DecodeError extends Error {
  /**
   * @param issues The issues reported by the decoder, with the path of each failing field.
   */
  constructor(public readonly issues: readonly ZodIssue[]) {
    super(`Failed to decode event: ${formatIssues(issues)}`);
    this.name = 'DecodeError';
  }
}

/**
 * Custom error class for errors that occur within an EventBinding.
 * This allows for more specific error handling and preserves the original error.
 */
export class BindingError extends Error {
  /**
   * @param message The error message.
   * @param originalError The original error, if any.
   */
  constructor(
    message: string,
    public originalError?: Error,
  ) {
    super(message);
    this.name = 'BindingError';
  }
}

/**
 * Raised by the drag sink when the handle it was given is not a native drag event.
 */
export class DragPortError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DragPortError';
  }
}
