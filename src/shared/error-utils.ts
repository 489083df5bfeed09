/**
 * Shared error utilities.
 */

/**
 * Extract a message string from an unknown error.
 * Handles Error instances, strings, and other types.
 *
 * @param error - The error to extract a message from
 * @returns The error message as a string
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * A single schema validation problem, as reported by zod.
 */
export interface ValidationIssue {
  readonly path: readonly (string | number)[];
  readonly message: string;
}

/**
 * Join validation issues into one line: "field: problem; other.field: problem".
 * Issues about the value as a whole have no path and show only the problem.
 */
export function formatValidationIssues(issues: readonly ValidationIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
